import { DegenerateInputError, describeError } from '../episodes/errors.js'
import type { Chapter } from '../episodes/types.js'
import { runProcessCapture } from '../run/process.js'

const PROBE_TIMEOUT_MS = 30_000

export type ProbeResult = {
  durationSeconds: number
  chapters: Chapter[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toSeconds(value: unknown): number | null {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Reads `ffprobe -show_format -show_chapters` JSON. Untitled chapters get a
 * positional name so chapter analysis can still look at their durations.
 */
export function parseProbeOutput(output: string): ProbeResult {
  let parsed: unknown
  try {
    parsed = JSON.parse(output)
  } catch (error) {
    throw new DegenerateInputError(`ffprobe returned invalid JSON: ${describeError(error)}`)
  }
  if (!isRecord(parsed)) throw new DegenerateInputError('ffprobe returned no format information')

  const format = isRecord(parsed.format) ? parsed.format : null
  const durationSeconds = toSeconds(format?.duration)
  if (durationSeconds == null || durationSeconds <= 0) {
    throw new DegenerateInputError('Could not determine the source duration')
  }

  const chapters: Chapter[] = []
  const rawChapters = Array.isArray(parsed.chapters) ? parsed.chapters : []
  for (const [index, raw] of rawChapters.entries()) {
    if (!isRecord(raw)) continue
    const start = toSeconds(raw.start_time)
    const end = toSeconds(raw.end_time)
    if (start == null || end == null) continue
    const tags = isRecord(raw.tags) ? raw.tags : {}
    const title = typeof tags.title === 'string' && tags.title.trim() ? tags.title.trim() : `Chapter ${index + 1}`
    chapters.push({ title, start, end })
  }
  chapters.sort((a, b) => a.start - b.start)
  return { durationSeconds, chapters }
}

export async function probeSourceMedia({
  ffprobePath,
  inputPath,
  timeoutMs = PROBE_TIMEOUT_MS,
}: {
  ffprobePath: string
  inputPath: string
  timeoutMs?: number
}): Promise<ProbeResult> {
  const output = await runProcessCapture({
    command: ffprobePath,
    args: ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_chapters', inputPath],
    timeoutMs,
    errorLabel: 'ffprobe',
  })
  return parseProbeOutput(output)
}
