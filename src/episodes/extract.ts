import { mkdir } from 'node:fs/promises'
import path from 'node:path'

import { type SplitLog, formatFields, silentLog } from '../run/log.js'
import { runProcess } from '../run/process.js'
import { SplitError } from './errors.js'
import { seasonDirectoryName } from './filename.js'
import type { CutPlan, CutRange } from './types.js'

const EXTRACT_TIMEOUT_MS = 30 * 60_000

export type ExtractedEpisode = {
  range: CutRange
  outputPath: string
}

export class ExtractionRefusedError extends SplitError {
  constructor(message: string) {
    super('constraint-violation', message)
    this.name = 'ExtractionRefusedError'
  }
}

export function buildExtractArgs({
  inputPath,
  range,
  outputPath,
}: {
  inputPath: string
  range: Pick<CutRange, 'start' | 'end'>
  outputPath: string
}): string[] {
  return [
    '-hide_banner',
    '-y',
    '-ss',
    range.start.toFixed(3),
    '-i',
    inputPath,
    '-t',
    (range.end - range.start).toFixed(3),
    '-map',
    '0',
    '-c',
    'copy',
    '-avoid_negative_ts',
    'make_zero',
    outputPath,
  ]
}

export function resolveOutputPaths({
  plan,
  outputDir,
  seasonDirectory,
}: {
  plan: CutPlan
  outputDir: string
  seasonDirectory: boolean
}): ExtractedEpisode[] {
  return plan.ranges.map((range) => {
    const dir = seasonDirectory ? path.join(outputDir, seasonDirectoryName(range.season)) : outputDir
    return { range, outputPath: path.join(dir, range.filename) }
  })
}

/**
 * Stream-copies every range of the plan into its own file. Plans with
 * episode-length violations are not written, and no output may replace the
 * source.
 */
export async function extractEpisodes({
  plan,
  ffmpegPath,
  outputDir,
  seasonDirectory,
  dryRun = false,
  log = silentLog,
  onEpisode,
}: {
  plan: CutPlan
  ffmpegPath: string
  outputDir: string
  seasonDirectory: boolean
  dryRun?: boolean
  log?: SplitLog
  onEpisode?: ((completed: number, total: number, episode: ExtractedEpisode) => void) | null
}): Promise<ExtractedEpisode[]> {
  if (plan.violations.length > 0) {
    throw new ExtractionRefusedError(
      `Refusing to split: ${plan.violations.length} episode length violation(s); see the plan warnings`
    )
  }
  const outputs = resolveOutputPaths({ plan, outputDir, seasonDirectory })
  const sourcePath = path.resolve(plan.source.path)
  for (const output of outputs) {
    if (path.resolve(output.outputPath) === sourcePath) {
      throw new ExtractionRefusedError(`Refusing to overwrite the source file ${plan.source.path}`)
    }
  }
  if (dryRun) return outputs

  for (const [index, output] of outputs.entries()) {
    await mkdir(path.dirname(output.outputPath), { recursive: true })
    const startedAt = Date.now()
    await runProcess({
      command: ffmpegPath,
      args: buildExtractArgs({
        inputPath: plan.source.path,
        range: output.range,
        outputPath: output.outputPath,
      }),
      timeoutMs: EXTRACT_TIMEOUT_MS,
      errorLabel: 'ffmpeg',
    })
    log(
      formatFields({
        extracted: output.range.episode,
        output: output.outputPath,
        elapsedMs: Date.now() - startedAt,
      })
    )
    onEpisode?.(index + 1, outputs.length, output)
  }
  return outputs
}
