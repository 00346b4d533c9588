import { fileTypeFromBuffer } from 'file-type'

import { type SplitLog, silentLog } from '../run/log.js'
import { runProcess, runProcessCaptureBuffer } from '../run/process.js'
import type {
  BlackFrameOptions,
  MediaSampler,
  SceneChange,
  SignalRegion,
  SilenceOptions,
  TimeRange,
} from './sampler.js'
import { HASH_SIZE, buildAverageHash, computeEnergyProfile } from './signal.js'

export const FFMPEG_TIMEOUT_MS = 10 * 60_000
const FRAME_TIMEOUT_MS = 60_000
const PCM_SAMPLE_RATE = 8000
const TRANSCRIPTION_SAMPLE_RATE = 16000

const SILENCE_START = /silence_start:\s*(-?\d+(?:\.\d+)?)/
const SILENCE_END = /silence_end:\s*(-?\d+(?:\.\d+)?)\s*\|\s*silence_duration:\s*(\d+(?:\.\d+)?)/
const BLACK_REGION =
  /black_start:\s*(-?\d+(?:\.\d+)?)\s+black_end:\s*(-?\d+(?:\.\d+)?)\s+black_duration:\s*(\d+(?:\.\d+)?)/
const PTS_TIME = /pts_time:\s*(-?\d+(?:\.\d+)?)/
const SCENE_SCORE = /lavfi\.scene_score=(\d+(?:\.\d+)?)/

function seekArgs(range: TimeRange): string[] {
  return ['-ss', String(range.start), '-t', String(Math.max(0, range.end - range.start))]
}

/**
 * Collects `silencedetect` regions from stderr lines. Times in the output are
 * relative to the seek point, so `offset` is added back. A silence still open
 * when the scan stops runs to `rangeEnd`.
 */
export function parseSilenceOutput(
  lines: string[],
  offset = 0,
  rangeEnd: number | null = null
): SignalRegion[] {
  const regions: SignalRegion[] = []
  let pendingStart: number | null = null
  for (const line of lines) {
    const start = SILENCE_START.exec(line)
    if (start) {
      pendingStart = Number(start[1])
      continue
    }
    const end = SILENCE_END.exec(line)
    if (!end) continue
    const endTime = Number(end[1])
    const duration = Number(end[2])
    const startTime = pendingStart ?? endTime - duration
    regions.push({ start: startTime + offset, end: endTime + offset, duration })
    pendingStart = null
  }
  if (pendingStart != null && rangeEnd != null) {
    const start = pendingStart + offset
    if (rangeEnd > start) regions.push({ start, end: rangeEnd, duration: rangeEnd - start })
  }
  return regions
}

export function parseBlackLine(line: string, offset = 0): SignalRegion | null {
  const match = BLACK_REGION.exec(line)
  if (!match) return null
  return {
    start: Number(match[1]) + offset,
    end: Number(match[2]) + offset,
    duration: Number(match[3]),
  }
}

/**
 * `metadata=print` logs a frame line with `pts_time` and then one line per
 * metadata key; the score line is paired with the frame before it.
 */
export function parseSceneOutput(lines: string[], offset = 0): SceneChange[] {
  const changes: SceneChange[] = []
  let pendingTime: number | null = null
  for (const line of lines) {
    const pts = PTS_TIME.exec(line)
    if (pts) {
      pendingTime = Number(pts[1])
      continue
    }
    const score = SCENE_SCORE.exec(line)
    if (score && pendingTime != null) {
      changes.push({ timestamp: pendingTime + offset, magnitude: Number(score[1]) })
      pendingTime = null
    }
  }
  return changes
}

export function createFfmpegSampler({
  ffmpegPath,
  inputPath,
  timeoutMs = FFMPEG_TIMEOUT_MS,
  log = silentLog,
}: {
  ffmpegPath: string
  inputPath: string
  timeoutMs?: number
  log?: SplitLog
}): MediaSampler {
  const scanStderr = async (range: TimeRange, filterArgs: string[]): Promise<string[]> => {
    const lines: string[] = []
    const startedAt = Date.now()
    await runProcess({
      command: ffmpegPath,
      args: ['-hide_banner', ...seekArgs(range), '-i', inputPath, ...filterArgs, '-f', 'null', '-'],
      timeoutMs,
      errorLabel: 'ffmpeg',
      onStderrLine: (line) => {
        lines.push(line)
      },
    })
    log(`ffmpeg scan filter=${filterArgs[filterArgs.length - 1]} start=${range.start} elapsedMs=${Date.now() - startedAt}`)
    return lines
  }

  const captureAudio = (range: TimeRange, format: string[], sampleRate: number) =>
    runProcessCaptureBuffer({
      command: ffmpegPath,
      args: [
        '-hide_banner',
        ...seekArgs(range),
        '-i',
        inputPath,
        '-vn',
        '-sn',
        '-ac',
        '1',
        '-ar',
        String(sampleRate),
        ...format,
        '-',
      ],
      timeoutMs,
      errorLabel: 'ffmpeg',
    })

  return {
    async silences(range: TimeRange, options: SilenceOptions) {
      const lines = await scanStderr(range, [
        '-vn',
        '-sn',
        '-af',
        `silencedetect=noise=${options.thresholdDb}dB:d=${options.minDurationSeconds}`,
      ])
      return parseSilenceOutput(lines, range.start, range.end)
    },

    async blacks(range: TimeRange, options: BlackFrameOptions) {
      const lines = await scanStderr(range, [
        '-an',
        '-sn',
        '-vf',
        `blackdetect=d=${options.minDurationSeconds}:pic_th=${options.pictureThreshold}:pix_th=${options.pixelThreshold}`,
      ])
      const regions: SignalRegion[] = []
      for (const line of lines) {
        const region = parseBlackLine(line, range.start)
        if (region) regions.push(region)
      }
      return regions
    },

    async sceneChanges(range: TimeRange, threshold: number) {
      const lines = await scanStderr(range, [
        '-an',
        '-sn',
        '-vf',
        `select='gt(scene,${threshold})',metadata=print`,
      ])
      return parseSceneOutput(lines, range.start)
    },

    async frame(timestamp: number) {
      const buffer = await runProcessCaptureBuffer({
        command: ffmpegPath,
        args: [
          '-hide_banner',
          '-ss',
          String(timestamp),
          '-i',
          inputPath,
          '-frames:v',
          '1',
          '-f',
          'image2pipe',
          '-vcodec',
          'mjpeg',
          '-',
        ],
        timeoutMs: FRAME_TIMEOUT_MS,
        errorLabel: 'ffmpeg',
      })
      if (buffer.length === 0) throw new Error(`ffmpeg produced no frame at ${timestamp}s`)
      const detected = await fileTypeFromBuffer(buffer)
      return { bytes: new Uint8Array(buffer), mediaType: detected?.mime ?? 'image/jpeg' }
    },

    async frameHash(timestamp: number) {
      const pixelCount = HASH_SIZE * HASH_SIZE
      const buffer = await runProcessCaptureBuffer({
        command: ffmpegPath,
        args: [
          '-hide_banner',
          '-ss',
          String(timestamp),
          '-i',
          inputPath,
          '-frames:v',
          '1',
          '-vf',
          `scale=${HASH_SIZE}:${HASH_SIZE},format=gray`,
          '-f',
          'rawvideo',
          '-pix_fmt',
          'gray',
          '-',
        ],
        timeoutMs: FRAME_TIMEOUT_MS,
        errorLabel: 'ffmpeg',
      })
      if (buffer.length < pixelCount) return null
      return buildAverageHash(buffer.subarray(0, pixelCount))
    },

    async energyProfile(range: TimeRange) {
      const pcm = await captureAudio(range, ['-f', 's16le'], PCM_SAMPLE_RATE)
      return computeEnergyProfile(pcm, PCM_SAMPLE_RATE)
    },

    async audioClip(range: TimeRange) {
      const wav = await captureAudio(range, ['-f', 'wav'], TRANSCRIPTION_SAMPLE_RATE)
      return new Uint8Array(wav)
    },
  }
}
