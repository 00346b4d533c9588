import { formatFields } from '../../run/log.js'
import { withRetry } from '../../run/retry.js'
import type { FrameClassification } from '../../services/types.js'
import { ConfigurationError, describeError } from '../errors.js'
import type { RawDetection, SearchWindow } from '../types.js'
import type { DetectionContext, WindowDetector } from './types.js'

export type ClassifiedFrame = {
  timestamp: number
  /** Seconds since the previous sampled frame (the base interval for the first). */
  interval: number
  classification: FrameClassification
}

export type CreditsTransition = {
  /** Last frame of the credits run. */
  lastCredits: ClassifiedFrame
  /** First frame after the run. */
  next: ClassifiedFrame
  runLength: number
}

export async function classifyFrameAt(
  context: DetectionContext,
  timestamp: number,
  windowIndex: number
): Promise<FrameClassification> {
  const vision = context.services.vision
  if (!vision) throw new ConfigurationError('The vision detector needs a vision service')
  const frame = await context.sampler.frame(timestamp)
  return withRetry(
    (signal) => vision.classifyFrame({ image: frame.bytes, mediaType: frame.mediaType }, signal),
    {
      ...context.settings.retry,
      label: 'vision',
      onRetry: (attempt, error) => {
        context.log(
          formatFields({
            window: windowIndex + 1,
            detector: 'vision',
            attempt,
            reason: describeError(error),
          })
        )
      },
    }
  )
}

/** Credits runs of at least `minRun` frames that end inside the sampled range. */
export function findCreditsTransitions(frames: ClassifiedFrame[], minRun: number): CreditsTransition[] {
  const transitions: CreditsTransition[] = []
  let runLength = 0
  for (let i = 0; i < frames.length; i += 1) {
    if (frames[i].classification.credits) {
      runLength += 1
      continue
    }
    if (runLength >= minRun && i > 0) {
      transitions.push({ lastCredits: frames[i - 1], next: frames[i], runLength })
    }
    runLength = 0
  }
  return transitions
}

/**
 * Walks the window at the base interval, switching to the dense interval once a
 * logo shows up and back again after the logo has disappeared.
 */
export async function sampleWindowFrames(
  window: SearchWindow,
  context: DetectionContext
): Promise<ClassifiedFrame[]> {
  const { baseIntervalSeconds, denseIntervalSeconds } = context.settings.vision
  const frames: ClassifiedFrame[] = []
  let dense = false
  let timestamp = window.start
  let interval = baseIntervalSeconds
  while (timestamp <= window.end) {
    const classification = await classifyFrameAt(context, timestamp, window.index)
    const previous = frames[frames.length - 1]
    frames.push({ timestamp, interval, classification })
    if (!dense && classification.logo) {
      dense = true
    } else if (dense && previous?.classification.logo && !classification.logo) {
      dense = false
    }
    interval = dense ? denseIntervalSeconds : baseIntervalSeconds
    timestamp += interval
  }
  return frames
}

export function detectionsFromFrames(frames: ClassifiedFrame[], minCreditsFrames: number): RawDetection[] {
  const detections: RawDetection[] = []
  for (const frame of frames) {
    if (frame.classification.logo) {
      detections.push({
        timestamp: frame.timestamp,
        score: frame.interval,
        kind: 'llm_logo',
        metadata: { interval: frame.interval },
      })
    }
    if (frame.classification.outro) {
      detections.push({
        timestamp: frame.timestamp,
        score: frame.interval,
        kind: 'llm_outro',
        metadata: { interval: frame.interval },
      })
    }
  }
  for (const transition of findCreditsTransitions(frames, minCreditsFrames)) {
    const gap = transition.next.timestamp - transition.lastCredits.timestamp
    detections.push({
      timestamp: (transition.lastCredits.timestamp + transition.next.timestamp) / 2,
      score: gap,
      kind: 'llm_credits',
      metadata: { runLength: transition.runLength },
    })
  }
  return detections
}

export const visionDetector: WindowDetector = {
  kind: 'vision',
  async detect(window, context) {
    const frames = await sampleWindowFrames(window, context)
    return detectionsFromFrames(frames, context.settings.vision.minCreditsFrames)
  },
}
