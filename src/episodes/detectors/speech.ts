import { formatFields } from '../../run/log.js'
import { withRetry } from '../../run/retry.js'
import type { TranscriptSegment } from '../../services/types.js'
import { loadEpisodeEndPhrases } from '../data.js'
import { ConfigurationError, describeError } from '../errors.js'
import type { RawDetection } from '../types.js'
import type { WindowDetector } from './types.js'

export const SPEECH_DETECTION_SCORE = 50

export function findEndPhrase(text: string, phrases: string[]): string | null {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ')
  return phrases.find((phrase) => normalized.includes(phrase)) ?? null
}

export function detectionsFromSegments(
  segments: TranscriptSegment[],
  clipStart: number,
  phrases: string[]
): RawDetection[] {
  const detections: RawDetection[] = []
  for (const segment of segments) {
    const phrase = findEndPhrase(segment.text, phrases)
    if (!phrase) continue
    detections.push({
      timestamp: clipStart + segment.end,
      score: SPEECH_DETECTION_SCORE,
      kind: 'speech',
      metadata: { phrase, text: segment.text.trim() },
    })
  }
  return detections
}

export const speechDetector: WindowDetector = {
  kind: 'speech',
  async detect(window, { sampler, services, settings, log }) {
    const transcription = services.transcription
    if (!transcription) throw new ConfigurationError('The speech detector needs a transcription service')
    const audio = await sampler.audioClip(window)
    const transcript = await withRetry(
      (signal) => transcription.transcribe({ audio, mediaType: 'audio/wav' }, signal),
      {
        ...settings.retry,
        label: 'transcription',
        onRetry: (attempt, error) => {
          log(
            formatFields({
              window: window.index + 1,
              detector: 'speech',
              attempt,
              reason: describeError(error),
            })
          )
        },
      }
    )
    return detectionsFromSegments(transcript.segments, window.start, loadEpisodeEndPhrases())
  },
}
