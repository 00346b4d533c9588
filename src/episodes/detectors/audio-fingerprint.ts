import { bestLagCorrelation } from '../../media/signal.js'
import type { WindowDetector } from './types.js'

export const AUDIO_MATCH_CORRELATION = 0.85
const MAX_LAG_SECONDS = 10

/** Start confirmer: compares the loudness envelope after a boundary with the file's opening. */
export const audioFingerprintDetector: WindowDetector = {
  kind: 'audio_fingerprint',
  async detect(window, { sampler, settings, source }) {
    const referenceRange = { start: 0, end: Math.min(settings.intro.scanSeconds, source.durationSeconds) }
    const reference = await sampler.energyProfile(referenceRange)
    const candidate = await sampler.energyProfile(window)
    const maxLag = Math.round(MAX_LAG_SECONDS / reference.blockSeconds)
    const best = bestLagCorrelation(reference.values, candidate.values, maxLag)
    if (best.correlation < AUDIO_MATCH_CORRELATION) return []
    const lagSeconds = best.lag * candidate.blockSeconds
    return [
      {
        timestamp: window.start + lagSeconds,
        score: best.correlation * 100,
        kind: 'audio_fingerprint',
        metadata: { correlation: best.correlation, lagSeconds },
      },
    ]
  },
}
