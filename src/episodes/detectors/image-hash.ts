import { sampleTimestamps } from '../../media/sampler.js'
import { computeHashDistanceRatio } from '../../media/signal.js'
import type { RawDetection } from '../types.js'
import type { WindowDetector } from './types.js'

export const IMAGE_HASH_MAX_DISTANCE = 0.1

async function collectHashes(
  timestamps: number[],
  frameHash: (timestamp: number) => Promise<Uint8Array | null>
): Promise<Array<{ timestamp: number; hash: Uint8Array }>> {
  const hashes: Array<{ timestamp: number; hash: Uint8Array }> = []
  for (const timestamp of timestamps) {
    const hash = await frameHash(timestamp)
    if (hash) hashes.push({ timestamp, hash })
  }
  return hashes
}

/**
 * Start confirmer: frames after a boundary that look like the first episode's
 * opening (same intro card or title sequence).
 */
export const imageHashDetector: WindowDetector = {
  kind: 'image_hash',
  async detect(window, { sampler, settings, source }) {
    const { intervalSeconds, scanSeconds } = settings.intro
    const referenceRange = { start: 0, end: Math.min(scanSeconds, source.durationSeconds) }
    const references = await collectHashes(sampleTimestamps(referenceRange, intervalSeconds), (t) =>
      sampler.frameHash(t)
    )
    if (references.length === 0) return []

    const candidates = await collectHashes(sampleTimestamps(window, intervalSeconds), (t) =>
      sampler.frameHash(t)
    )
    const detections: RawDetection[] = []
    for (const candidate of candidates) {
      let best = 1
      for (const reference of references) {
        best = Math.min(best, computeHashDistanceRatio(reference.hash, candidate.hash))
      }
      if (best > IMAGE_HASH_MAX_DISTANCE) continue
      detections.push({
        timestamp: candidate.timestamp,
        score: (1 - best) * 100,
        kind: 'image_hash',
        metadata: { distance: best },
      })
    }
    return detections
  },
}
