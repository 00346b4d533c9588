import type { SignalRegion } from '../../media/sampler.js'
import type { DetectionKind, RawDetection } from '../types.js'
import type { WindowDetector } from './types.js'

const SCORE_PER_SECOND = 10

export function detectionsFromRegions(regions: SignalRegion[], kind: DetectionKind): RawDetection[] {
  return regions.map((region) => ({
    timestamp: (region.start + region.end) / 2,
    score: region.duration * SCORE_PER_SECOND,
    kind,
    metadata: { start: region.start, end: region.end, duration: region.duration },
  }))
}

export const silenceDetector: WindowDetector = {
  kind: 'silence',
  async detect(window, { sampler, settings }) {
    const regions = await sampler.silences(window, settings.silence)
    return detectionsFromRegions(regions, 'silence')
  },
}
