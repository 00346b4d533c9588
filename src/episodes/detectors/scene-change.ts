import type { RawDetection } from '../types.js'
import type { WindowDetector } from './types.js'

export const sceneChangeDetector: WindowDetector = {
  kind: 'scene_change',
  async detect(window, { sampler, settings }) {
    const changes = await sampler.sceneChanges(window, settings.sceneThreshold)
    return changes.map((change): RawDetection => ({
      timestamp: change.timestamp,
      score: change.magnitude * 100,
      kind: 'scene_change',
      metadata: { magnitude: change.magnitude },
    }))
  },
}
