import { detectionsFromRegions } from './silence.js'
import type { WindowDetector } from './types.js'

export const blackFrameDetector: WindowDetector = {
  kind: 'black_frame',
  async detect(window, { sampler, settings }) {
    const regions = await sampler.blacks(window, settings.blackFrame)
    return detectionsFromRegions(regions, 'black_frame')
  },
}
