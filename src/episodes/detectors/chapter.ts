import type { RawDetection } from '../types.js'
import type { WindowDetector } from './types.js'

export const CHAPTER_DETECTION_SCORE = 30

// Any chapter start is weak evidence of a cut; the file's first chapter never is.
export const chapterDetector: WindowDetector = {
  kind: 'chapter',
  async detect(window, { source }) {
    return source.chapters
      .filter((chapter) => chapter.start > 0 && chapter.start >= window.start && chapter.start <= window.end)
      .map((chapter): RawDetection => ({
        timestamp: chapter.start,
        score: CHAPTER_DETECTION_SCORE,
        kind: 'chapter',
        metadata: { title: chapter.title },
      }))
  },
}
