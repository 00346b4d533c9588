import { loadChapterPatterns } from './data.js'
import type { Chapter } from './types.js'

const COMMERCIAL_MIN_SECONDS = 15
const COMMERCIAL_MAX_SECONDS = 300

export type ChapterAnalysis = {
  isEpisodeStructure: boolean
  reason: string
  episodeChapters: Chapter[]
  /** Start times of "Commercial 1" chapters, ascending. */
  commercialMarkers: number[]
  /** Commercial seconds per episode region, when markers split the file. */
  commercialSecondsPerEpisode: number[] | null
}

type ChapterInfo = {
  chapter: Chapter
  duration: number
  episodeTitle: boolean
  nonEpisode: boolean
  episodeDuration: boolean
  commercialDuration: boolean
}

function describeChapter(
  chapter: Chapter,
  limits: { minEpisodeSeconds: number; maxEpisodeSeconds: number }
): ChapterInfo {
  const patterns = loadChapterPatterns()
  const title = chapter.title.trim()
  const duration = chapter.end - chapter.start
  return {
    chapter,
    duration,
    episodeTitle: patterns.episodeTitle.some((pattern) => pattern.test(title)),
    nonEpisode: patterns.nonEpisodeTitle.some((pattern) => pattern.test(title)),
    episodeDuration: duration >= limits.minEpisodeSeconds && duration <= limits.maxEpisodeSeconds,
    commercialDuration: duration >= COMMERCIAL_MIN_SECONDS && duration <= COMMERCIAL_MAX_SECONDS,
  }
}

function classify(
  infos: ChapterInfo[]
): Pick<ChapterAnalysis, 'isEpisodeStructure' | 'reason' | 'episodeChapters'> {
  const notEpisodes = (reason: string) => ({
    isEpisodeStructure: false,
    reason,
    episodeChapters: [],
  })
  if (infos.length === 0) return notEpisodes('no chapters')

  const total = infos.length
  const titled = infos.filter((info) => info.episodeTitle && !info.nonEpisode)
  if (titled.length >= 2) {
    return {
      isEpisodeStructure: true,
      reason: `${titled.length} chapters have episode titles`,
      episodeChapters: titled.map((info) => info.chapter),
    }
  }

  const commercialCount = infos.filter((info) => info.commercialDuration).length
  if (commercialCount > total * 0.5) {
    return notEpisodes(`${commercialCount}/${total} chapters have commercial-like durations`)
  }

  const nonEpisodeCount = infos.filter((info) => info.nonEpisode).length
  if (nonEpisodeCount > total * 0.3) {
    return notEpisodes(`${nonEpisodeCount}/${total} chapters match non-episode titles`)
  }

  const episodeLength = infos.filter((info) => info.episodeDuration)
  if (episodeLength.length >= 2 && episodeLength.length === total) {
    const chapters = episodeLength.filter((info) => !info.nonEpisode)
    if (chapters.length >= 2) {
      return {
        isEpisodeStructure: true,
        reason: `all ${chapters.length} chapters have episode-length durations`,
        episodeChapters: chapters.map((info) => info.chapter),
      }
    }
  }

  const titledWithLength = infos.filter(
    (info) => info.episodeTitle && !info.nonEpisode && info.episodeDuration
  )
  if (titledWithLength.length >= 2) {
    return {
      isEpisodeStructure: true,
      reason: `${titledWithLength.length} chapters have episode titles and durations`,
      episodeChapters: titledWithLength.map((info) => info.chapter),
    }
  }

  return notEpisodes('chapter structure does not indicate episodes')
}

function commercialSecondsByRegion(
  chapters: Chapter[],
  markers: number[],
  commercialTitle: RegExp
): number[] | null {
  if (markers.length === 0) return null
  const regionStarts = [0, ...markers]
  const totals = regionStarts.map(() => 0)
  for (const chapter of chapters) {
    if (!commercialTitle.test(chapter.title.trim())) continue
    let region = 0
    for (let i = 0; i < regionStarts.length; i += 1) {
      if (chapter.start >= regionStarts[i]) region = i
    }
    totals[region] += Math.max(0, chapter.end - chapter.start)
  }
  return totals
}

export function analyzeChapters(
  chapters: Chapter[],
  limits: { minEpisodeSeconds: number; maxEpisodeSeconds: number }
): ChapterAnalysis {
  const patterns = loadChapterPatterns()
  const infos = chapters.map((chapter) => describeChapter(chapter, limits))
  const commercialMarkers = chapters
    .filter((chapter) => patterns.commercialMarker.test(chapter.title.trim()))
    .map((chapter) => chapter.start)
    .sort((a, b) => a - b)
  return {
    ...classify(infos),
    commercialMarkers,
    commercialSecondsPerEpisode: commercialSecondsByRegion(
      chapters,
      commercialMarkers,
      patterns.commercialTitle
    ),
  }
}

export function hasMultiEpisodeChapters(analysis: ChapterAnalysis): boolean {
  return analysis.isEpisodeStructure && analysis.episodeChapters.length >= 2
}
