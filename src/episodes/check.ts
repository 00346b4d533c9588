import { analyzeChapters, hasMultiEpisodeChapters } from './chapters.js'
import { parseEpisodeFilename } from './filename.js'
import type { SplitSettings } from './settings.js'
import type { Chapter, ParsedFilename } from './types.js'

export type SourceCheck = {
  qualifies: boolean
  reasons: string[]
  parsed: ParsedFilename
}

/** Cheap pre-check: is this file worth planning a split for? */
export function checkSourceFile({
  filePath,
  durationSeconds,
  chapters,
  settings,
}: {
  filePath: string
  durationSeconds: number
  chapters: Chapter[]
  settings: Pick<SplitSettings, 'minEpisodeSeconds' | 'maxEpisodeSeconds' | 'minFileSeconds'>
}): SourceCheck {
  const parsed = parseEpisodeFilename(filePath)
  if (durationSeconds < settings.minFileSeconds) {
    return {
      qualifies: false,
      reasons: [
        `duration ${(durationSeconds / 60).toFixed(1)} min is below the ${(settings.minFileSeconds / 60).toFixed(0)} min minimum`,
      ],
      parsed,
    }
  }

  const reasons: string[] = []
  if (parsed.episodeCount != null && parsed.episodeCount > 1) {
    reasons.push(`filename lists ${parsed.episodeCount} episodes`)
  }
  const analysis = analyzeChapters(chapters, settings)
  if (hasMultiEpisodeChapters(analysis)) {
    reasons.push(`chapters mark ${analysis.episodeChapters.length} episodes`)
  }
  if (durationSeconds >= settings.maxEpisodeSeconds * 1.5) {
    reasons.push(
      `duration ${(durationSeconds / 60).toFixed(1)} min exceeds 1.5x the ${(settings.maxEpisodeSeconds / 60).toFixed(0)} min episode maximum`
    )
  }
  return { qualifies: reasons.length > 0, reasons, parsed }
}
