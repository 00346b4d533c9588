import path from 'node:path'

import type { ParsedFilename } from './types.js'

export const UNKNOWN_TITLE = 'Unknown title'

const RANGE_PATTERN = /[Ss](\d+)[Ee](\d+)\s*[-–]\s*[Ee]?(\d+)/
const EPISODE_PATTERN = /[Ss](\d+)[Ee](\d+)/
const CROSS_PATTERN = /(\d+)[Xx](\d+)/
const YEAR_PATTERN = /\b(19\d{2}|20\d{2})\b/
const QUALITY_PATTERN = /\b(2160p|1080p|720p|480p|4K)\b/i
const CODEC_PATTERN = /\b(x264|x265|HEVC|H\.?264|H\.?265|AV1)\b/i
const SOURCE_PATTERN = /\b(BluRay|BDRip|WEB-DL|WEBRip|HDTV|DVDRip)\b/i
const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g

function trimSeparators(value: string): string {
  return value.replace(/^[\s._-]+|[\s._-]+$/g, '')
}

function pickTitle(name: string, match: RegExpExecArray): string {
  const before = trimSeparators(name.slice(0, match.index))
  const after = trimSeparators(name.slice(match.index + match[0].length))
  if (before.length >= 3) return before
  if (after) return after
  return before
}

function cleanTitle(raw: string): string {
  return raw.replace(/[._]/g, ' ').replace(/\s+/g, ' ').trim()
}

function firstGroup(pattern: RegExp, name: string): string | null {
  const match = pattern.exec(name)
  return match ? match[1] : null
}

/**
 * Best-effort parse of a combined-episode filename such as
 * `Show.Name.S01E01-E03.1080p.WEB-DL.mkv`. Never throws; an unrecognised name
 * keeps its numbers null and falls back to "Unknown title".
 */
export function parseEpisodeFilename(filePath: string): ParsedFilename {
  const originalFilename = path.basename(filePath)
  const extension = path.extname(originalFilename)
  const name = originalFilename.slice(0, originalFilename.length - extension.length)

  let season: number | null = null
  let startEpisode: number | null = null
  let episodeCount: number | null = null
  let title = ''

  const range = RANGE_PATTERN.exec(name)
  const single = range ? null : EPISODE_PATTERN.exec(name)
  const cross = range || single ? null : CROSS_PATTERN.exec(name)

  if (range) {
    season = Number(range[1])
    startEpisode = Number(range[2])
    const endEpisode = Number(range[3])
    episodeCount = endEpisode >= startEpisode ? endEpisode - startEpisode + 1 : null
    title = pickTitle(name, range)
  } else if (single) {
    season = Number(single[1])
    startEpisode = Number(single[2])
    title = pickTitle(name, single)
  } else if (cross) {
    season = Number(cross[1])
    startEpisode = Number(cross[2])
    title = pickTitle(name, cross)
  }

  const year = firstGroup(YEAR_PATTERN, name)
  return {
    title: cleanTitle(title) || (season == null ? UNKNOWN_TITLE : cleanTitle(name)),
    season,
    startEpisode,
    episodeCount,
    year: year ? Number(year) : null,
    quality: firstGroup(QUALITY_PATTERN, name),
    codec: firstGroup(CODEC_PATTERN, name),
    source: firstGroup(SOURCE_PATTERN, name),
    extension,
    originalFilename,
  }
}

export function sanitizeFilename(filename: string): string {
  return filename
    .replace(INVALID_FILENAME_CHARS, '')
    .replace(/\s+/g, ' ')
    .replace(/^[\s.]+|[\s.]+$/g, '')
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0')
}

/**
 * Renders the naming pattern for one output episode, e.g.
 * `S{season:02}E{episode:02} - {basename}` -> `S01E02 - Show Name 1080p.mkv`.
 */
export function buildEpisodeFilename({
  parsed,
  season,
  episode,
  pattern,
  keepQualityInfo,
}: {
  parsed: ParsedFilename
  season: number
  episode: number
  pattern: string
  keepQualityInfo: boolean
}): string {
  const basenameParts = [parsed.title]
  if (keepQualityInfo) {
    for (const part of [parsed.quality, parsed.codec, parsed.source]) {
      if (part) basenameParts.push(part)
    }
  }
  const values: Record<string, string | number> = {
    title: parsed.title,
    season,
    episode,
    basename: basenameParts.join(' '),
    year: parsed.year ?? '',
    quality: parsed.quality ?? '',
    codec: parsed.codec ?? '',
    source: parsed.source ?? '',
    ext: parsed.extension.replace(/^\./, ''),
  }
  let rendered = pattern.replace(/\{(\w+)(?::(\d+))?\}/g, (token, key: string, width?: string) => {
    if (!(key in values)) return token
    const value = values[key]
    if (width && typeof value === 'number') return pad(value, Number(width))
    return String(value)
  })
  if (parsed.extension && !rendered.endsWith(parsed.extension)) rendered += parsed.extension
  return sanitizeFilename(rendered)
}

export function seasonDirectoryName(season: number): string {
  return `Season ${pad(season, 2)}`
}
