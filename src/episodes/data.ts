import { readFileSync } from 'node:fs'

export type ChapterPatterns = {
  episodeTitle: RegExp[]
  nonEpisodeTitle: RegExp[]
  commercialMarker: RegExp
  commercialTitle: RegExp
}

let chapterPatterns: ChapterPatterns | null = null
let episodeEndPhrases: string[] | null = null

// src/episodes and dist/episodes both sit two levels below the package root.
function readDataFile(name: string): unknown {
  const url = new URL(`../../data/${name}`, import.meta.url)
  return JSON.parse(readFileSync(url, 'utf8'))
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function loadChapterPatterns(): ChapterPatterns {
  if (chapterPatterns) return chapterPatterns
  const raw = readDataFile('chapter-patterns.json')
  if (
    !isRecord(raw) ||
    !isStringArray(raw.episodeTitle) ||
    !isStringArray(raw.nonEpisodeTitle) ||
    typeof raw.commercialMarker !== 'string' ||
    typeof raw.commercialTitle !== 'string'
  ) {
    throw new Error('Invalid data/chapter-patterns.json')
  }
  chapterPatterns = {
    episodeTitle: raw.episodeTitle.map((source) => new RegExp(source, 'i')),
    nonEpisodeTitle: raw.nonEpisodeTitle.map((source) => new RegExp(source, 'i')),
    commercialMarker: new RegExp(raw.commercialMarker, 'i'),
    commercialTitle: new RegExp(raw.commercialTitle, 'i'),
  }
  return chapterPatterns
}

export function loadEpisodeEndPhrases(): string[] {
  if (episodeEndPhrases) return episodeEndPhrases
  const raw = readDataFile('episode-end-phrases.json')
  if (!isStringArray(raw)) throw new Error('Invalid data/episode-end-phrases.json')
  episodeEndPhrases = raw.map((phrase) => phrase.toLowerCase())
  return episodeEndPhrases
}
