import { ConfigurationError } from '../episodes/errors.js'
import type { RuntimeEpisode, RuntimeMetadata } from '../episodes/types.js'
import type { RuntimeLookupRequest, RuntimeMetadataService } from './types.js'

export const TMDB_API_BASE = 'https://api.themoviedb.org/3'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function createTmdbRuntimeService({
  apiKey,
  readAccessToken,
  fetchImpl,
  baseUrl = TMDB_API_BASE,
  timeoutMs = 15_000,
}: {
  apiKey: string | null
  readAccessToken: string | null
  fetchImpl: typeof fetch
  baseUrl?: string
  timeoutMs?: number
}): RuntimeMetadataService {
  if (!apiKey && !readAccessToken) {
    throw new ConfigurationError(
      'Runtime metadata needs TMDB_API_KEY or TMDB_READ_ACCESS_TOKEN in the environment'
    )
  }

  const getJson = async (path: string, query: Record<string, string>): Promise<unknown> => {
    const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`)
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value)
    // The bearer token wins when both are configured.
    if (!readAccessToken && apiKey) url.searchParams.set('api_key', apiKey)
    const headers: Record<string, string> = { accept: 'application/json' }
    if (readAccessToken) headers.authorization = `Bearer ${readAccessToken}`

    const response = await fetchImpl(url, { headers, signal: AbortSignal.timeout(timeoutMs) })
    if (!response.ok) {
      throw new Error(`TMDB request ${path} failed (${response.status} ${response.statusText})`)
    }
    return response.json()
  }

  const searchSeries = async (title: string): Promise<{ id: number; name: string } | null> => {
    const body = await getJson('/search/tv', { query: title })
    const results = isRecord(body) && Array.isArray(body.results) ? body.results : []
    const first: unknown = results[0]
    if (!isRecord(first) || typeof first.id !== 'number') return null
    return { id: first.id, name: typeof first.name === 'string' ? first.name : title }
  }

  const seasonEpisodes = async (seriesId: number, season: number): Promise<RuntimeEpisode[]> => {
    const body = await getJson(`/tv/${seriesId}/season/${season}`, {})
    const episodes = isRecord(body) && Array.isArray(body.episodes) ? body.episodes : []
    const parsed: RuntimeEpisode[] = []
    for (const raw of episodes) {
      if (!isRecord(raw) || typeof raw.episode_number !== 'number') continue
      parsed.push({
        episode: raw.episode_number,
        name: typeof raw.name === 'string' ? raw.name : '',
        runtimeMinutes: typeof raw.runtime === 'number' && raw.runtime > 0 ? raw.runtime : null,
      })
    }
    return parsed
  }

  return {
    async lookup({
      title,
      season,
      startEpisode,
      episodeCount,
    }: RuntimeLookupRequest): Promise<RuntimeMetadata | null> {
      const series = await searchSeries(title)
      if (!series) return null
      const lastEpisode = startEpisode + episodeCount - 1
      const episodes = (await seasonEpisodes(series.id, season))
        .filter((episode) => episode.episode >= startEpisode && episode.episode <= lastEpisode)
        .sort((a, b) => a.episode - b.episode)
      return { seriesId: series.id, seriesName: series.name, episodes }
    },
  }
}
