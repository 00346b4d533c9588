import { describe, expect, it } from 'vitest'

import { ConfigurationError, TransientServiceError } from '../src/episodes/errors.js'
import { createTmdbRuntimeService } from '../src/services/runtime-metadata.js'
import { createTranscriptionService } from '../src/services/transcription.js'
import { parseFrameClassification } from '../src/services/vision.js'

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })

function createTmdbFetch() {
  const requests: Array<{ url: URL; authorization: string | null }> = []
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input))
    const headers = new Headers(init?.headers)
    requests.push({ url, authorization: headers.get('authorization') })
    if (url.pathname.endsWith('/search/tv')) {
      return jsonResponse({ results: [{ id: 42, name: 'Show Name' }, { id: 7, name: 'Other' }] })
    }
    if (url.pathname.endsWith('/tv/42/season/1')) {
      return jsonResponse({
        episodes: [
          { episode_number: 3, name: 'Three', runtime: 22 },
          { episode_number: 1, name: 'One', runtime: 24 },
          { episode_number: 2, name: 'Two', runtime: 0 },
          { episode_number: 4, name: 'Four', runtime: 23 },
        ],
      })
    }
    return jsonResponse({ status_message: 'not found' }, 404)
  }
  return { fetchImpl, requests }
}

describe('TMDB runtime metadata', () => {
  it('looks up the season and keeps the requested episodes', async () => {
    const { fetchImpl, requests } = createTmdbFetch()
    const service = createTmdbRuntimeService({ apiKey: 'test-key', readAccessToken: null, fetchImpl })

    const metadata = await service.lookup({ title: 'Show Name', season: 1, startEpisode: 1, episodeCount: 3 })

    expect(metadata).toEqual({
      seriesId: 42,
      seriesName: 'Show Name',
      episodes: [
        { episode: 1, name: 'One', runtimeMinutes: 24 },
        { episode: 2, name: 'Two', runtimeMinutes: null },
        { episode: 3, name: 'Three', runtimeMinutes: 22 },
      ],
    })
    expect(requests[0]?.url.searchParams.get('query')).toBe('Show Name')
    expect(requests[0]?.url.searchParams.get('api_key')).toBe('test-key')
    expect(requests[0]?.authorization).toBeNull()
  })

  it('prefers the bearer token', async () => {
    const { fetchImpl, requests } = createTmdbFetch()
    const service = createTmdbRuntimeService({
      apiKey: 'test-key',
      readAccessToken: 'test-token',
      fetchImpl,
    })
    await service.lookup({ title: 'Show Name', season: 1, startEpisode: 1, episodeCount: 2 })
    expect(requests[0]?.authorization).toBe('Bearer test-token')
    expect(requests[0]?.url.searchParams.has('api_key')).toBe(false)
  })

  it('surfaces failed requests', async () => {
    const { fetchImpl } = createTmdbFetch()
    const service = createTmdbRuntimeService({ apiKey: 'test-key', readAccessToken: null, fetchImpl })
    await expect(
      service.lookup({ title: 'Show Name', season: 9, startEpisode: 1, episodeCount: 2 })
    ).rejects.toThrow('TMDB request /tv/42/season/9 failed (404')
  })

  it('needs credentials', () => {
    const { fetchImpl } = createTmdbFetch()
    expect(() => createTmdbRuntimeService({ apiKey: null, readAccessToken: null, fetchImpl })).toThrow(
      ConfigurationError
    )
  })
})

describe('parseFrameClassification', () => {
  it('reads KEY: YES/NO lines, markdown included', () => {
    expect(
      parseFrameClassification('**CREDITS:** YES\nLOGO: no\nOUTRO: NO\nTITLE_CARD: yes')
    ).toEqual({ credits: true, logo: false, outro: false, titleCard: true })
  })

  it('reads the JSON form', () => {
    expect(
      parseFrameClassification('Sure: {"credits": false, "logo": "yes", "outro": false, "title_card": "no"}')
    ).toEqual({ credits: false, logo: true, outro: false, titleCard: false })
  })

  it('rejects incomplete answers as transient failures', () => {
    expect(() => parseFrameClassification('CREDITS: YES\nLOGO: NO')).toThrow(TransientServiceError)
    expect(() => parseFrameClassification('I cannot tell.')).toThrow(
      'Malformed vision response: "I cannot tell."'
    )
  })
})

describe('createTranscriptionService', () => {
  const fetchImpl: typeof fetch = async () => jsonResponse({})

  it('only accepts openai models', () => {
    expect(() =>
      createTranscriptionService({
        modelId: 'google/chirp',
        apiKey: 'test-key',
        baseUrl: null,
        timeoutMs: 1000,
        fetchImpl,
      })
    ).toThrow('Unsupported transcription model "google/chirp"')
  })

  it('needs a key unless a local server is configured', () => {
    expect(() =>
      createTranscriptionService({
        modelId: 'openai/whisper-1',
        apiKey: null,
        baseUrl: null,
        timeoutMs: 1000,
        fetchImpl,
      })
    ).toThrow('Missing OPENAI_API_KEY for the speech detector')
    expect(() =>
      createTranscriptionService({
        modelId: 'openai/whisper-1',
        apiKey: null,
        baseUrl: 'http://localhost:9000/v1',
        timeoutMs: 1000,
        fetchImpl,
      })
    ).not.toThrow()
  })
})
