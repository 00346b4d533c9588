import { describe, expect, it } from 'vitest'

import { analyzeChapters } from '../src/episodes/chapters.js'
import { DegenerateInputError } from '../src/episodes/errors.js'
import {
  computeEpisodeTotals,
  determineSearchWindows,
  refineWithCommercialMarkers,
} from '../src/episodes/windows.js'

const limits = { minEpisodeSeconds: 15 * 60, maxEpisodeSeconds: 90 * 60 }

describe('determineSearchWindows', () => {
  it('places runtime windows at cumulative episode lengths', () => {
    const plan = determineSearchWindows({
      durationSeconds: 175 * 60,
      episodeCount: 3,
      chapters: null,
      runtime: { runtimesMinutes: [58, 59, 58], commercialSeconds: null },
      geometry: { kind: 'normal', halfWidthSeconds: 300 },
    })

    expect(plan.kind).toBe('windows')
    if (plan.kind !== 'windows') return
    expect(plan.source).toBe('runtime')
    expect(plan.windows.map((window) => [window.center, window.start, window.end])).toEqual([
      [3480, 3180, 3780],
      [7020, 6720, 7320],
    ])
    expect(plan.windows.map((window) => window.confidence)).toEqual([0.8, 0.8])
    expect(plan.windows[1]).toMatchObject({ index: 1, episodeBefore: 2, episodeAfter: 3 })
  })

  it('divides the file evenly without runtimes', () => {
    const plan = determineSearchWindows({
      durationSeconds: 5400,
      episodeCount: 3,
      chapters: null,
      runtime: null,
      geometry: { kind: 'normal', halfWidthSeconds: 300 },
    })
    if (plan.kind !== 'windows') throw new Error('expected windows')
    expect(plan.source).toBe('equal-division')
    expect(plan.windows.map((window) => window.center)).toEqual([1800, 3600])
    expect(plan.windows.map((window) => window.confidence)).toEqual([0.5, 0.5])
  })

  it('falls back to equal division when too few runtimes are positive', () => {
    const plan = determineSearchWindows({
      durationSeconds: 5400,
      episodeCount: 3,
      chapters: null,
      runtime: { runtimesMinutes: [30, 0, 30], commercialSeconds: null },
      geometry: { kind: 'normal', halfWidthSeconds: 300 },
    })
    if (plan.kind !== 'windows') throw new Error('expected windows')
    expect(plan.source).toBe('equal-division')
  })

  it('uses the asymmetric precision extent', () => {
    const plan = determineSearchWindows({
      durationSeconds: 5400,
      episodeCount: 3,
      chapters: null,
      runtime: null,
      geometry: { kind: 'precision', shape: 'asymmetric' },
    })
    if (plan.kind !== 'windows') throw new Error('expected windows')
    expect(plan.windows[0]).toMatchObject({ center: 1800, start: 1620, end: 1860 })
  })

  it('returns chapter boundaries as standalone', () => {
    const chapters = analyzeChapters(
      [
        { title: 'Episode 1', start: 0, end: 1500 },
        { title: 'Episode 2', start: 1500, end: 3000 },
        { title: 'Episode 3', start: 3000, end: 4500 },
      ],
      limits
    )
    const plan = determineSearchWindows({
      durationSeconds: 4500,
      episodeCount: 3,
      chapters,
      runtime: null,
      geometry: { kind: 'normal', halfWidthSeconds: 300 },
    })

    expect(plan.kind).toBe('standalone')
    if (plan.kind !== 'standalone') return
    expect(plan.episodeCount).toBe(3)
    expect(plan.boundaries.map((boundary) => boundary.timestamp)).toEqual([1500, 3000])
    expect(plan.boundaries[0]).toMatchObject({
      windowIndex: 0,
      confidence: 0.95,
      source: 'chapter',
      standalone: true,
      notes: ['chapter "Episode 2"'],
    })
  })

  it('anchors windows to commercial markers', () => {
    const chapters = analyzeChapters(
      [
        { title: 'Chapter 1', start: 0, end: 1200 },
        { title: 'Commercial 1', start: 1200, end: 1320 },
        { title: 'Chapter 2', start: 1320, end: 2640 },
        { title: 'Commercial 1', start: 2640, end: 2760 },
        { title: 'Chapter 3', start: 2760, end: 4000 },
      ],
      limits
    )
    expect(chapters.isEpisodeStructure).toBe(false)
    expect(chapters.commercialMarkers).toEqual([1200, 2640])
    expect(chapters.commercialSecondsPerEpisode).toEqual([0, 120, 120])

    const plan = determineSearchWindows({
      durationSeconds: 4000,
      episodeCount: 3,
      chapters,
      runtime: null,
      geometry: { kind: 'normal', halfWidthSeconds: 300 },
    })
    if (plan.kind !== 'windows') throw new Error('expected windows')
    expect(plan.windows.map((window) => [window.center, window.start, window.end])).toEqual([
      [1050, 600, 1200],
      [2490, 2040, 2640],
    ])
    expect(plan.windows[0].confidence).toBeCloseTo(0.6, 10)
    expect(plan.windows[0].commercialMarker).toBe(1200)
  })

  it('rejects windows that overlap in a short file', () => {
    expect(() =>
      determineSearchWindows({
        durationSeconds: 600,
        episodeCount: 3,
        chapters: null,
        runtime: null,
        geometry: { kind: 'normal', halfWidthSeconds: 300 },
      })
    ).toThrow(DegenerateInputError)
  })

  it('rejects a single episode', () => {
    expect(() =>
      determineSearchWindows({
        durationSeconds: 3600,
        episodeCount: 1,
        chapters: null,
        runtime: null,
        geometry: { kind: 'normal', halfWidthSeconds: 300 },
      })
    ).toThrow('Expected at least 2 episodes to split, got 1')
  })
})

describe('computeEpisodeTotals', () => {
  it('scales totals to the file duration', () => {
    const { totals, actualCommercials } = computeEpisodeTotals({
      durationSeconds: 3600,
      episodeCount: 2,
      runtimesMinutes: [40, 40],
      commercialSeconds: [0, 0],
    })
    expect(actualCommercials).toBe(true)
    expect(totals).toEqual([1800, 1800])
  })

  it('spreads unknown commercial time evenly', () => {
    const { totals } = computeEpisodeTotals({
      durationSeconds: 3000,
      episodeCount: 2,
      runtimesMinutes: [20, 20],
      commercialSeconds: null,
    })
    expect(totals).toEqual([1500, 1500])
  })
})

describe('refineWithCommercialMarkers', () => {
  it('leaves windows alone when markers are missing', () => {
    const windows = [
      {
        index: 0,
        center: 1800,
        start: 1500,
        end: 2100,
        source: 'equal-division' as const,
        confidence: 0.5,
        episodeBefore: 1,
        episodeAfter: 2,
        commercialMarker: null,
      },
    ]
    expect(refineWithCommercialMarkers(windows, [], 300, 3600)).toBe(windows)
  })
})
