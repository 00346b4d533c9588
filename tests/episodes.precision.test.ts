import { describe, expect, it } from 'vitest'

import type { ClassifiedFrame } from '../src/episodes/detectors/vision.js'
import { NoDetectionError } from '../src/episodes/errors.js'
import {
  INITIAL_DRIFT,
  accumulateDrift,
  applyDrift,
  pickPrecisionCandidate,
  runPrecisionSequence,
} from '../src/episodes/precision.js'
import type { SearchWindow } from '../src/episodes/types.js'
import { determineSearchWindows } from '../src/episodes/windows.js'
import type { FrameClassification } from '../src/services/types.js'
import {
  NO_CLASSIFICATION,
  createFakeSampler,
  createFakeVision,
  testContext,
  testSettings,
  testSource,
  testWindow,
} from './helpers/fakes.js'

const DURATION = 5400
const selection = { groupingBufferSeconds: 10, postCreditsBufferSeconds: 15, minCreditsFrames: 3 }

function buildFrames(
  from: number,
  to: number,
  step: number,
  classify: (timestamp: number) => Partial<FrameClassification>
): ClassifiedFrame[] {
  const frames: ClassifiedFrame[] = []
  for (let timestamp = from; timestamp <= to; timestamp += step) {
    frames.push({ timestamp, interval: step, classification: { ...NO_CLASSIFICATION, ...classify(timestamp) } })
  }
  return frames
}

function precisionWindows(): SearchWindow[] {
  const plan = determineSearchWindows({
    durationSeconds: DURATION,
    episodeCount: 3,
    chapters: null,
    runtime: { runtimesMinutes: [30, 30, 30], commercialSeconds: null },
    geometry: { kind: 'precision', shape: 'asymmetric' },
  })
  if (plan.kind !== 'windows') throw new Error('expected windows')
  return plan.windows
}

const precisionOverrides = {
  mode: 'precision' as const,
  runtimeMetadata: true,
  detectors: ['vision', 'silence', 'black'],
}

describe('drift', () => {
  it('shifts windows and accumulates the observed error', () => {
    const window = testWindow({ start: 3420, end: 3660, center: 3600 })
    const drift = accumulateDrift(INITIAL_DRIFT, 1800, 1770)
    expect(drift.offsetSeconds).toBe(-30)
    expect(applyDrift(window, drift, DURATION)).toMatchObject({ center: 3570, start: 3390, end: 3630 })
  })

  it('clamps shifted windows to the file', () => {
    const window = testWindow({ start: 5300, end: 5400, center: 5350 })
    expect(applyDrift(window, { offsetSeconds: 200 }, DURATION)).toMatchObject({ start: 5400, end: 5400 })
  })
})

describe('pickPrecisionCandidate', () => {
  it('takes the first logo clump without credits', () => {
    const frames = buildFrames(0, 40, 2, (t) => ({ logo: t === 20 || t === 22 }))
    expect(pickPrecisionCandidate(frames, selection)).toMatchObject({
      timestamp: 23,
      source: 'logo',
      confidence: 0.9,
    })
  })

  it('prefers the last logo before the end of the credits', () => {
    const frames = buildFrames(0, 40, 2, (t) => ({
      logo: t === 4 || t === 6,
      credits: t >= 10 && t <= 14,
    }))
    expect(pickPrecisionCandidate(frames, selection)).toMatchObject({ timestamp: 7, source: 'logo' })
  })

  it('falls back to the end of the credits plus a buffer', () => {
    const frames = buildFrames(0, 40, 2, (t) => ({ credits: t >= 10 && t <= 14 }))
    expect(pickPrecisionCandidate(frames, selection)).toMatchObject({
      timestamp: 30,
      source: 'credits',
      confidence: 0.8,
      note: 'credits ended at 15.0s (3 frames)',
    })
  })

  it('ignores credits runs that are too short', () => {
    const frames = buildFrames(0, 40, 2, (t) => ({ credits: t === 10 || t === 12 }))
    expect(pickPrecisionCandidate(frames, selection)).toBeNull()
  })
})

describe('runPrecisionSequence', () => {
  it('carries the observed drift into later windows', async () => {
    const vision = createFakeVision((t) => ({ logo: t === 1768 || t === 3590 }))
    const sampler = createFakeSampler({
      blacks: async (range) =>
        range.start <= 1770 && range.end >= 1770 ? [{ start: 1769.5, end: 1770.5, duration: 1 }] : [],
    })
    const context = testContext({
      sampler,
      vision,
      settings: testSettings(precisionOverrides),
      source: testSource({ durationSeconds: DURATION }),
    })

    const resolutions = await runPrecisionSequence({
      windows: precisionWindows(),
      context,
      durationSeconds: DURATION,
    })

    expect(resolutions[0].boundary).toMatchObject({ timestamp: 1770, source: 'logo', confidence: 0.95 })
    expect(resolutions[0].boundary?.notes).toEqual([
      'first logo clump (1 frames)',
      'snapped to black frame at 1770.00s',
    ])
    expect(resolutions[1].window).toMatchObject({ center: 3570, start: 3390, end: 3630 })
    expect(resolutions[1].boundary).toMatchObject({ timestamp: 3591, source: 'logo', confidence: 0.9 })
  })

  it('splits where the boundary pattern says', async () => {
    const vision = createFakeVision((t) => ({
      credits: t >= 1700 && t <= 1704,
      logo: t === 1720 || t === 1722 || t === 3500,
    }))
    const settings = testSettings({ ...precisionOverrides, pattern: 'c-l-s' })
    const context = testContext({ vision, settings, source: testSource({ durationSeconds: DURATION }) })

    await expect(
      runPrecisionSequence({ windows: precisionWindows(), context, durationSeconds: DURATION })
    ).rejects.toThrow('Pattern c-l-s did not match in window 2')

    const [first] = await runPrecisionSequence({
      windows: precisionWindows().slice(0, 1),
      context,
      durationSeconds: DURATION,
    })
    expect(first.boundary).toMatchObject({
      timestamp: 1722,
      source: 'pattern',
      notes: ['pattern c-l-s matched 2/2 blocks, split after 2'],
    })
  })

  it('falls back to normal detection around the window', async () => {
    const vision = createFakeVision(() => ({}))
    const sampler = createFakeSampler({
      silences: async (range) =>
        range.start <= 1992 && range.end >= 1992 ? [{ start: 1990, end: 1994, duration: 4 }] : [],
    })
    const context = testContext({
      sampler,
      vision,
      settings: testSettings(precisionOverrides),
      source: testSource({ durationSeconds: DURATION }),
    })

    const [first] = await runPrecisionSequence({
      windows: precisionWindows().slice(0, 1),
      context,
      durationSeconds: DURATION,
    })
    expect(first.boundary).toMatchObject({ timestamp: 1992, source: 'fallback' })
    expect(first.boundary?.notes).toContain('normal detection fallback')
  })

  it('finds the logo in the range before the window', async () => {
    const vision = createFakeVision((t) => ({ logo: t === 1600 }))
    const sampler = createFakeSampler({
      silences: async (range) =>
        range.start <= 1992 && range.end >= 1992 ? [{ start: 1990, end: 1994, duration: 4 }] : [],
    })
    const context = testContext({
      sampler,
      vision,
      settings: testSettings(precisionOverrides),
      source: testSource({ durationSeconds: DURATION }),
    })

    const [first] = await runPrecisionSequence({
      windows: precisionWindows().slice(0, 1),
      context,
      durationSeconds: DURATION,
    })
    expect(first.boundary).toMatchObject({ timestamp: 1601, source: 'logo', confidence: 0.9 })
    expect(first.boundary?.notes).toEqual(['first logo clump (1 frames)', 'expanded backward'])
    expect(context.lines).toContain('window=1 fallback=backward start=1530 end=1620')
    expect(context.lines).not.toContain('window=1 fallback=forward start=1860 end=1950')
  })

  it('finds the logo in the range after the window', async () => {
    const vision = createFakeVision((t) => ({ logo: t === 1900 }))
    const sampler = createFakeSampler({
      silences: async (range) =>
        range.start <= 1992 && range.end >= 1992 ? [{ start: 1990, end: 1994, duration: 4 }] : [],
    })
    const context = testContext({
      sampler,
      vision,
      settings: testSettings(precisionOverrides),
      source: testSource({ durationSeconds: DURATION }),
    })

    const [first] = await runPrecisionSequence({
      windows: precisionWindows().slice(0, 1),
      context,
      durationSeconds: DURATION,
    })
    expect(first.boundary).toMatchObject({ timestamp: 1901, source: 'logo', confidence: 0.9 })
    expect(first.boundary?.notes).toEqual(['first logo clump (1 frames)', 'expanded forward'])
    expect(context.lines).toContain('window=1 fallback=backward start=1530 end=1620')
    expect(context.lines).toContain('window=1 fallback=forward start=1860 end=1950')
    expect(context.lines).not.toContain('window=1 fallback=normal-detection')
  })

  it('keeps the other frames when one frame cannot be classified', async () => {
    const vision = createFakeVision((t) => {
      if (t === 1700) throw new Error('rate limited')
      return { logo: t === 1768 }
    })
    const context = testContext({
      vision,
      settings: testSettings(precisionOverrides),
      source: testSource({ durationSeconds: DURATION }),
    })

    const [first] = await runPrecisionSequence({
      windows: precisionWindows().slice(0, 1),
      context,
      durationSeconds: DURATION,
    })
    expect(first.boundary).toMatchObject({ timestamp: 1769, source: 'logo' })
    expect(first.boundary?.notes).toEqual(['first logo clump (1 frames)'])
    expect(context.warnings).toEqual([
      'window=1 detector=vision timestamp=1700 reason="vision failed after 1 attempts: rate limited"',
    ])
  })

  it('fails fast under the strict policy and records the gap otherwise', async () => {
    const vision = createFakeVision(() => ({}))
    const strict = testContext({
      vision,
      settings: testSettings(precisionOverrides),
      source: testSource({ durationSeconds: DURATION }),
    })
    await expect(
      runPrecisionSequence({ windows: precisionWindows(), context: strict, durationSeconds: DURATION })
    ).rejects.toBeInstanceOf(NoDetectionError)

    const lenient = testContext({
      vision,
      settings: testSettings({ ...precisionOverrides, policy: 'best-effort' }),
      source: testSource({ durationSeconds: DURATION }),
    })
    const progress: number[] = []
    const resolutions = await runPrecisionSequence({
      windows: precisionWindows(),
      context: lenient,
      durationSeconds: DURATION,
      onWindowDone: (completed) => progress.push(completed),
    })
    expect(resolutions.map((resolution) => resolution.boundary)).toEqual([null, null])
    expect(resolutions[0].reason).toBe('no logo, credits or fallback detection in window 1')
    expect(resolutions[1].window.center).toBe(3600)
    expect(progress).toEqual([1, 2])
  })
})
