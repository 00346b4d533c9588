import { describe, expect, it } from 'vitest'

import { audioFingerprintDetector } from '../src/episodes/detectors/audio-fingerprint.js'
import { chapterDetector } from '../src/episodes/detectors/chapter.js'
import { imageHashDetector } from '../src/episodes/detectors/image-hash.js'
import {
  clusteringDetectorKinds,
  confirmerDetectorKinds,
  resolveWindowByClustering,
  runDetectorSafely,
} from '../src/episodes/detectors/index.js'
import { sceneChangeDetector } from '../src/episodes/detectors/scene-change.js'
import { silenceDetector } from '../src/episodes/detectors/silence.js'
import { speechDetector } from '../src/episodes/detectors/speech.js'
import { sampleWindowFrames, visionDetector } from '../src/episodes/detectors/vision.js'
import type { TranscriptionService } from '../src/services/types.js'
import {
  createFakeSampler,
  createFakeVision,
  testContext,
  testSettings,
  testSource,
  testWindow,
} from './helpers/fakes.js'

const window = testWindow({ start: 3180, end: 3780, center: 3480 })

describe('signal detectors', () => {
  it('scores silence regions by length at their midpoint', async () => {
    const context = testContext({
      sampler: createFakeSampler({ silences: async () => [{ start: 3476, end: 3480, duration: 4 }] }),
    })
    expect(await silenceDetector.detect(window, context)).toEqual([
      {
        timestamp: 3478,
        score: 40,
        kind: 'silence',
        metadata: { start: 3476, end: 3480, duration: 4 },
      },
    ])
  })

  it('scores scene changes by magnitude', async () => {
    const context = testContext({
      sampler: createFakeSampler({ sceneChanges: async () => [{ timestamp: 3500, magnitude: 0.5 }] }),
    })
    expect(await sceneChangeDetector.detect(window, context)).toEqual([
      { timestamp: 3500, score: 50, kind: 'scene_change', metadata: { magnitude: 0.5 } },
    ])
  })

  it('reports chapter starts inside the window', async () => {
    const context = testContext({
      source: testSource({
        chapters: [
          { title: 'Opening', start: 0, end: 3300 },
          { title: 'Part 2', start: 3300, end: 5400 },
        ],
      }),
    })
    expect(await chapterDetector.detect(window, context)).toEqual([
      { timestamp: 3300, score: 30, kind: 'chapter', metadata: { title: 'Part 2' } },
    ])
  })
})

describe('speech detector', () => {
  it('marks segments that end with an end-of-episode phrase', async () => {
    const transcription: TranscriptionService = {
      transcribe: async () => ({
        text: 'Stay tuned for scenes from our next episode. Hello.',
        segments: [
          { text: ' Stay tuned for scenes from our next episode.', start: 10, end: 14 },
          { text: 'Hello.', start: 20, end: 21 },
        ],
      }),
    }
    const context = { ...testContext(), services: { vision: null, transcription } }
    expect(await speechDetector.detect(window, context)).toEqual([
      {
        timestamp: 3194,
        score: 50,
        kind: 'speech',
        metadata: { phrase: 'stay tuned', text: 'Stay tuned for scenes from our next episode.' },
      },
    ])
  })

  it('needs a transcription service', async () => {
    await expect(speechDetector.detect(window, testContext())).rejects.toThrow(
      'The speech detector needs a transcription service'
    )
  })
})

describe('vision detector', () => {
  it('samples densely while a logo is on screen', async () => {
    const vision = createFakeVision((t) => ({ logo: t === 10 || t === 11 }))
    const context = testContext({ vision })
    const frames = await sampleWindowFrames(testWindow({ start: 0, end: 40 }), context)
    expect(frames.map((frame) => [frame.timestamp, frame.interval])).toEqual([
      [0, 10],
      [10, 10],
      [11, 1],
      [12, 1],
      [22, 10],
      [32, 10],
    ])
  })

  it('turns frames into logo, outro and credits detections', async () => {
    const vision = createFakeVision((t) => ({
      credits: t >= 10 && t <= 30,
      outro: t === 30,
    }))
    const context = testContext({ vision })
    const detections = await visionDetector.detect(testWindow({ start: 0, end: 50 }), context)
    expect(detections).toEqual([
      { timestamp: 30, score: 10, kind: 'llm_outro', metadata: { interval: 10 } },
      { timestamp: 35, score: 10, kind: 'llm_credits', metadata: { runLength: 3 } },
    ])
  })
})

describe('start confirmers', () => {
  const intro = new Uint8Array([1, 1, 1, 1, 1, 0, 0, 0, 0, 0])

  it('matches frames against the opening of the file', async () => {
    const sampler = createFakeSampler({
      frameHash: async (t) => {
        if (t === 20 || t === 1810) return intro
        if (t === 1820) return new Uint8Array([1, 1, 1, 1, 1, 0, 0, 0, 0, 1])
        if (t === 1830) return new Uint8Array([0, 0, 0, 0, 0, 1, 1, 1, 1, 1])
        return null
      },
    })
    const detections = await imageHashDetector.detect(
      testWindow({ start: 1800, end: 1830 }),
      testContext({ sampler })
    )
    expect(detections.map((detection) => detection.timestamp)).toEqual([1810, 1820])
    expect(detections[0].score).toBe(100)
    expect(detections[1].score).toBeCloseTo(90, 9)
    expect(detections[1].metadata).toEqual({ distance: 0.1 })
  })

  it('finds the opening audio envelope after the boundary', async () => {
    const reference = [0, 5, 1, 7, 2, 9, 0, 4]
    const sampler = createFakeSampler({
      energyProfile: async (range) => ({
        blockSeconds: 0.5,
        values: range.start === 0 ? reference : [3, 3, ...reference],
      }),
    })
    const [detection] = await audioFingerprintDetector.detect(
      testWindow({ start: 1800, end: 2100 }),
      testContext({ sampler })
    )
    expect(detection.kind).toBe('audio_fingerprint')
    expect(detection.timestamp).toBe(1801)
    expect(detection.score).toBeCloseTo(100, 9)
  })
})

describe('detector orchestration', () => {
  it('orders clustering detectors and keeps confirmers apart', () => {
    const settings = testSettings({ detectors: ['vision', 'speech', 'silence', 'image-hash', 'chapter'] })
    expect(clusteringDetectorKinds(settings.detectors)).toEqual(['chapter', 'silence', 'speech', 'vision'])
    expect(confirmerDetectorKinds(settings.detectors)).toEqual(['image_hash'])
  })

  it('turns a failing detector into a warning', async () => {
    const context = testContext({
      sampler: createFakeSampler({
        silences: async () => {
          throw new Error('ffmpeg exited 1')
        },
      }),
    })
    expect(await runDetectorSafely(silenceDetector, window, context)).toEqual([])
    expect(context.warnings).toEqual(['window=1 detector=silence reason="ffmpeg exited 1"'])
  })

  it('resolves a window to its best cluster', async () => {
    const context = testContext({
      sampler: createFakeSampler({
        silences: async () => [{ start: 3476, end: 3480, duration: 4 }],
        blacks: async () => [{ start: 3478.5, end: 3479.5, duration: 1 }],
      }),
    })
    const resolution = await resolveWindowByClustering(window, context, ['silence', 'black_frame'])
    expect(resolution.boundary?.timestamp).toBeCloseTo(3478.2, 9)
    expect(resolution.boundary?.evidence.map((detection) => detection.kind)).toEqual([
      'silence',
      'black_frame',
    ])
  })

  it('explains an empty window', async () => {
    const resolution = await resolveWindowByClustering(window, testContext(), ['silence'])
    expect(resolution).toMatchObject({ boundary: null, reason: 'no detections in window 1' })
  })
})
