import { describe, expect, it } from 'vitest'

import {
  boundaryFromCluster,
  clusterConfidence,
  clusterDetections,
  pickBestCluster,
  speechFactor,
} from '../src/episodes/cluster.js'
import type { RawDetection } from '../src/episodes/types.js'

const window = { start: 3180, end: 3780 }

function detection(kind: RawDetection['kind'], timestamp: number, score: number): RawDetection {
  return { kind, timestamp, score, metadata: {} }
}

describe('clusterDetections', () => {
  const silence = detection('silence', 3478, 30)
  const black = detection('black_frame', 3479, 15)
  const scene = detection('scene_change', 3700, 40)

  it('groups nearby detections and rewards kind diversity', () => {
    const clusters = clusterDetections([silence, black, scene], window)
    expect(clusters).toHaveLength(2)

    const best = pickBestCluster(clusters)
    expect(best?.kinds).toEqual(['black_frame', 'silence'])
    expect(best?.center).toBeCloseTo(3478 + 1 / 3, 9)
    expect(best?.spread).toBe(1)
    expect(best?.baseScore).toBe(45)
    expect(best?.score).toBeCloseTo((45 * 1.5) / 1.1, 9)
  })

  it('does not depend on input order', () => {
    const forward = clusterDetections([silence, black, scene], window)
    const shuffled = clusterDetections([scene, black, silence], window)
    expect(shuffled).toEqual(forward)
  })

  it('drops detections outside the window', () => {
    const clusters = clusterDetections([detection('silence', 3100, 50), silence], window)
    expect(clusters).toHaveLength(1)
    expect(clusters[0].members).toEqual([silence])
  })

  it('breaks score ties in favour of black frames', () => {
    const best = pickBestCluster(
      clusterDetections([detection('silence', 3300, 40), detection('black_frame', 3600, 40)], window)
    )
    expect(best?.kinds).toEqual(['black_frame'])
  })

  it('returns nothing for an empty window', () => {
    expect(pickBestCluster(clusterDetections([], window))).toBeNull()
  })
})

describe('speechFactor', () => {
  it('boosts cuts shortly after a phrase', () => {
    expect(speechFactor(100, [80])).toBe(1.2)
  })

  it('penalises cuts long after the last phrase', () => {
    expect(speechFactor(100, [30])).toBe(0.5)
  })

  it('is neutral in between or without an earlier phrase', () => {
    expect(speechFactor(100, [50])).toBe(1)
    expect(speechFactor(100, [120])).toBe(1)
    expect(speechFactor(100, [])).toBe(1)
  })
})

describe('boundaryFromCluster', () => {
  it('adds the black+silence bonus to the confidence', () => {
    const [cluster] = clusterDetections(
      [detection('silence', 3478, 30), detection('black_frame', 3479, 15)],
      window
    )
    const score = (45 * 1.5) / 1.1
    expect(clusterConfidence(cluster)).toBeCloseTo(score / (score + 50) + 0.1, 9)

    const boundary = boundaryFromCluster(0, cluster)
    expect(boundary.source).toBe('cluster')
    expect(boundary.notes).toEqual(['cluster kinds=black_frame,silence score=61.36'])
  })

  it('caps the confidence', () => {
    const [cluster] = clusterDetections([detection('silence', 3400, 5000)], window)
    expect(clusterConfidence(cluster)).toBe(0.95)
  })
})
