import { formatFields } from '../../run/log.js'
import { boundaryFromCluster, clusterDetections, pickBestCluster } from '../cluster.js'
import { ConfigurationError, describeError } from '../errors.js'
import type { DetectorSettings } from '../settings.js'
import type { RawDetection, SearchWindow, WindowResolution } from '../types.js'
import { audioFingerprintDetector } from './audio-fingerprint.js'
import { blackFrameDetector } from './black-frame.js'
import { chapterDetector } from './chapter.js'
import { imageHashDetector } from './image-hash.js'
import { sceneChangeDetector } from './scene-change.js'
import { silenceDetector } from './silence.js'
import { speechDetector } from './speech.js'
import type { DetectionContext, DetectorKind, WindowDetector } from './types.js'
import { visionDetector } from './vision.js'

export type { DetectionContext, DetectorKind, DetectorServices, WindowDetector } from './types.js'

export function createDetector(kind: DetectorKind): WindowDetector {
  switch (kind) {
    case 'silence':
      return silenceDetector
    case 'black_frame':
      return blackFrameDetector
    case 'scene_change':
      return sceneChangeDetector
    case 'speech':
      return speechDetector
    case 'vision':
      return visionDetector
    case 'image_hash':
      return imageHashDetector
    case 'audio_fingerprint':
      return audioFingerprintDetector
    case 'chapter':
      return chapterDetector
    default: {
      const unreachable: never = kind
      throw new Error(`Unknown detector: ${String(unreachable)}`)
    }
  }
}

/** Detectors whose output feeds the clusterer, in a fixed order. */
export function clusteringDetectorKinds(detectors: DetectorSettings): DetectorKind[] {
  const kinds: DetectorKind[] = []
  if (detectors.chapter) kinds.push('chapter')
  if (detectors.silence) kinds.push('silence')
  if (detectors.blackFrame) kinds.push('black_frame')
  if (detectors.sceneChange) kinds.push('scene_change')
  if (detectors.speech) kinds.push('speech')
  if (detectors.vision) kinds.push('vision')
  return kinds
}

/** Start confirmers; they never take part in clustering. */
export function confirmerDetectorKinds(detectors: DetectorSettings): DetectorKind[] {
  const kinds: DetectorKind[] = []
  if (detectors.imageHash) kinds.push('image_hash')
  if (detectors.audioFingerprint) kinds.push('audio_fingerprint')
  return kinds
}

/**
 * A failing detector contributes nothing to the window; the failure is logged
 * and kept as a warning. Configuration errors still stop the run.
 */
export async function runDetectorSafely(
  detector: WindowDetector,
  window: SearchWindow,
  context: DetectionContext
): Promise<RawDetection[]> {
  try {
    return await detector.detect(window, context)
  } catch (error) {
    if (error instanceof ConfigurationError) throw error
    const line = formatFields({
      window: window.index + 1,
      detector: detector.kind,
      reason: describeError(error),
    })
    context.log(line)
    context.warn(line)
    return []
  }
}

export async function collectWindowDetections(
  window: SearchWindow,
  context: DetectionContext,
  kinds: DetectorKind[]
): Promise<RawDetection[]> {
  const detections: RawDetection[] = []
  for (const kind of kinds) {
    const found = await runDetectorSafely(createDetector(kind), window, context)
    context.log(formatFields({ window: window.index + 1, detector: kind, detections: found.length }))
    detections.push(...found)
  }
  return detections
}

/** Normal mode for one window: all enabled detectors, then the best cluster. */
export async function resolveWindowByClustering(
  window: SearchWindow,
  context: DetectionContext,
  kinds: DetectorKind[]
): Promise<WindowResolution> {
  const detections = await collectWindowDetections(window, context, kinds)
  const clusters = clusterDetections(detections, window, {
    toleranceSeconds: context.settings.clusterToleranceSeconds,
  })
  const best = pickBestCluster(clusters)
  if (!best) {
    return { window, boundary: null, reason: `no detections in window ${window.index + 1}` }
  }
  context.log(
    formatFields({
      window: window.index + 1,
      clusters: clusters.length,
      center: best.center,
      score: best.score,
    })
  )
  return { window, boundary: boundaryFromCluster(window.index, best), reason: null }
}
