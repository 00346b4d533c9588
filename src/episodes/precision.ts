import { type SignalRegion, type TimeRange, sampleTimestamps } from '../media/sampler.js'
import { formatFields } from '../run/log.js'
import type { FrameClassification } from '../services/types.js'
import { boundaryFromCluster, clusterDetections, pickBestCluster } from './cluster.js'
import {
  type DetectionContext,
  clusteringDetectorKinds,
  collectWindowDetections,
} from './detectors/index.js'
import { type ClassifiedFrame, classifyFrameAt, findCreditsTransitions } from './detectors/vision.js'
import { ConfigurationError, NoDetectionError, describeError } from './errors.js'
import {
  type BoundaryPattern,
  type PatternDetection,
  buildPatternBlocks,
  matchBoundaryPattern,
} from './pattern.js'
import type {
  BoundarySource,
  EpisodeBoundary,
  RawDetection,
  SearchWindow,
  WindowResolution,
} from './types.js'

const LOGO_CONFIDENCE = 0.9
const CREDITS_CONFIDENCE = 0.8
const PATTERN_CONFIDENCE = 0.9
const MAX_CONFIDENCE = 0.95
const NORMAL_FALLBACK_HALF_WIDTH_SECONDS = 300
const BLACK_REFINE_SEARCH_SECONDS = 4
const BLACK_REFINE_SNAP_SECONDS = 2
const BLACK_REFINE_MIN_DURATION_SECONDS = 0.5
const BLACK_REFINE_BONUS = 0.05

const UNCLASSIFIED: FrameClassification = { credits: false, logo: false, outro: false, titleCard: false }

/** Seconds every later window is shifted by, from boundaries resolved so far. */
export type DriftState = {
  offsetSeconds: number
}

export const INITIAL_DRIFT: DriftState = { offsetSeconds: 0 }

function clampToDuration(value: number, durationSeconds: number): number {
  return Math.min(Math.max(value, 0), durationSeconds)
}

export function applyDrift(window: SearchWindow, drift: DriftState, durationSeconds: number): SearchWindow {
  const offset = drift.offsetSeconds
  return {
    ...window,
    center: window.center + offset,
    start: clampToDuration(window.start + offset, durationSeconds),
    end: clampToDuration(window.end + offset, durationSeconds),
  }
}

export function accumulateDrift(drift: DriftState, shiftedCenter: number, observed: number): DriftState {
  return { offsetSeconds: drift.offsetSeconds + observed - shiftedCenter }
}

export type PrecisionCandidate = {
  timestamp: number
  source: BoundarySource
  confidence: number
  note: string
}

type Clump = { frames: ClassifiedFrame[] }

function groupLogoClumps(logoFrames: ClassifiedFrame[], bufferSeconds: number): Clump[] {
  const clumps: Clump[] = []
  for (const frame of logoFrames) {
    const current = clumps[clumps.length - 1]
    const last = current?.frames[current.frames.length - 1]
    if (current && last && frame.timestamp - last.timestamp <= bufferSeconds) {
      current.frames.push(frame)
    } else {
      clumps.push({ frames: [frame] })
    }
  }
  return clumps
}

/** Midpoint between the clump's last logo frame and the frame sampled after it. */
function resolveClump(clump: Clump, frames: ClassifiedFrame[]): number {
  const lastLogo = clump.frames[clump.frames.length - 1]
  const index = frames.indexOf(lastLogo)
  const next = index >= 0 ? frames[index + 1] : undefined
  return next ? (lastLogo.timestamp + next.timestamp) / 2 : lastLogo.timestamp
}

/**
 * Logo and credits frames decide the boundary. After a credits run only the
 * logos shown up to its end count, and the last clump of those wins; without a
 * credits run the first logo clump wins.
 */
export function pickPrecisionCandidate(
  frames: ClassifiedFrame[],
  {
    groupingBufferSeconds,
    postCreditsBufferSeconds,
    minCreditsFrames,
  }: { groupingBufferSeconds: number; postCreditsBufferSeconds: number; minCreditsFrames: number }
): PrecisionCandidate | null {
  if (frames.length === 0) return null
  const transition = findCreditsTransitions(frames, minCreditsFrames)[0]
  if (transition) {
    const transitionAt = (transition.lastCredits.timestamp + transition.next.timestamp) / 2
    const logos = frames.filter((frame) => frame.classification.logo && frame.timestamp <= transitionAt)
    const clumps = groupLogoClumps(logos, groupingBufferSeconds)
    const lastClump = clumps[clumps.length - 1]
    if (lastClump) {
      return {
        timestamp: resolveClump(lastClump, frames),
        source: 'logo',
        confidence: LOGO_CONFIDENCE,
        note: `logo before credits ending at ${transitionAt.toFixed(1)}s`,
      }
    }
    const lastFrame = frames[frames.length - 1]
    return {
      timestamp: Math.min(transitionAt + postCreditsBufferSeconds, lastFrame.timestamp),
      source: 'credits',
      confidence: CREDITS_CONFIDENCE,
      note: `credits ended at ${transitionAt.toFixed(1)}s (${transition.runLength} frames)`,
    }
  }

  const logos = frames.filter((frame) => frame.classification.logo)
  const firstClump = groupLogoClumps(logos, groupingBufferSeconds)[0]
  if (!firstClump) return null
  return {
    timestamp: resolveClump(firstClump, frames),
    source: 'logo',
    confidence: LOGO_CONFIDENCE,
    note: `first logo clump (${firstClump.frames.length} frames)`,
  }
}

export function patternDetectionsFromFrames(frames: ClassifiedFrame[]): PatternDetection[] {
  const detections: PatternDetection[] = []
  for (const frame of frames) {
    if (frame.classification.credits) detections.push({ timestamp: frame.timestamp, kind: 'credits' })
    if (frame.classification.logo) detections.push({ timestamp: frame.timestamp, kind: 'logo' })
  }
  return detections
}

export function pickPatternCandidate(
  frames: ClassifiedFrame[],
  pattern: BoundaryPattern,
  groupingBufferSeconds: number
): PrecisionCandidate | null {
  const blocks = buildPatternBlocks(patternDetectionsFromFrames(frames), pattern, groupingBufferSeconds)
  const match = matchBoundaryPattern(blocks, pattern)
  if (!match) return null
  return {
    timestamp: match.timestamp,
    source: 'pattern',
    confidence: PATTERN_CONFIDENCE,
    note: `pattern ${pattern.source} ${match.complete ? 'matched' : 'partially matched'} ${match.matchedBlocks}/${blocks.length} blocks, split after ${match.splitIndex}`,
  }
}

/**
 * Classifies every sampled frame of the range. A frame whose classification
 * fails is kept as unclassified so the frames around it still count.
 */
async function classifyRange(
  range: TimeRange,
  windowIndex: number,
  context: DetectionContext
): Promise<ClassifiedFrame[]> {
  const interval = context.settings.precision.sampleIntervalSeconds
  const frames: ClassifiedFrame[] = []
  for (const timestamp of sampleTimestamps(range, interval)) {
    try {
      const classification = await classifyFrameAt(context, timestamp, windowIndex)
      frames.push({ timestamp, interval, classification })
    } catch (error) {
      if (error instanceof ConfigurationError) throw error
      const line = formatFields({
        window: windowIndex + 1,
        detector: 'vision',
        timestamp,
        reason: describeError(error),
      })
      context.log(line)
      context.warn(line)
      frames.push({ timestamp, interval, classification: UNCLASSIFIED })
    }
  }
  return frames
}

/** Snaps a candidate onto the middle of a nearby black region. */
export async function refineWithBlackFrames(
  boundary: EpisodeBoundary,
  context: DetectionContext,
  durationSeconds: number
): Promise<EpisodeBoundary> {
  const t = boundary.timestamp
  const range = {
    start: clampToDuration(t - BLACK_REFINE_SEARCH_SECONDS, durationSeconds),
    end: clampToDuration(t + BLACK_REFINE_SEARCH_SECONDS, durationSeconds),
  }
  let regions: SignalRegion[]
  try {
    regions = await context.sampler.blacks(range, {
      ...context.settings.blackFrame,
      minDurationSeconds: BLACK_REFINE_MIN_DURATION_SECONDS,
    })
  } catch (error) {
    context.log(
      formatFields({ window: boundary.windowIndex + 1, detector: 'black_frame', reason: describeError(error) })
    )
    return boundary
  }
  let nearest: number | null = null
  for (const region of regions) {
    if (region.duration < BLACK_REFINE_MIN_DURATION_SECONDS) continue
    const middle = (region.start + region.end) / 2
    if (nearest == null || Math.abs(middle - t) < Math.abs(nearest - t)) nearest = middle
  }
  if (nearest == null || Math.abs(nearest - t) > BLACK_REFINE_SNAP_SECONDS) return boundary
  return {
    ...boundary,
    timestamp: nearest,
    confidence: Math.min(MAX_CONFIDENCE, boundary.confidence + BLACK_REFINE_BONUS),
    notes: [...boundary.notes, `snapped to black frame at ${nearest.toFixed(2)}s`],
  }
}

function boundaryFromCandidate(
  windowIndex: number,
  candidate: PrecisionCandidate,
  frames: ClassifiedFrame[]
): EpisodeBoundary {
  const evidence: RawDetection[] = []
  for (const frame of frames) {
    if (frame.classification.logo) {
      evidence.push({ timestamp: frame.timestamp, score: frame.interval, kind: 'llm_logo', metadata: {} })
    }
    if (frame.classification.credits) {
      evidence.push({ timestamp: frame.timestamp, score: frame.interval, kind: 'llm_credits', metadata: {} })
    }
  }
  return {
    windowIndex,
    timestamp: candidate.timestamp,
    confidence: candidate.confidence,
    source: candidate.source,
    standalone: false,
    evidence,
    confirmations: [],
    notes: [candidate.note],
  }
}

function uncoveredRanges(outer: TimeRange, covered: TimeRange): TimeRange[] {
  const ranges: TimeRange[] = []
  if (covered.start > outer.start) ranges.push({ start: outer.start, end: Math.min(covered.start, outer.end) })
  if (covered.end < outer.end) ranges.push({ start: Math.max(covered.end, outer.start), end: outer.end })
  return ranges.filter((range) => range.end > range.start)
}

async function normalDetectionFallback(
  window: SearchWindow,
  covered: TimeRange,
  context: DetectionContext,
  durationSeconds: number
): Promise<EpisodeBoundary | null> {
  const outer = {
    start: clampToDuration(window.center - NORMAL_FALLBACK_HALF_WIDTH_SECONDS, durationSeconds),
    end: clampToDuration(window.center + NORMAL_FALLBACK_HALF_WIDTH_SECONDS, durationSeconds),
  }
  const kinds = clusteringDetectorKinds(context.settings.detectors)
  const detections: RawDetection[] = []
  for (const range of uncoveredRanges(outer, covered)) {
    const subWindow: SearchWindow = { ...window, start: range.start, end: range.end }
    detections.push(...(await collectWindowDetections(subWindow, context, kinds)))
  }
  const best = pickBestCluster(
    clusterDetections(detections, outer, { toleranceSeconds: context.settings.clusterToleranceSeconds })
  )
  if (!best) return null
  const boundary = boundaryFromCluster(window.index, best)
  return { ...boundary, source: 'fallback', notes: [...boundary.notes, 'normal detection fallback'] }
}

async function resolvePrecisionWindow(
  window: SearchWindow,
  context: DetectionContext,
  durationSeconds: number
): Promise<EpisodeBoundary | null> {
  const { precision, vision } = context.settings
  const selection = {
    groupingBufferSeconds: precision.groupingBufferSeconds,
    postCreditsBufferSeconds: precision.postCreditsBufferSeconds,
    minCreditsFrames: vision.minCreditsFrames,
  }

  const frames = await classifyRange(window, window.index, context)
  if (precision.pattern) {
    const candidate = pickPatternCandidate(frames, precision.pattern, precision.groupingBufferSeconds)
    if (!candidate) {
      throw new NoDetectionError(
        `Pattern ${precision.pattern.source} did not match in window ${window.index + 1}`,
        window.index
      )
    }
    return boundaryFromCandidate(window.index, candidate, frames)
  }

  const direct = pickPrecisionCandidate(frames, selection)
  if (direct) return boundaryFromCandidate(window.index, direct, frames)

  const backward = {
    start: clampToDuration(window.start - precision.expansionSeconds, durationSeconds),
    end: window.start,
  }
  const forward = {
    start: window.end,
    end: clampToDuration(window.end + precision.expansionSeconds, durationSeconds),
  }
  for (const [label, range] of [
    ['backward', backward],
    ['forward', forward],
  ] as const) {
    if (range.end <= range.start) continue
    context.log(formatFields({ window: window.index + 1, fallback: label, start: range.start, end: range.end }))
    const expandedFrames = await classifyRange(range, window.index, context)
    const candidate = pickPrecisionCandidate(expandedFrames, selection)
    if (candidate) {
      const boundary = boundaryFromCandidate(window.index, candidate, expandedFrames)
      return { ...boundary, notes: [...boundary.notes, `expanded ${label}`] }
    }
  }

  context.log(formatFields({ window: window.index + 1, fallback: 'normal-detection' }))
  return normalDetectionFallback(window, { start: backward.start, end: forward.end }, context, durationSeconds)
}

/**
 * Resolves windows one after another. Each resolved boundary moves every later
 * window by the error observed so far; an unresolved window leaves it as is.
 */
export async function runPrecisionSequence({
  windows,
  context,
  durationSeconds,
  onWindowDone,
}: {
  windows: SearchWindow[]
  context: DetectionContext
  durationSeconds: number
  onWindowDone?: ((completed: number, total: number) => void) | null
}): Promise<WindowResolution[]> {
  const { settings } = context
  const resolutions: WindowResolution[] = []
  let drift = INITIAL_DRIFT

  for (const [i, planned] of windows.entries()) {
    const window = applyDrift(planned, drift, durationSeconds)
    context.log(
      formatFields({
        window: window.index + 1,
        center: window.center,
        start: window.start,
        end: window.end,
        drift: drift.offsetSeconds,
      })
    )
    let boundary = await resolvePrecisionWindow(window, context, durationSeconds)
    if (boundary && settings.precision.blackFrameRefine) {
      boundary = await refineWithBlackFrames(boundary, context, durationSeconds)
    }

    if (boundary) {
      drift = accumulateDrift(drift, window.center, boundary.timestamp)
      resolutions.push({ window, boundary, reason: null })
    } else {
      const reason = `no logo, credits or fallback detection in window ${window.index + 1}`
      if (settings.policy === 'strict') throw new NoDetectionError(reason, window.index)
      resolutions.push({ window, boundary: null, reason })
    }
    onWindowDone?.(i + 1, windows.length)
  }
  return resolutions
}
