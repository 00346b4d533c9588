import type { ChapterAnalysis } from './chapters.js'
import { DegenerateInputError } from './errors.js'
import type { PrecisionWindowShape } from './settings.js'
import type { EpisodeBoundary, SearchWindow, WindowSource } from './types.js'

export const CHAPTER_BOUNDARY_CONFIDENCE = 0.95
const DISCREPANCY_TOLERANCE_SECONDS = 1

export type WindowGeometry =
  | { kind: 'normal'; halfWidthSeconds: number }
  | { kind: 'precision'; shape: PrecisionWindowShape }

export type RuntimeWindowInput = {
  runtimesMinutes: number[]
  /** Known commercial time per episode (seconds), from chapter markers. */
  commercialSeconds: number[] | null
}

export type WindowPlan =
  | { kind: 'standalone'; boundaries: EpisodeBoundary[]; episodeCount: number }
  | { kind: 'windows'; windows: SearchWindow[]; source: WindowSource }

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min
  if (value > max) return max
  return value
}

function extentFor(geometry: WindowGeometry): { before: number; after: number } {
  if (geometry.kind === 'normal') {
    return { before: geometry.halfWidthSeconds, after: geometry.halfWidthSeconds }
  }
  return geometry.shape === 'asymmetric' ? { before: 180, after: 60 } : { before: 120, after: 120 }
}

function buildWindow({
  index,
  center,
  durationSeconds,
  geometry,
  source,
  confidence,
}: {
  index: number
  center: number
  durationSeconds: number
  geometry: WindowGeometry
  source: WindowSource
  confidence: number
}): SearchWindow {
  const extent = extentFor(geometry)
  return {
    index,
    center,
    start: clamp(center - extent.before, 0, durationSeconds),
    end: clamp(center + extent.after, 0, durationSeconds),
    source,
    confidence,
    episodeBefore: index + 1,
    episodeAfter: index + 2,
    commercialMarker: null,
  }
}

/**
 * Episode totals (runtime + commercial time) scaled so they add up to the file
 * duration whenever they disagree by more than a second.
 */
export function computeEpisodeTotals({
  durationSeconds,
  episodeCount,
  runtimesMinutes,
  commercialSeconds,
}: {
  durationSeconds: number
  episodeCount: number
  runtimesMinutes: number[]
  commercialSeconds: number[] | null
}): { totals: number[]; actualCommercials: boolean } {
  const runtimes = runtimesMinutes.slice(0, episodeCount).map((minutes) => minutes * 60)
  const content = runtimes.reduce((sum, value) => sum + value, 0)
  const actualCommercials = commercialSeconds != null && commercialSeconds.length >= episodeCount
  const commercials =
    commercialSeconds != null && actualCommercials
      ? commercialSeconds.slice(0, episodeCount)
      : runtimes.map(() => Math.max(0, durationSeconds - content) / episodeCount)

  const totals = runtimes.map((runtime, i) => runtime + commercials[i])
  const calculated = totals.reduce((sum, value) => sum + value, 0)
  const discrepancy = durationSeconds - calculated
  if (Math.abs(discrepancy) > DISCREPANCY_TOLERANCE_SECONDS && calculated > 0) {
    return {
      totals: totals.map((total) => total + discrepancy * (total / calculated)),
      actualCommercials,
    }
  }
  return { totals, actualCommercials }
}

export function assertWindowsUsable(windows: SearchWindow[], durationSeconds: number): void {
  for (let i = 0; i < windows.length; i += 1) {
    const window = windows[i]
    if (window.center <= 0 || window.center >= durationSeconds) {
      throw new DegenerateInputError(
        `Degenerate window ${i + 1}: center ${window.center.toFixed(1)}s lies outside the ${durationSeconds.toFixed(1)}s file`
      )
    }
    if (i === 0) continue
    const previous = windows[i - 1]
    if (window.center <= previous.center) {
      throw new DegenerateInputError(
        `Degenerate window ${i + 1}: center ${window.center.toFixed(1)}s does not follow ${previous.center.toFixed(1)}s`
      )
    }
    if (previous.end > window.start) {
      throw new DegenerateInputError(
        `Degenerate windows ${i} and ${i + 1}: file too short for the expected episode count`
      )
    }
  }
}

function standaloneFromChapters(analysis: ChapterAnalysis): EpisodeBoundary[] {
  const chapters = [...analysis.episodeChapters].sort((a, b) => a.start - b.start)
  return chapters.slice(1).map((chapter, index) => ({
    windowIndex: index,
    timestamp: chapter.start,
    confidence: CHAPTER_BOUNDARY_CONFIDENCE,
    source: 'chapter',
    standalone: true,
    evidence: [
      {
        timestamp: chapter.start,
        score: 100,
        kind: 'chapter',
        metadata: { title: chapter.title },
      },
    ],
    confirmations: [],
    notes: [`chapter "${chapter.title}"`],
  }))
}

/**
 * Anchors each window to the matching "Commercial 1" marker: the boundary sits
 * before the next episode's first break.
 */
export function refineWithCommercialMarkers(
  windows: SearchWindow[],
  markers: number[],
  halfWidthSeconds: number,
  durationSeconds: number
): SearchWindow[] {
  if (markers.length < windows.length) return windows
  return windows.map((window, i) => {
    const marker = markers[i]
    return {
      ...window,
      start: clamp(marker - halfWidthSeconds * 2, 0, durationSeconds),
      end: clamp(marker, 0, durationSeconds),
      center: marker - halfWidthSeconds / 2,
      confidence: Math.min(window.confidence + 0.1, 0.95),
      commercialMarker: marker,
    }
  })
}

/**
 * Picks where to look for each internal boundary: episode chapters are used
 * as-is, then runtime metadata, then equal division.
 */
export function determineSearchWindows({
  durationSeconds,
  episodeCount,
  chapters,
  runtime,
  geometry,
}: {
  durationSeconds: number
  episodeCount: number
  chapters: ChapterAnalysis | null
  runtime: RuntimeWindowInput | null
  geometry: WindowGeometry
}): WindowPlan {
  if (chapters && chapters.isEpisodeStructure && chapters.episodeChapters.length >= 2) {
    return {
      kind: 'standalone',
      boundaries: standaloneFromChapters(chapters),
      episodeCount: chapters.episodeChapters.length,
    }
  }

  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new DegenerateInputError('Source duration is unknown')
  }
  if (episodeCount < 2) {
    throw new DegenerateInputError(
      `Expected at least 2 episodes to split, got ${episodeCount}`
    )
  }

  let windows: SearchWindow[]
  let source: WindowSource
  const runtimes = runtime?.runtimesMinutes.filter((minutes) => minutes > 0) ?? []
  if (runtime && runtimes.length >= episodeCount) {
    const { totals, actualCommercials } = computeEpisodeTotals({
      durationSeconds,
      episodeCount,
      runtimesMinutes: runtimes,
      commercialSeconds: runtime.commercialSeconds,
    })
    let cumulative = 0
    windows = []
    for (let i = 0; i < episodeCount - 1; i += 1) {
      cumulative += totals[i]
      windows.push(
        buildWindow({
          index: i,
          center: cumulative,
          durationSeconds,
          geometry,
          source: 'runtime',
          confidence: actualCommercials ? 0.85 : 0.8,
        })
      )
    }
    source = 'runtime'
  } else {
    const nominal = durationSeconds / episodeCount
    windows = Array.from({ length: episodeCount - 1 }, (_, i) =>
      buildWindow({
        index: i,
        center: nominal * (i + 1),
        durationSeconds,
        geometry,
        source: 'equal-division',
        confidence: 0.5,
      })
    )
    source = 'equal-division'
  }

  if (geometry.kind === 'normal' && chapters) {
    windows = refineWithCommercialMarkers(
      windows,
      chapters.commercialMarkers,
      geometry.halfWidthSeconds,
      durationSeconds
    )
  }

  assertWindowsUsable(windows, durationSeconds)
  return { kind: 'windows', windows, source }
}
