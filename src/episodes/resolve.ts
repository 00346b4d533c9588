import { NoDetectionError, OrderingViolationError } from './errors.js'
import { buildEpisodeFilename } from './filename.js'
import type { NoDetectionPolicy, SplitSettings } from './settings.js'
import type {
  ConstraintViolation,
  CutRange,
  EpisodeBoundary,
  ParsedFilename,
  RuntimeCheck,
  RuntimeEpisode,
  WindowResolution,
} from './types.js'

export const BEST_EFFORT_CONFIDENCE = 0.3
const RUNTIME_TOLERANCE = 0.15

export type ResolvedBoundaries = {
  boundaries: EpisodeBoundary[]
  ranges: CutRange[]
  violations: ConstraintViolation[]
  warnings: string[]
}

function minutes(seconds: number): string {
  return (seconds / 60).toFixed(1)
}

/** Wraps an authoritative chapter boundary so it goes through the same checks. */
export function standaloneResolution(boundary: EpisodeBoundary): WindowResolution {
  return {
    window: {
      index: boundary.windowIndex,
      center: boundary.timestamp,
      start: boundary.timestamp,
      end: boundary.timestamp,
      source: 'chapter',
      confidence: boundary.confidence,
      episodeBefore: boundary.windowIndex + 1,
      episodeAfter: boundary.windowIndex + 2,
      commercialMarker: null,
    },
    boundary,
    reason: null,
  }
}

function settleUnresolved(
  resolutions: WindowResolution[],
  policy: NoDetectionPolicy
): { boundaries: EpisodeBoundary[]; warnings: string[] } {
  const boundaries: EpisodeBoundary[] = []
  const warnings: string[] = []
  for (const resolution of resolutions) {
    if (resolution.boundary) {
      boundaries.push(resolution.boundary)
      continue
    }
    const { window } = resolution
    const reason = resolution.reason ?? `no boundary found in window ${window.index + 1}`
    if (policy === 'strict') throw new NoDetectionError(reason, window.index)
    warnings.push(`${reason}; using the window center ${window.center.toFixed(1)}s`)
    boundaries.push({
      windowIndex: window.index,
      timestamp: window.center,
      confidence: BEST_EFFORT_CONFIDENCE,
      source: 'window-center',
      standalone: false,
      evidence: [],
      confirmations: [],
      notes: ['best-effort window center'],
    })
  }
  return { boundaries, warnings }
}

function assertOrdered(boundaries: EpisodeBoundary[], durationSeconds: number): void {
  let previous = 0
  for (const boundary of boundaries) {
    if (boundary.timestamp <= previous || boundary.timestamp >= durationSeconds) {
      throw new OrderingViolationError(
        `Boundary ${boundary.windowIndex + 1} at ${boundary.timestamp.toFixed(1)}s is out of order (previous ${previous.toFixed(1)}s, duration ${durationSeconds.toFixed(1)}s)`,
        boundary.windowIndex
      )
    }
    previous = boundary.timestamp
  }
}

/**
 * Turns one resolution per window into cut ranges. Unresolved windows follow
 * the policy; ordering problems are fatal; episode lengths outside the limits
 * are reported but left as they are.
 */
export function resolveBoundaries({
  resolutions,
  durationSeconds,
  parsed,
  settings,
}: {
  resolutions: WindowResolution[]
  durationSeconds: number
  parsed: ParsedFilename
  settings: Pick<SplitSettings, 'policy' | 'minEpisodeSeconds' | 'maxEpisodeSeconds' | 'naming'>
}): ResolvedBoundaries {
  const ordered = [...resolutions].sort((a, b) => a.window.index - b.window.index)
  const { boundaries, warnings } = settleUnresolved(ordered, settings.policy)
  assertOrdered(boundaries, durationSeconds)

  const cuts = [0, ...boundaries.map((boundary) => boundary.timestamp), durationSeconds]
  const season = parsed.season ?? 1
  const firstEpisode = parsed.startEpisode ?? 1
  const ranges: CutRange[] = []
  const violations: ConstraintViolation[] = []
  for (let index = 0; index < cuts.length - 1; index += 1) {
    const start = cuts[index]
    const end = cuts[index + 1]
    const episode = firstEpisode + index
    ranges.push({
      index,
      start,
      end,
      season,
      episode,
      title: parsed.title,
      filename: buildEpisodeFilename({
        parsed,
        season,
        episode,
        pattern: settings.naming.pattern,
        keepQualityInfo: settings.naming.keepQualityInfo,
      }),
    })

    const length = end - start
    if (length < settings.minEpisodeSeconds) {
      violations.push({
        rangeIndex: index,
        durationSeconds: length,
        limit: 'min',
        limitSeconds: settings.minEpisodeSeconds,
      })
      warnings.push(
        `Episode ${episode} is ${minutes(length)} min, shorter than the ${minutes(settings.minEpisodeSeconds)} min minimum`
      )
    } else if (length > settings.maxEpisodeSeconds) {
      violations.push({
        rangeIndex: index,
        durationSeconds: length,
        limit: 'max',
        limitSeconds: settings.maxEpisodeSeconds,
      })
      warnings.push(
        `Episode ${episode} is ${minutes(length)} min, longer than the ${minutes(settings.maxEpisodeSeconds)} min maximum`
      )
    }
  }

  return { boundaries, ranges, violations, warnings }
}

/** Compares each cut with the listed runtime; a report only, nothing is moved. */
export function checkRuntimes(ranges: CutRange[], episodes: RuntimeEpisode[]): RuntimeCheck | null {
  const deviations: number[] = []
  let matched = 0
  for (const range of ranges) {
    const listed = episodes.find((episode) => episode.episode === range.episode)
    if (!listed?.runtimeMinutes) continue
    const expected = listed.runtimeMinutes * 60
    const deviation = Math.abs(range.end - range.start - expected) / expected
    deviations.push(deviation)
    if (deviation <= RUNTIME_TOLERANCE) matched += 1
  }
  const compared = deviations.length
  if (compared === 0) return null
  const ratio = matched / compared
  const verdict = ratio >= 0.8 ? 'good' : ratio >= 0.5 ? 'partial' : 'poor'
  return { verdict, matched, compared, deviations }
}
