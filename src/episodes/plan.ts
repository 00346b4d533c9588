import type { MediaSampler } from '../media/sampler.js'
import { runWithConcurrency } from '../run/concurrency.js'
import { type SplitLog, formatFields, logTiming } from '../run/log.js'
import type { RuntimeMetadataService } from '../services/types.js'
import { type ChapterAnalysis, analyzeChapters, hasMultiEpisodeChapters } from './chapters.js'
import {
  type DetectionContext,
  type DetectorServices,
  clusteringDetectorKinds,
  confirmerDetectorKinds,
  createDetector,
  resolveWindowByClustering,
  runDetectorSafely,
} from './detectors/index.js'
import { DegenerateInputError, describeError } from './errors.js'
import { parseEpisodeFilename } from './filename.js'
import { runPrecisionSequence } from './precision.js'
import { checkRuntimes, resolveBoundaries, standaloneResolution } from './resolve.js'
import type { SplitSettings } from './settings.js'
import type {
  Chapter,
  CutPlan,
  EpisodeBoundary,
  ParsedFilename,
  RuntimeMetadata,
  SearchWindow,
  SourceFile,
  SplitHooks,
  SplitProgressPhase,
  WindowResolution,
} from './types.js'
import { type WindowGeometry, determineSearchWindows } from './windows.js'

export type PlanDependencies = {
  probe: (filePath: string) => Promise<{ durationSeconds: number; chapters: Chapter[] }>
  sampler: MediaSampler
  services: DetectorServices
  runtime: RuntimeMetadataService | null
  log: SplitLog
}

function expectedEpisodeCount(parsed: ParsedFilename, analysis: ChapterAnalysis): number {
  if (parsed.episodeCount != null && parsed.episodeCount > 0) return parsed.episodeCount
  if (hasMultiEpisodeChapters(analysis)) return analysis.episodeChapters.length
  throw new DegenerateInputError(
    `Cannot tell how many episodes ${parsed.originalFilename} holds: no episode range in the filename and no episode chapters`
  )
}

async function lookupRuntimes({
  parsed,
  episodeCount,
  settings,
  service,
  warn,
}: {
  parsed: ParsedFilename
  episodeCount: number
  settings: SplitSettings
  service: RuntimeMetadataService | null
  warn: (message: string) => void
}): Promise<RuntimeMetadata | null> {
  if (!settings.runtimeMetadata) return null
  const required = settings.mode === 'precision'
  const fail = (message: string): null => {
    if (required) throw new DegenerateInputError(`Precision mode: ${message}`)
    warn(message)
    return null
  }

  if (!service) return fail('no runtime metadata service is configured')
  if (parsed.season == null || parsed.startEpisode == null) {
    return fail(`cannot look up runtimes without season and episode numbers in ${parsed.originalFilename}`)
  }
  let metadata: RuntimeMetadata | null
  try {
    metadata = await service.lookup({
      title: parsed.title,
      season: parsed.season,
      startEpisode: parsed.startEpisode,
      episodeCount,
    })
  } catch (error) {
    return fail(`runtime lookup failed: ${describeError(error)}`)
  }
  if (!metadata) return fail(`no series found for "${parsed.title}"`)
  const withRuntime = metadata.episodes.filter((episode) => episode.runtimeMinutes != null)
  if (withRuntime.length < episodeCount) {
    return fail(
      `${metadata.seriesName} lists runtimes for ${withRuntime.length} of ${episodeCount} episodes`
    )
  }
  return metadata
}

async function confirmStarts({
  boundaries,
  context,
  durationSeconds,
}: {
  boundaries: EpisodeBoundary[]
  context: DetectionContext
  durationSeconds: number
}): Promise<EpisodeBoundary[]> {
  const kinds = confirmerDetectorKinds(context.settings.detectors)
  if (kinds.length === 0) return boundaries
  const confirmed: EpisodeBoundary[] = []
  for (const boundary of boundaries) {
    const startWindow: SearchWindow = {
      index: boundary.windowIndex,
      center: boundary.timestamp,
      start: boundary.timestamp,
      end: Math.min(durationSeconds, boundary.timestamp + context.settings.intro.scanSeconds),
      source: 'runtime',
      confidence: boundary.confidence,
      episodeBefore: boundary.windowIndex + 1,
      episodeAfter: boundary.windowIndex + 2,
      commercialMarker: null,
    }
    const confirmations = [...boundary.confirmations]
    for (const kind of kinds) {
      confirmations.push(...(await runDetectorSafely(createDetector(kind), startWindow, context)))
    }
    confirmed.push({ ...boundary, confirmations })
  }
  return confirmed
}

/**
 * One run per source file: probe, count, place windows, detect, resolve.
 * Nothing is written; the returned plan is what the splitter executes.
 */
export async function planEpisodeSplit({
  filePath,
  settings,
  deps,
  hooks = {},
}: {
  filePath: string
  settings: SplitSettings
  deps: PlanDependencies
  hooks?: SplitHooks
}): Promise<CutPlan> {
  const { log } = deps
  const warnings: string[] = []
  const warn = (message: string) => {
    warnings.push(message)
    log(`warning ${formatFields({ reason: message })}`)
  }
  const progress = (phase: SplitProgressPhase, completed: number, total: number, label: string) => {
    hooks.onProgress?.({ phase, completed, total, label })
  }
  const startedAt = Date.now()

  progress('probe', 0, 1, 'probing')
  const probed = await deps.probe(filePath)
  const parsed = parseEpisodeFilename(filePath)
  const source: SourceFile = {
    path: filePath,
    durationSeconds: probed.durationSeconds,
    chapters: probed.chapters,
    parsed,
  }
  progress('probe', 1, 1, 'probed')
  log(
    formatFields({
      file: parsed.originalFilename,
      durationSeconds: source.durationSeconds,
      chapters: source.chapters.length,
      mode: settings.mode,
    })
  )

  const analysis = analyzeChapters(source.chapters, settings)
  log(formatFields({ chapters: analysis.isEpisodeStructure ? 'episodes' : 'other', reason: analysis.reason }))
  const episodeCount = expectedEpisodeCount(parsed, analysis)

  const geometry: WindowGeometry =
    settings.mode === 'precision'
      ? { kind: 'precision', shape: settings.precision.window }
      : { kind: 'normal', halfWidthSeconds: settings.windowSeconds }
  // Equal division first: a file too short for its episode count fails here,
  // before any service is asked for runtimes.
  const divided = determineSearchWindows({
    durationSeconds: source.durationSeconds,
    episodeCount,
    chapters: analysis,
    runtime: null,
    geometry,
  })

  progress('runtime', 0, 1, 'runtime lookup')
  const runtime = await lookupRuntimes({
    parsed,
    episodeCount,
    settings,
    service: deps.runtime,
    warn,
  })
  progress('runtime', 1, 1, runtime ? runtime.seriesName : 'no runtime data')

  const windowPlan =
    runtime && divided.kind === 'windows'
      ? determineSearchWindows({
          durationSeconds: source.durationSeconds,
          episodeCount,
          chapters: analysis,
          runtime: {
            runtimesMinutes: runtime.episodes.map((episode) => episode.runtimeMinutes ?? 0),
            commercialSeconds: analysis.commercialSecondsPerEpisode,
          },
          geometry,
        })
      : divided

  const context: DetectionContext = {
    source,
    sampler: deps.sampler,
    services: deps.services,
    settings,
    log,
    warn,
  }

  let resolutions: WindowResolution[]
  if (windowPlan.kind === 'standalone') {
    log(formatFields({ windows: 0, standalone: windowPlan.boundaries.length }))
    resolutions = windowPlan.boundaries.map(standaloneResolution)
  } else {
    const { windows } = windowPlan
    for (const window of windows) {
      log(
        formatFields({
          window: window.index + 1,
          source: window.source,
          center: window.center,
          start: window.start,
          end: window.end,
        })
      )
    }
    progress('windows', windows.length, windows.length, `${windows.length} windows (${windowPlan.source})`)

    if (settings.mode === 'precision') {
      resolutions = await runPrecisionSequence({
        windows,
        context,
        durationSeconds: source.durationSeconds,
        onWindowDone: (completed, total) => progress('detect', completed, total, `window ${completed}/${total}`),
      })
    } else {
      const kinds = clusteringDetectorKinds(settings.detectors)
      resolutions = await runWithConcurrency(
        windows.map((window) => () => resolveWindowByClustering(window, context, kinds)),
        settings.workers,
        (completed, total) => progress('detect', completed, total, `window ${completed}/${total}`)
      )
    }
  }

  const resolved = resolveBoundaries({
    resolutions,
    durationSeconds: source.durationSeconds,
    parsed,
    settings,
  })
  for (const message of resolved.warnings) warn(message)

  progress('confirm', 0, resolved.boundaries.length, 'confirming starts')
  const boundaries = await confirmStarts({
    boundaries: resolved.boundaries,
    context,
    durationSeconds: source.durationSeconds,
  })
  progress('confirm', boundaries.length, boundaries.length, 'confirmed')

  logTiming(log, 'plan', startedAt)
  return {
    source,
    boundaries,
    ranges: resolved.ranges,
    violations: resolved.violations,
    warnings,
    runtimeCheck: runtime ? checkRuntimes(resolved.ranges, runtime.episodes) : null,
  }
}
