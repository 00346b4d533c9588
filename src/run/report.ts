import type { SourceCheck } from '../episodes/check.js'
import type { ExtractedEpisode } from '../episodes/extract.js'
import type { CutPlan, EpisodeBoundary } from '../episodes/types.js'
import { ansi, formatTimestamp } from './terminal.js'

export type PlanJson = {
  file: string
  durationSeconds: number
  boundaries: Array<{
    window: number
    timestamp: number
    confidence: number
    source: EpisodeBoundary['source']
    evidence: string[]
    confirmations: string[]
    notes: string[]
  }>
  episodes: Array<{
    season: number
    episode: number
    start: number
    end: number
    durationSeconds: number
    filename: string
    outputPath: string | null
  }>
  violations: CutPlan['violations']
  warnings: string[]
  runtimeCheck: CutPlan['runtimeCheck']
}

function round(value: number, digits = 3): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

function episodeLabel(season: number, episode: number): string {
  return `S${String(season).padStart(2, '0')}E${String(episode).padStart(2, '0')}`
}

function distinctKinds(boundary: EpisodeBoundary, key: 'evidence' | 'confirmations'): string[] {
  return Array.from(new Set(boundary[key].map((detection) => detection.kind))).sort()
}

export function buildPlanJson(plan: CutPlan, outputs: ExtractedEpisode[] | null = null): PlanJson {
  return {
    file: plan.source.path,
    durationSeconds: round(plan.source.durationSeconds),
    boundaries: plan.boundaries.map((boundary) => ({
      window: boundary.windowIndex + 1,
      timestamp: round(boundary.timestamp),
      confidence: round(boundary.confidence),
      source: boundary.source,
      evidence: distinctKinds(boundary, 'evidence'),
      confirmations: distinctKinds(boundary, 'confirmations'),
      notes: boundary.notes,
    })),
    episodes: plan.ranges.map((range, index) => ({
      season: range.season,
      episode: range.episode,
      start: round(range.start),
      end: round(range.end),
      durationSeconds: round(range.end - range.start),
      filename: range.filename,
      outputPath: outputs?.[index]?.outputPath ?? null,
    })),
    violations: plan.violations,
    warnings: plan.warnings,
    runtimeCheck: plan.runtimeCheck,
  }
}

export function formatPlanReport({
  plan,
  color,
  outputs = null,
}: {
  plan: CutPlan
  color: boolean
  outputs?: ExtractedEpisode[] | null
}): string {
  const lines: string[] = []
  lines.push(
    `${ansi('1', plan.source.parsed.originalFilename, color)}  ${formatTimestamp(plan.source.durationSeconds)}  ${plan.ranges.length} episodes`
  )

  for (const boundary of plan.boundaries) {
    const confirmed = distinctKinds(boundary, 'confirmations')
    const suffix = confirmed.length > 0 ? `  confirmed by ${confirmed.join(', ')}` : ''
    lines.push(
      `  boundary ${boundary.windowIndex + 1}  ${formatTimestamp(boundary.timestamp)}  ${boundary.source}  confidence ${boundary.confidence.toFixed(2)}${suffix}`
    )
  }

  const violating = new Set(plan.violations.map((violation) => violation.rangeIndex))
  for (const [index, range] of plan.ranges.entries()) {
    const minutes = ((range.end - range.start) / 60).toFixed(1)
    const target = outputs?.[index]?.outputPath ?? range.filename
    const label = ansi(violating.has(range.index) ? '31' : '32', episodeLabel(range.season, range.episode), color)
    lines.push(
      `  ${label}  ${formatTimestamp(range.start)} -> ${formatTimestamp(range.end)}  (${minutes} min)  ${target}`
    )
  }

  if (plan.runtimeCheck) {
    const check = plan.runtimeCheck
    lines.push(`  runtime check: ${check.verdict} (${check.matched}/${check.compared} within 15%)`)
  }
  for (const warning of plan.warnings) {
    lines.push(ansi('33', `  warning: ${warning}`, color))
  }
  return `${lines.join('\n')}\n`
}

export function formatCheckReport({
  filePath,
  check,
  color,
}: {
  filePath: string
  check: SourceCheck
  color: boolean
}): string {
  const verdict = check.qualifies ? ansi('32', 'split candidate', color) : ansi('2', 'single episode', color)
  const lines = [`${filePath}: ${verdict}`]
  for (const reason of check.reasons) lines.push(`  - ${reason}`)
  return `${lines.join('\n')}\n`
}
