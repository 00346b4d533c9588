import {
  OSC_PROGRESS_BEL,
  OSC_PROGRESS_PREFIX,
  OSC_PROGRESS_ST,
  type OscProgressOptions,
  sanitizeLabel,
  supportsOscProgress,
} from 'osc-progress'

import type { SplitProgress, SplitProgressPhase } from '../episodes/types.js'

export type OscProgressController = {
  setIndeterminate: (label: string) => void
  setPercent: (label: string, percent: number) => void
  clear: () => void
}

// Share of the whole run each phase occupies, as [from, to] percent.
const PHASE_SPANS: Record<SplitProgressPhase, [number, number]> = {
  probe: [0, 5],
  runtime: [5, 10],
  windows: [10, 15],
  detect: [15, 80],
  confirm: [80, 85],
  extract: [85, 100],
}

export function splitProgressPercent(progress: SplitProgress): number {
  const [from, to] = PHASE_SPANS[progress.phase]
  const fraction = progress.total > 0 ? Math.min(1, Math.max(0, progress.completed / progress.total)) : 0
  return from + (to - from) * fraction
}

/**
 * OSC 9;4 terminal progress: state 3 is indeterminate, 1 a percentage and 0
 * clears the indicator.
 */
export function createOscProgressController(options: OscProgressOptions): OscProgressController {
  const write = options.write ?? ((text) => process.stderr.write(text))
  if (!supportsOscProgress(options.env, options.isTty, options)) {
    return { setIndeterminate: () => {}, setPercent: () => {}, clear: () => {} }
  }
  const end = options.terminator === 'bel' ? OSC_PROGRESS_BEL : OSC_PROGRESS_ST

  const send = (state: number, percent: number | null, label: string) => {
    const cleanLabel = sanitizeLabel(label)
    const value = percent == null ? '' : String(Math.max(0, Math.min(100, Math.round(percent))))
    write(`${OSC_PROGRESS_PREFIX}${state};${value};${cleanLabel}${end}`)
  }

  let lastLabel = options.label ?? 'Splitting…'
  return {
    setIndeterminate: (label) => {
      lastLabel = label
      send(3, null, label)
    },
    setPercent: (label, percent) => {
      lastLabel = label
      send(1, percent, label)
    },
    clear: () => {
      send(0, 0, lastLabel)
    },
  }
}
