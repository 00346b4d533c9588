export type SplitLog = (message: string) => void

export type LogFields = Record<string, string | number | boolean | null | undefined>

const PREFIX = '[episplit]'

export const silentLog: SplitLog = () => {}

export function createSplitLog({
  enabled,
  stream,
}: {
  enabled: boolean
  stream: NodeJS.WritableStream
}): SplitLog {
  if (!enabled) return silentLog
  return (message) => {
    stream.write(`${PREFIX} ${message}\n`)
  }
}

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2)
  }
  if (typeof value === 'string' && /\s/.test(value)) return JSON.stringify(value)
  return String(value)
}

/** `formatFields({ window: 1, reason: 'timed out' })` -> `window=1 reason="timed out"` */
export function formatFields(fields: LogFields): string {
  const parts: string[] = []
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue
    parts.push(`${key}=${formatValue(value)}`)
  }
  return parts.join(' ')
}

export function logTiming(log: SplitLog, label: string, startedAt: number): number {
  const elapsedMs = Date.now() - startedAt
  log(`${label} elapsedMs=${elapsedMs}`)
  return elapsedMs
}
