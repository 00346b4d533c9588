import { ConfigurationError, TransientServiceError, describeError } from '../episodes/errors.js'

export type RetryOptions = {
  attempts: number
  timeoutMs: number
  baseDelayMs?: number
  factor?: number
  label: string
  onRetry?: ((attempt: number, error: unknown) => void) | null
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms)
  })
}

async function runAttempt<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new TransientServiceError(`${label} timed out after ${timeoutMs}ms`))
    }, timeoutMs)
  })
  try {
    // The race keeps a call that ignores the abort signal from hanging the run.
    return await Promise.race([operation(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Calls a service a bounded number of times, each attempt under its own timeout.
 * Throws TransientServiceError once every attempt has failed; a
 * ConfigurationError is rethrown without another attempt.
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  { attempts, timeoutMs, baseDelayMs = 250, factor = 2, label, onRetry }: RetryOptions
): Promise<T> {
  const total = Math.max(1, Math.round(attempts))
  let lastError: unknown = null

  for (let attempt = 1; attempt <= total; attempt += 1) {
    try {
      return await runAttempt(operation, timeoutMs, label)
    } catch (error) {
      if (error instanceof ConfigurationError) throw error
      lastError = error
      if (attempt === total) break
      onRetry?.(attempt, error)
      const delayMs = baseDelayMs * factor ** (attempt - 1)
      if (delayMs > 0) await sleep(delayMs)
    }
  }

  throw new TransientServiceError(
    `${label} failed after ${total} attempts: ${describeError(lastError)}`,
    { cause: lastError }
  )
}
