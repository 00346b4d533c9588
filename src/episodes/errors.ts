export type SplitErrorKind =
  | 'configuration'
  | 'degenerate-input'
  | 'transient-service'
  | 'no-detection'
  | 'ordering'
  | 'constraint-violation'

export class SplitError extends Error {
  readonly kind: SplitErrorKind
  readonly windowIndex: number | null
  readonly detector: string | null

  constructor(
    kind: SplitErrorKind,
    message: string,
    {
      windowIndex = null,
      detector = null,
      cause,
    }: { windowIndex?: number | null; detector?: string | null; cause?: unknown } = {}
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'SplitError'
    this.kind = kind
    this.windowIndex = windowIndex
    this.detector = detector
  }
}

export class ConfigurationError extends SplitError {
  constructor(message: string) {
    super('configuration', message)
    this.name = 'ConfigurationError'
  }
}

export class DegenerateInputError extends SplitError {
  constructor(message: string) {
    super('degenerate-input', message)
    this.name = 'DegenerateInputError'
  }
}

export class TransientServiceError extends SplitError {
  constructor(message: string, options: { detector?: string | null; cause?: unknown } = {}) {
    super('transient-service', message, options)
    this.name = 'TransientServiceError'
  }
}

export class NoDetectionError extends SplitError {
  constructor(message: string, windowIndex: number) {
    super('no-detection', message, { windowIndex })
    this.name = 'NoDetectionError'
  }
}

export class OrderingViolationError extends SplitError {
  constructor(message: string, windowIndex: number) {
    super('ordering', message, { windowIndex })
    this.name = 'OrderingViolationError'
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
