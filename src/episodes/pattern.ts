import { ConfigurationError } from './errors.js'

export type PatternSymbol = 'credits' | 'logo'
export type PatternToken = PatternSymbol | 'split'

export type BoundaryPattern = {
  source: string
  tokens: PatternToken[]
  /** Symbols the pattern names; detections of other kinds are ignored while matching. */
  symbols: PatternSymbol[]
}

export type PatternDetection = {
  timestamp: number
  kind: PatternSymbol
}

export type PatternBlock = {
  kind: PatternSymbol
  start: number
  end: number
  count: number
}

export type PatternMatch = {
  complete: boolean
  /** Blocks consumed before the split position. */
  splitIndex: number
  matchedBlocks: number
  timestamp: number
}

const TOKEN_LETTERS: Record<string, PatternToken> = {
  c: 'credits',
  l: 'logo',
  s: 'split',
}

/** `c-l-c-s-l` -> credits, logo, credits, split, logo */
export function parseBoundaryPattern(raw: string): BoundaryPattern {
  const source = raw.trim().toLowerCase()
  if (!source) throw new ConfigurationError('Boundary pattern is empty')
  const tokens: PatternToken[] = []
  for (const part of source.split('-')) {
    const letter = part.trim()
    const token = TOKEN_LETTERS[letter]
    if (!token) {
      throw new ConfigurationError(
        `Invalid boundary pattern "${raw}": unknown token "${letter}" (use c, l, s)`
      )
    }
    tokens.push(token)
  }
  const splitCount = tokens.filter((token) => token === 'split').length
  if (splitCount !== 1) {
    throw new ConfigurationError(
      `Invalid boundary pattern "${raw}": expected exactly one "s" split marker`
    )
  }
  const symbols: PatternSymbol[] = []
  for (const token of tokens) {
    if (token !== 'split' && !symbols.includes(token)) symbols.push(token)
  }
  if (symbols.length === 0) {
    throw new ConfigurationError(`Invalid boundary pattern "${raw}": no c or l tokens`)
  }
  return { source, tokens, symbols }
}

/**
 * Merges same-kind detections that sit within `groupingBufferSeconds` of the
 * previous one into a single block. Blocks come back ordered by start time.
 */
export function buildPatternBlocks(
  detections: PatternDetection[],
  pattern: BoundaryPattern,
  groupingBufferSeconds: number
): PatternBlock[] {
  const blocks: PatternBlock[] = []
  for (const symbol of pattern.symbols) {
    const times = detections
      .filter((detection) => detection.kind === symbol)
      .map((detection) => detection.timestamp)
      .sort((a, b) => a - b)
    let current: PatternBlock | null = null
    for (const timestamp of times) {
      if (current && timestamp - current.end <= groupingBufferSeconds) {
        current.end = timestamp
        current.count += 1
        continue
      }
      current = { kind: symbol, start: timestamp, end: timestamp, count: 1 }
      blocks.push(current)
    }
  }
  return blocks.sort((a, b) => a.start - b.start || a.kind.localeCompare(b.kind))
}

/** Split point between blocks[index - 1] and blocks[index]. */
export function splitTimestampBefore(blocks: PatternBlock[], index: number): number | null {
  if (blocks.length === 0) return null
  if (index <= 0) return blocks[0].start
  if (index >= blocks.length) return blocks[blocks.length - 1].end
  return (blocks[index - 1].end + blocks[index].start) / 2
}

/**
 * Matches tokens left to right against consecutive blocks.
 * A full match splits where the split token aligns; a partial match splits at
 * the aligned split when it was reached, otherwise where matching broke.
 */
export function matchBoundaryPattern(
  blocks: PatternBlock[],
  pattern: BoundaryPattern
): PatternMatch | null {
  let blockIndex = 0
  let splitIndex: number | null = null
  let complete = true

  for (const token of pattern.tokens) {
    if (token === 'split') {
      splitIndex = blockIndex
      continue
    }
    const block = blockIndex < blocks.length ? blocks[blockIndex] : null
    if (!block || block.kind !== token) {
      complete = false
      break
    }
    blockIndex += 1
  }

  if (blockIndex === 0) return null
  const resolvedIndex = splitIndex ?? blockIndex
  const timestamp = splitTimestampBefore(blocks, resolvedIndex)
  if (timestamp == null) return null
  return { complete, splitIndex: resolvedIndex, matchedBlocks: blockIndex, timestamp }
}
