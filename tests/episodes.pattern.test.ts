import { describe, expect, it } from 'vitest'

import {
  type PatternDetection,
  buildPatternBlocks,
  matchBoundaryPattern,
  parseBoundaryPattern,
} from '../src/episodes/pattern.js'

const at = (kind: PatternDetection['kind'], ...timestamps: number[]): PatternDetection[] =>
  timestamps.map((timestamp) => ({ timestamp, kind }))

describe('boundary patterns', () => {
  it('groups detections into blocks and splits after three of four', () => {
    const pattern = parseBoundaryPattern('c-l-c-s-l')
    const blocks = buildPatternBlocks(
      [...at('logo', 50, 20), ...at('credits', 10, 11, 12, 30, 35)],
      pattern,
      5
    )

    expect(blocks).toEqual([
      { kind: 'credits', start: 10, end: 12, count: 3 },
      { kind: 'logo', start: 20, end: 20, count: 1 },
      { kind: 'credits', start: 30, end: 35, count: 2 },
      { kind: 'logo', start: 50, end: 50, count: 1 },
    ])
    expect(matchBoundaryPattern(blocks, pattern)).toEqual({
      complete: true,
      splitIndex: 3,
      matchedBlocks: 4,
      timestamp: 42.5,
    })
  })

  it('splits where matching broke on a partial match', () => {
    const pattern = parseBoundaryPattern('c-l-s')
    const blocks = buildPatternBlocks(at('credits', 10, 40), pattern, 5)
    expect(matchBoundaryPattern(blocks, pattern)).toEqual({
      complete: false,
      splitIndex: 1,
      matchedBlocks: 1,
      timestamp: 25,
    })
  })

  it('finds nothing when the first token does not match', () => {
    const pattern = parseBoundaryPattern('c-l-s')
    expect(matchBoundaryPattern(buildPatternBlocks(at('logo', 10), pattern, 5), pattern)).toBeNull()
  })

  it('rejects malformed patterns', () => {
    expect(() => parseBoundaryPattern('c-l')).toThrow('expected exactly one "s" split marker')
    expect(() => parseBoundaryPattern('c-x-s')).toThrow('unknown token "x" (use c, l, s)')
    expect(() => parseBoundaryPattern('s')).toThrow('no c or l tokens')
    expect(() => parseBoundaryPattern('  ')).toThrow('Boundary pattern is empty')
  })
})
