import { describe, expect, it } from 'vitest'

import { ConfigurationError } from '../src/episodes/errors.js'
import { parseBoundaryPattern } from '../src/episodes/pattern.js'
import { resolveSplitSettings } from '../src/episodes/settings.js'

describe('resolveSplitSettings', () => {
  it('applies defaults', () => {
    const settings = resolveSplitSettings({ config: null, env: {} })
    expect(settings.mode).toBe('normal')
    expect(settings.policy).toBe('strict')
    expect(settings.workers).toBe(4)
    expect(settings.windowSeconds).toBe(300)
    expect(settings.detectors).toMatchObject({ silence: true, blackFrame: true, chapter: true, vision: false })
    expect(settings.vision.model).toBe('ollama/qwen2.5vl:3b')
  })

  it('prefers flags over env over the config file', () => {
    const config = { model: 'google/gemini-2.0-flash', workers: 2 }
    expect(resolveSplitSettings({ config, env: {} }).vision.model).toBe('google/gemini-2.0-flash')
    expect(
      resolveSplitSettings({ config, env: { EPISPLIT_MODEL: 'openai/gpt-4o-mini' } }).vision.model
    ).toBe('openai/gpt-4o-mini')
    expect(
      resolveSplitSettings({
        config,
        env: { EPISPLIT_MODEL: 'openai/gpt-4o-mini' },
        overrides: { model: 'anthropic/claude-3-5-haiku' },
      }).vision.model
    ).toBe('anthropic/claude-3-5-haiku')
    expect(resolveSplitSettings({ config, env: { EPISPLIT_WORKERS: '6' } }).workers).toBe(6)
    expect(resolveSplitSettings({ config, env: {} }).workers).toBe(2)
  })

  it('reads the mode from EPISPLIT_MODE between the flag and the config file', () => {
    const config = { mode: 'precision' as const, runtimeMetadata: true, detectors: { vision: true } }
    expect(resolveSplitSettings({ config, env: {} }).mode).toBe('precision')
    expect(resolveSplitSettings({ config, env: { EPISPLIT_MODE: ' Normal ' } }).mode).toBe('normal')
    expect(
      resolveSplitSettings({ config, env: { EPISPLIT_MODE: 'normal' }, overrides: { mode: 'precision' } }).mode
    ).toBe('precision')
    expect(() => resolveSplitSettings({ config: null, env: { EPISPLIT_MODE: 'turbo' } })).toThrow(
      'EPISPLIT_MODE must be normal or precision (got "turbo")'
    )
  })

  it('clamps workers', () => {
    expect(resolveSplitSettings({ config: null, env: {}, overrides: { workers: 64 } }).workers).toBe(16)
  })

  it('replaces the detector set from a list', () => {
    const settings = resolveSplitSettings({
      config: null,
      env: {},
      overrides: { detectors: ['silence', 'scene-change', 'LLM'] },
    })
    expect(settings.detectors).toEqual({
      silence: true,
      blackFrame: false,
      sceneChange: true,
      speech: false,
      vision: true,
      imageHash: false,
      audioFingerprint: false,
      chapter: false,
    })
  })

  it('rejects unknown detectors', () => {
    expect(() =>
      resolveSplitSettings({ config: null, env: {}, overrides: { detectors: ['radar'] } })
    ).toThrow(ConfigurationError)
  })

  it('requires runtime metadata and vision in precision mode', () => {
    expect(() =>
      resolveSplitSettings({ config: null, env: {}, overrides: { mode: 'precision', detectors: ['vision'] } })
    ).toThrow(/requires runtime metadata/)
    expect(() =>
      resolveSplitSettings({
        config: null,
        env: {},
        overrides: { mode: 'precision', runtimeMetadata: true, detectors: ['silence'] },
      })
    ).toThrow('Precision mode requires the vision detector')
  })

  it('only accepts a pattern in precision mode', () => {
    expect(() =>
      resolveSplitSettings({ config: null, env: {}, overrides: { pattern: 'c-s-l' } })
    ).toThrow('A boundary pattern only applies in precision mode')

    const settings = resolveSplitSettings({
      config: null,
      env: {},
      overrides: { mode: 'precision', runtimeMetadata: true, detectors: ['vision'], pattern: 'c-s-l' },
    })
    expect(settings.precision.pattern?.tokens).toEqual(['credits', 'split', 'logo'])
    expect(settings.precision.blackFrameRefine).toBe(false)
  })

  it('rejects inverted episode limits', () => {
    expect(() =>
      resolveSplitSettings({ config: { minEpisodeMinutes: 60, maxEpisodeMinutes: 30 }, env: {} })
    ).toThrow('minEpisodeMinutes (60) must be below maxEpisodeMinutes (30)')
  })
})

describe('parseBoundaryPattern', () => {
  it('parses tokens and symbols', () => {
    expect(parseBoundaryPattern(' C-L-C-S-L ')).toEqual({
      source: 'c-l-c-s-l',
      tokens: ['credits', 'logo', 'credits', 'split', 'logo'],
      symbols: ['credits', 'logo'],
    })
  })

  it('needs exactly one split marker', () => {
    expect(() => parseBoundaryPattern('c-l')).toThrow(/exactly one "s"/)
    expect(() => parseBoundaryPattern('c-s-s')).toThrow(/exactly one "s"/)
  })

  it('rejects unknown tokens and empty patterns', () => {
    expect(() => parseBoundaryPattern('c-x-s')).toThrow('unknown token "x"')
    expect(() => parseBoundaryPattern('  ')).toThrow('Boundary pattern is empty')
    expect(() => parseBoundaryPattern('s')).toThrow(/no c or l tokens/)
  })
})
