import type { DetectorToggles, EpisplitConfig } from '../config.js'
import { MAX_WORKERS } from '../run/concurrency.js'
import { ConfigurationError } from './errors.js'
import { type BoundaryPattern, parseBoundaryPattern } from './pattern.js'

export type SplitMode = 'normal' | 'precision'
export type NoDetectionPolicy = 'strict' | 'best-effort'
export type PrecisionWindowShape = 'asymmetric' | 'symmetric'

export type DetectorSettings = {
  silence: boolean
  blackFrame: boolean
  sceneChange: boolean
  speech: boolean
  vision: boolean
  imageHash: boolean
  audioFingerprint: boolean
  chapter: boolean
}

export type SplitSettings = {
  mode: SplitMode
  detectors: DetectorSettings
  runtimeMetadata: boolean
  policy: NoDetectionPolicy
  workers: number
  windowSeconds: number
  clusterToleranceSeconds: number
  minEpisodeSeconds: number
  maxEpisodeSeconds: number
  minFileSeconds: number
  silence: { thresholdDb: number; minDurationSeconds: number }
  blackFrame: { minDurationSeconds: number; pictureThreshold: number; pixelThreshold: number }
  sceneThreshold: number
  vision: {
    model: string
    ollamaHost: string
    baseIntervalSeconds: number
    denseIntervalSeconds: number
    minCreditsFrames: number
  }
  speech: { model: string; baseUrl: string | null }
  precision: {
    window: PrecisionWindowShape
    sampleIntervalSeconds: number
    groupingBufferSeconds: number
    postCreditsBufferSeconds: number
    expansionSeconds: number
    blackFrameRefine: boolean
    pattern: BoundaryPattern | null
  }
  intro: { scanSeconds: number; intervalSeconds: number }
  retry: { attempts: number; timeoutMs: number; baseDelayMs: number }
  naming: { pattern: string; seasonDirectory: boolean; keepQualityInfo: boolean }
}

export type SettingsOverrides = {
  mode?: SplitMode
  pattern?: string
  detectors?: string[]
  model?: string
  policy?: NoDetectionPolicy
  workers?: number
  runtimeMetadata?: boolean
  windowSeconds?: number
  seasonDirectory?: boolean
}

export const DEFAULT_VISION_MODEL = 'ollama/qwen2.5vl:3b'
export const DEFAULT_TRANSCRIPTION_MODEL = 'openai/whisper-1'
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434'
export const DEFAULT_NAMING_PATTERN = 'S{season:02}E{episode:02} - {basename}'
const DEFAULT_WORKERS = 4

const DETECTOR_NAMES: Record<string, keyof DetectorSettings> = {
  silence: 'silence',
  black: 'blackFrame',
  'black-frame': 'blackFrame',
  scene: 'sceneChange',
  'scene-change': 'sceneChange',
  speech: 'speech',
  vision: 'vision',
  llm: 'vision',
  'image-hash': 'imageHash',
  'audio-fingerprint': 'audioFingerprint',
  chapter: 'chapter',
}

const DEFAULT_DETECTORS: DetectorSettings = {
  silence: true,
  blackFrame: true,
  sceneChange: false,
  speech: false,
  vision: false,
  imageHash: false,
  audioFingerprint: false,
  chapter: true,
}

function detectorsFromList(names: string[]): DetectorSettings {
  const enabled: DetectorSettings = {
    silence: false,
    blackFrame: false,
    sceneChange: false,
    speech: false,
    vision: false,
    imageHash: false,
    audioFingerprint: false,
    chapter: false,
  }
  for (const name of names) {
    const key = DETECTOR_NAMES[name.trim().toLowerCase()]
    if (!key) {
      throw new ConfigurationError(
        `Unknown detector "${name}" (expected ${Object.keys(DETECTOR_NAMES).join(', ')})`
      )
    }
    enabled[key] = true
  }
  return enabled
}

function mergeToggles(base: DetectorSettings, toggles: DetectorToggles | undefined): DetectorSettings {
  if (!toggles) return base
  return {
    silence: toggles.silence ?? base.silence,
    blackFrame: toggles.blackFrame ?? base.blackFrame,
    sceneChange: toggles.sceneChange ?? base.sceneChange,
    speech: toggles.speech ?? base.speech,
    vision: toggles.vision ?? base.vision,
    imageHash: toggles.imageHash ?? base.imageHash,
    audioFingerprint: toggles.audioFingerprint ?? base.audioFingerprint,
    chapter: toggles.chapter ?? base.chapter,
  }
}

function resolveWorkers(
  override: number | undefined,
  env: Record<string, string | undefined>,
  config: EpisplitConfig | null
): number {
  const raw = override ?? (env.EPISPLIT_WORKERS ? Number(env.EPISPLIT_WORKERS) : config?.workers)
  if (raw == null || !Number.isFinite(raw) || raw <= 0) return DEFAULT_WORKERS
  return Math.max(1, Math.min(MAX_WORKERS, Math.round(raw)))
}

function readEnvMode(env: Record<string, string | undefined>): SplitMode | undefined {
  const raw = env.EPISPLIT_MODE?.trim().toLowerCase()
  if (!raw) return undefined
  if (raw === 'normal' || raw === 'precision') return raw
  throw new ConfigurationError(`EPISPLIT_MODE must be normal or precision (got "${env.EPISPLIT_MODE}")`)
}

function requirePositive(value: number, label: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${label} must be a positive number (got ${value})`)
  }
  return value
}

/**
 * Flag > env > config file > defaults. Throws ConfigurationError for
 * combinations that cannot run, before any media work starts.
 */
export function resolveSplitSettings({
  config,
  env,
  overrides = {},
}: {
  config: EpisplitConfig | null
  env: Record<string, string | undefined>
  overrides?: SettingsOverrides
}): SplitSettings {
  const mode = overrides.mode ?? readEnvMode(env) ?? config?.mode ?? 'normal'
  const detectors = overrides.detectors
    ? detectorsFromList(overrides.detectors)
    : mergeToggles(DEFAULT_DETECTORS, config?.detectors)
  const runtimeMetadata = overrides.runtimeMetadata ?? config?.runtimeMetadata ?? false
  const patternSource = overrides.pattern ?? config?.pattern ?? null
  const pattern = patternSource ? parseBoundaryPattern(patternSource) : null

  const minEpisodeSeconds = requirePositive(config?.minEpisodeMinutes ?? 15, 'minEpisodeMinutes') * 60
  const maxEpisodeSeconds = requirePositive(config?.maxEpisodeMinutes ?? 90, 'maxEpisodeMinutes') * 60
  if (minEpisodeSeconds >= maxEpisodeSeconds) {
    throw new ConfigurationError(
      `minEpisodeMinutes (${minEpisodeSeconds / 60}) must be below maxEpisodeMinutes (${maxEpisodeSeconds / 60})`
    )
  }

  if (mode === 'precision') {
    if (!runtimeMetadata) {
      throw new ConfigurationError(
        'Precision mode requires runtime metadata; enable it with --runtime-metadata or "runtimeMetadata": true'
      )
    }
    if (!detectors.vision) {
      throw new ConfigurationError('Precision mode requires the vision detector')
    }
  } else if (pattern) {
    throw new ConfigurationError('A boundary pattern only applies in precision mode')
  }

  return {
    mode,
    detectors,
    runtimeMetadata,
    policy: overrides.policy ?? config?.policy ?? 'strict',
    workers: resolveWorkers(overrides.workers, env, config),
    windowSeconds: requirePositive(overrides.windowSeconds ?? config?.windowSeconds ?? 300, 'windowSeconds'),
    clusterToleranceSeconds: 60,
    minEpisodeSeconds,
    maxEpisodeSeconds,
    minFileSeconds: 30 * 60,
    silence: { thresholdDb: -30, minDurationSeconds: 2 },
    blackFrame: { minDurationSeconds: 1, pictureThreshold: 0.98, pixelThreshold: 0.1 },
    sceneThreshold: 0.3,
    vision: {
      model: overrides.model || env.EPISPLIT_MODEL?.trim() || config?.model || DEFAULT_VISION_MODEL,
      ollamaHost: env.OLLAMA_HOST?.trim() || config?.ollamaHost || DEFAULT_OLLAMA_HOST,
      baseIntervalSeconds: 10,
      denseIntervalSeconds: 1,
      minCreditsFrames: 3,
    },
    speech: {
      model:
        env.EPISPLIT_TRANSCRIPTION_MODEL?.trim() ||
        config?.transcriptionModel ||
        DEFAULT_TRANSCRIPTION_MODEL,
      baseUrl: config?.transcriptionBaseUrl ?? null,
    },
    precision: {
      window: config?.precisionWindow ?? 'asymmetric',
      sampleIntervalSeconds: 2,
      groupingBufferSeconds: 10,
      postCreditsBufferSeconds: 15,
      expansionSeconds: 90,
      blackFrameRefine: pattern == null,
      pattern,
    },
    intro: { scanSeconds: 300, intervalSeconds: 10 },
    retry: { attempts: 3, timeoutMs: 30_000, baseDelayMs: 250 },
    naming: {
      pattern: config?.namingPattern ?? DEFAULT_NAMING_PATTERN,
      seasonDirectory: overrides.seasonDirectory ?? config?.seasonDirectory ?? false,
      keepQualityInfo: true,
    },
  }
}
