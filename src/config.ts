import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

export type DetectorToggles = {
  silence?: boolean
  blackFrame?: boolean
  sceneChange?: boolean
  speech?: boolean
  vision?: boolean
  imageHash?: boolean
  audioFingerprint?: boolean
  chapter?: boolean
}

export type EpisplitConfig = {
  /**
   * Gateway-style vision model id, e.g.:
   * - ollama/qwen2.5vl:3b
   * - openai/gpt-4o-mini
   * - google/gemini-2.0-flash
   */
  model?: string
  /** Transcription model id, e.g. openai/whisper-1 */
  transcriptionModel?: string
  transcriptionBaseUrl?: string
  ollamaHost?: string
  mode?: 'normal' | 'precision'
  /** Precision boundary pattern, e.g. `c-l-s` */
  pattern?: string
  precisionWindow?: 'asymmetric' | 'symmetric'
  detectors?: DetectorToggles
  runtimeMetadata?: boolean
  windowSeconds?: number
  minEpisodeMinutes?: number
  maxEpisodeMinutes?: number
  policy?: 'strict' | 'best-effort'
  workers?: number
  namingPattern?: string
  seasonDirectory?: boolean
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' && value.trim() ? value.trim() : undefined
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function readBoolean(record: Record<string, unknown>, key: string): boolean | undefined {
  const value = record[key]
  return typeof value === 'boolean' ? value : undefined
}

function readDetectors(value: unknown, path: string): DetectorToggles | undefined {
  if (value === undefined) return undefined
  if (!isRecord(value)) {
    throw new Error(`Invalid config file ${path}: "detectors" must be an object`)
  }
  return {
    silence: readBoolean(value, 'silence'),
    blackFrame: readBoolean(value, 'blackFrame'),
    sceneChange: readBoolean(value, 'sceneChange'),
    speech: readBoolean(value, 'speech'),
    vision: readBoolean(value, 'vision'),
    imageHash: readBoolean(value, 'imageHash'),
    audioFingerprint: readBoolean(value, 'audioFingerprint'),
    chapter: readBoolean(value, 'chapter'),
  }
}

function readEnum<T extends string>(
  record: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
  path: string
): T | undefined {
  const value = record[key]
  if (value === undefined) return undefined
  const match = allowed.find((candidate) => candidate === value)
  if (!match) {
    throw new Error(`Invalid config file ${path}: "${key}" must be one of ${allowed.join(', ')}`)
  }
  return match
}

export function loadEpisplitConfig({ env }: { env: Record<string, string | undefined> }): {
  config: EpisplitConfig | null
  path: string | null
} {
  const home = env.HOME?.trim() || homedir()
  if (!home) return { config: null, path: null }
  const path = join(home, '.episplit', 'config.json')

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  return {
    config: {
      model: readString(parsed, 'model'),
      transcriptionModel: readString(parsed, 'transcriptionModel'),
      transcriptionBaseUrl: readString(parsed, 'transcriptionBaseUrl'),
      ollamaHost: readString(parsed, 'ollamaHost'),
      mode: readEnum(parsed, 'mode', ['normal', 'precision'] as const, path),
      pattern: readString(parsed, 'pattern'),
      precisionWindow: readEnum(
        parsed,
        'precisionWindow',
        ['asymmetric', 'symmetric'] as const,
        path
      ),
      detectors: readDetectors(parsed.detectors, path),
      runtimeMetadata: readBoolean(parsed, 'runtimeMetadata'),
      windowSeconds: readNumber(parsed, 'windowSeconds'),
      minEpisodeMinutes: readNumber(parsed, 'minEpisodeMinutes'),
      maxEpisodeMinutes: readNumber(parsed, 'maxEpisodeMinutes'),
      policy: readEnum(parsed, 'policy', ['strict', 'best-effort'] as const, path),
      workers: readNumber(parsed, 'workers'),
      namingPattern: readString(parsed, 'namingPattern'),
      seasonDirectory: readBoolean(parsed, 'seasonDirectory'),
    },
    path,
  }
}
