import { accessSync, constants, statSync } from 'node:fs'
import path from 'node:path'

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false
    accessSync(candidate, constants.X_OK)
    return true
  } catch {
    return false
  }
}

/**
 * Resolves a binary name (or explicit path) against PATH.
 * Returns null when nothing executable is found.
 */
export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>
): string | null {
  const trimmed = binary.trim()
  if (!trimmed) return null
  if (trimmed.includes('/') || trimmed.includes('\\')) {
    return isExecutableFile(trimmed) ? path.resolve(trimmed) : null
  }
  const searchPath = env.PATH ?? ''
  const extensions =
    process.platform === 'win32'
      ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)
      : ['']
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue
    for (const ext of extensions) {
      const candidate = path.join(dir, `${trimmed}${ext}`)
      if (isExecutableFile(candidate)) return candidate
    }
  }
  return null
}

export function resolveToolPath(
  binary: string,
  env: Record<string, string | undefined>,
  explicitEnvKey?: string
): string | null {
  const explicit =
    explicitEnvKey && typeof env[explicitEnvKey] === 'string' ? env[explicitEnvKey]?.trim() : ''
  if (explicit) return resolveExecutableInPath(explicit, env)
  return resolveExecutableInPath(binary, env)
}

export function parseBooleanEnv(raw: string | undefined): boolean | null {
  if (raw == null) return null
  const normalized = raw.trim().toLowerCase()
  if (!normalized) return null
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  return null
}
