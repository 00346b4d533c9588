import type {
  EnergyProfile,
  FrameImage,
  MediaSampler,
  SceneChange,
  SignalRegion,
  TimeRange,
} from './sampler.js'

function rangeKey(range: TimeRange): string {
  return `${range.start.toFixed(3)}-${range.end.toFixed(3)}`
}

function createMemo<T>(): (key: string, load: () => Promise<T>) => Promise<T> {
  const entries = new Map<string, Promise<T>>()
  return (key, load) => {
    const existing = entries.get(key)
    if (existing) return existing
    const pending = load()
    entries.set(key, pending)
    pending.catch(() => {
      entries.delete(key)
    })
    return pending
  }
}

/**
 * Wraps a sampler so identical requests within one run share a single
 * ffmpeg invocation. A rejected request is evicted so a later call can retry.
 */
export function createCachedSampler(sampler: MediaSampler): MediaSampler {
  const silences = createMemo<SignalRegion[]>()
  const blacks = createMemo<SignalRegion[]>()
  const scenes = createMemo<SceneChange[]>()
  const frames = createMemo<FrameImage>()
  const hashes = createMemo<Uint8Array | null>()
  const energy = createMemo<EnergyProfile>()
  const audio = createMemo<Uint8Array>()

  return {
    silences: (range, options) =>
      silences(`${rangeKey(range)}:${options.thresholdDb}:${options.minDurationSeconds}`, () =>
        sampler.silences(range, options)
      ),
    blacks: (range, options) =>
      blacks(
        `${rangeKey(range)}:${options.minDurationSeconds}:${options.pictureThreshold}:${options.pixelThreshold}`,
        () => sampler.blacks(range, options)
      ),
    sceneChanges: (range, threshold) =>
      scenes(`${rangeKey(range)}:${threshold}`, () => sampler.sceneChanges(range, threshold)),
    frame: (timestamp) => frames(timestamp.toFixed(3), () => sampler.frame(timestamp)),
    frameHash: (timestamp) => hashes(timestamp.toFixed(3), () => sampler.frameHash(timestamp)),
    energyProfile: (range) => energy(rangeKey(range), () => sampler.energyProfile(range)),
    audioClip: (range) => audio(rangeKey(range), () => sampler.audioClip(range)),
  }
}
