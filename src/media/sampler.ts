export type TimeRange = {
  start: number
  end: number
}

export type SignalRegion = {
  start: number
  end: number
  duration: number
}

export type SceneChange = {
  timestamp: number
  magnitude: number
}

export type FrameImage = {
  bytes: Uint8Array
  mediaType: string
}

export type EnergyProfile = {
  blockSeconds: number
  values: number[]
}

export type SilenceOptions = {
  thresholdDb: number
  minDurationSeconds: number
}

export type BlackFrameOptions = {
  minDurationSeconds: number
  pictureThreshold: number
  pixelThreshold: number
}

/**
 * Read-only access to one source file. All timestamps, in and out, are
 * absolute seconds from the start of the file.
 */
export type MediaSampler = {
  silences(range: TimeRange, options: SilenceOptions): Promise<SignalRegion[]>
  blacks(range: TimeRange, options: BlackFrameOptions): Promise<SignalRegion[]>
  sceneChanges(range: TimeRange, threshold: number): Promise<SceneChange[]>
  frame(timestamp: number): Promise<FrameImage>
  /** 32x32 grayscale average hash, or null when no frame could be decoded. */
  frameHash(timestamp: number): Promise<Uint8Array | null>
  energyProfile(range: TimeRange): Promise<EnergyProfile>
  /** 16 kHz mono WAV for transcription. */
  audioClip(range: TimeRange): Promise<Uint8Array>
}

export function rangeDuration(range: TimeRange): number {
  return Math.max(0, range.end - range.start)
}

/** Evenly spaced timestamps across `[start, end]`, both ends included when they land on the grid. */
export function sampleTimestamps(range: TimeRange, intervalSeconds: number): number[] {
  const timestamps: number[] = []
  if (intervalSeconds <= 0 || range.end < range.start) return timestamps
  const steps = Math.floor((range.end - range.start) / intervalSeconds + 1e-9)
  for (let i = 0; i <= steps; i += 1) {
    timestamps.push(range.start + i * intervalSeconds)
  }
  return timestamps
}
