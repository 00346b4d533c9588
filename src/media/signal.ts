import type { EnergyProfile } from './sampler.js'

export const HASH_SIZE = 32
export const ENERGY_BLOCK_SECONDS = 0.5

export function buildAverageHash(pixels: Uint8Array): Uint8Array {
  let sum = 0
  for (const value of pixels) sum += value
  const avg = sum / pixels.length
  const bits = new Uint8Array(pixels.length)
  for (let i = 0; i < pixels.length; i += 1) {
    bits[i] = pixels[i] >= avg ? 1 : 0
  }
  return bits
}

export function computeHashDistanceRatio(a: Uint8Array, b: Uint8Array): number {
  const len = Math.min(a.length, b.length)
  let diff = 0
  for (let i = 0; i < len; i += 1) {
    if (a[i] !== b[i]) diff += 1
  }
  return len === 0 ? 0 : diff / len
}

/** RMS energy of signed 16-bit little-endian mono PCM, one value per block. */
export function computeEnergyProfile(
  pcm: Uint8Array,
  sampleRate: number,
  blockSeconds = ENERGY_BLOCK_SECONDS
): EnergyProfile {
  const view = new DataView(pcm.buffer, pcm.byteOffset, pcm.byteLength)
  const sampleCount = Math.floor(pcm.byteLength / 2)
  const blockSize = Math.max(1, Math.round(sampleRate * blockSeconds))
  const values: number[] = []
  for (let offset = 0; offset + blockSize <= sampleCount; offset += blockSize) {
    let sumSquares = 0
    for (let i = offset; i < offset + blockSize; i += 1) {
      const sample = view.getInt16(i * 2, true) / 32768
      sumSquares += sample * sample
    }
    values.push(Math.sqrt(sumSquares / blockSize))
  }
  return { blockSeconds, values }
}

/**
 * Pearson correlation over the overlapping prefix of two profiles.
 * Flat or empty profiles correlate at 0.
 */
export function correlateProfiles(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length)
  if (len < 2) return 0
  let meanA = 0
  let meanB = 0
  for (let i = 0; i < len; i += 1) {
    meanA += a[i]
    meanB += b[i]
  }
  meanA /= len
  meanB /= len
  let cov = 0
  let varA = 0
  let varB = 0
  for (let i = 0; i < len; i += 1) {
    const da = a[i] - meanA
    const db = b[i] - meanB
    cov += da * db
    varA += da * da
    varB += db * db
  }
  if (varA === 0 || varB === 0) return 0
  return cov / Math.sqrt(varA * varB)
}

export type LagCorrelation = {
  correlation: number
  /** Blocks by which `candidate` trails `reference`; negative when it leads. */
  lag: number
}

export function bestLagCorrelation(reference: number[], candidate: number[], maxLag: number): LagCorrelation {
  let best: LagCorrelation = { correlation: 0, lag: 0 }
  for (let lag = -maxLag; lag <= maxLag; lag += 1) {
    const refStart = lag < 0 ? -lag : 0
    const candStart = lag > 0 ? lag : 0
    const length = Math.min(reference.length - refStart, candidate.length - candStart)
    if (length < 2) continue
    const correlation = correlateProfiles(
      reference.slice(refStart, refStart + length),
      candidate.slice(candStart, candStart + length)
    )
    if (correlation > best.correlation) best = { correlation, lag }
  }
  return best
}
