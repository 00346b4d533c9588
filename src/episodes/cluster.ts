import type {
  DetectionCluster,
  DetectionKind,
  EpisodeBoundary,
  RawDetection,
  SearchWindow,
} from './types.js'

export const DEFAULT_CLUSTER_TOLERANCE_SECONDS = 60
const DIVERSITY_BASE = 1.5
const SPREAD_PENALTY = 0.1
const SCORE_EPSILON = 1e-9
const MAX_CONFIDENCE = 0.95
const CONFIDENCE_HALF_SCORE = 50
const BLACK_SILENCE_BONUS = 0.1

const PHRASE_BOOST = { maxSeconds: 30, factor: 1.2 }
const PHRASE_PENALTY = { minSeconds: 60, factor: 0.5 }

export type ClusterOptions = {
  toleranceSeconds?: number
}

function compareDetections(a: RawDetection, b: RawDetection): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1
  return a.score - b.score
}

function weightedCenter(members: RawDetection[]): number {
  const totalScore = members.reduce((sum, member) => sum + member.score, 0)
  if (totalScore <= 0) {
    return members.reduce((sum, member) => sum + member.timestamp, 0) / members.length
  }
  return members.reduce((sum, member) => sum + member.timestamp * member.score, 0) / totalScore
}

/**
 * End-of-episode phrases pull the boundary toward themselves: a cut shortly
 * after a phrase is favoured, one long after the nearest earlier phrase is not.
 */
export function speechFactor(center: number, phraseTimestamps: number[]): number {
  let nearest: number | null = null
  for (const phrase of phraseTimestamps) {
    if (phrase > center) continue
    if (nearest == null || phrase > nearest) nearest = phrase
  }
  if (nearest == null) return 1
  const gap = center - nearest
  if (gap <= PHRASE_BOOST.maxSeconds) return PHRASE_BOOST.factor
  if (gap > PHRASE_PENALTY.minSeconds) return PHRASE_PENALTY.factor
  return 1
}

function buildCluster(members: RawDetection[], phraseTimestamps: number[]): DetectionCluster {
  const center = weightedCenter(members)
  const kinds = [...new Set(members.map((member) => member.kind))].sort()
  const timestamps = members.map((member) => member.timestamp)
  const spread = Math.max(...timestamps) - Math.min(...timestamps)
  const baseScore = members.reduce((sum, member) => sum + member.score, 0)
  const score =
    baseScore *
    DIVERSITY_BASE ** (kinds.length - 1) *
    (1 / (1 + SPREAD_PENALTY * spread)) *
    speechFactor(center, phraseTimestamps)
  return { center, members, kinds, spread, baseScore, score }
}

/**
 * Greedy grouping: the earliest unused detection seeds a cluster, and later
 * ones join while they sit within the tolerance of its running weighted
 * center. Input order does not affect the result.
 */
export function clusterDetections(
  detections: RawDetection[],
  window: Pick<SearchWindow, 'start' | 'end'>,
  { toleranceSeconds = DEFAULT_CLUSTER_TOLERANCE_SECONDS }: ClusterOptions = {}
): DetectionCluster[] {
  const inWindow = detections
    .filter((detection) => detection.timestamp >= window.start && detection.timestamp <= window.end)
    .sort(compareDetections)
  const phraseTimestamps = inWindow
    .filter((detection) => detection.kind === 'speech')
    .map((detection) => detection.timestamp)

  const used = new Array<boolean>(inWindow.length).fill(false)
  const clusters: DetectionCluster[] = []
  for (let i = 0; i < inWindow.length; i += 1) {
    if (used[i]) continue
    used[i] = true
    const members = [inWindow[i]]
    let center = inWindow[i].timestamp
    for (let j = i + 1; j < inWindow.length; j += 1) {
      if (used[j]) continue
      if (Math.abs(inWindow[j].timestamp - center) > toleranceSeconds) continue
      used[j] = true
      members.push(inWindow[j])
      center = weightedCenter(members)
    }
    clusters.push(buildCluster(members, phraseTimestamps))
  }
  return clusters
}

function hasAnchorKind(cluster: DetectionCluster): boolean {
  return cluster.kinds.includes('black_frame') || cluster.kinds.includes('chapter')
}

function compareClusters(a: DetectionCluster, b: DetectionCluster): number {
  if (Math.abs(a.score - b.score) > SCORE_EPSILON) return b.score - a.score
  const anchorA = hasAnchorKind(a)
  const anchorB = hasAnchorKind(b)
  if (anchorA !== anchorB) return anchorA ? -1 : 1
  return a.center - b.center
}

export function rankClusters(clusters: DetectionCluster[]): DetectionCluster[] {
  return [...clusters].sort(compareClusters)
}

export function pickBestCluster(clusters: DetectionCluster[]): DetectionCluster | null {
  return rankClusters(clusters)[0] ?? null
}

export function clusterConfidence(cluster: DetectionCluster): number {
  let confidence = Math.min(MAX_CONFIDENCE, cluster.score / (cluster.score + CONFIDENCE_HALF_SCORE))
  const kinds = new Set<DetectionKind>(cluster.kinds)
  if (kinds.has('black_frame') && kinds.has('silence')) {
    confidence = Math.min(MAX_CONFIDENCE, confidence + BLACK_SILENCE_BONUS)
  }
  return confidence
}

export function boundaryFromCluster(windowIndex: number, cluster: DetectionCluster): EpisodeBoundary {
  return {
    windowIndex,
    timestamp: cluster.center,
    confidence: clusterConfidence(cluster),
    source: 'cluster',
    standalone: false,
    evidence: cluster.members,
    confirmations: [],
    notes: [`cluster kinds=${cluster.kinds.join(',')} score=${cluster.score.toFixed(2)}`],
  }
}
