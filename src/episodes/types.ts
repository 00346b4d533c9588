export type Chapter = {
  title: string
  start: number
  end: number
}

export type ParsedFilename = {
  title: string
  season: number | null
  startEpisode: number | null
  episodeCount: number | null
  year: number | null
  quality: string | null
  codec: string | null
  source: string | null
  extension: string
  originalFilename: string
}

export type SourceFile = {
  path: string
  durationSeconds: number
  chapters: Chapter[]
  parsed: ParsedFilename
}

export type WindowSource = 'chapter' | 'runtime' | 'equal-division'

export type SearchWindow = {
  index: number
  center: number
  start: number
  end: number
  source: WindowSource
  confidence: number
  episodeBefore: number
  episodeAfter: number
  /** "Commercial 1" marker the window was anchored to, if any. */
  commercialMarker: number | null
}

export type DetectionKind =
  | 'silence'
  | 'black_frame'
  | 'scene_change'
  | 'speech'
  | 'llm_credits'
  | 'llm_logo'
  | 'llm_outro'
  | 'image_hash'
  | 'audio_fingerprint'
  | 'chapter'

export type DetectionMetadata = Record<string, string | number | boolean | null>

export type RawDetection = {
  timestamp: number
  score: number
  kind: DetectionKind
  metadata: DetectionMetadata
}

export type DetectionCluster = {
  center: number
  members: RawDetection[]
  kinds: DetectionKind[]
  spread: number
  baseScore: number
  score: number
}

export type BoundarySource =
  | 'chapter'
  | 'cluster'
  | 'logo'
  | 'credits'
  | 'pattern'
  | 'fallback'
  | 'window-center'

export type EpisodeBoundary = {
  windowIndex: number
  timestamp: number
  confidence: number
  source: BoundarySource
  /** Chapter boundaries are authoritative and skip detection. */
  standalone: boolean
  evidence: RawDetection[]
  confirmations: RawDetection[]
  notes: string[]
}

export type WindowResolution = {
  window: SearchWindow
  boundary: EpisodeBoundary | null
  reason: string | null
}

export type CutRange = {
  index: number
  start: number
  end: number
  season: number
  episode: number
  title: string
  filename: string
}

export type ConstraintViolation = {
  rangeIndex: number
  durationSeconds: number
  limit: 'min' | 'max'
  limitSeconds: number
}

export type CutPlan = {
  source: SourceFile
  boundaries: EpisodeBoundary[]
  ranges: CutRange[]
  violations: ConstraintViolation[]
  warnings: string[]
  runtimeCheck: RuntimeCheck | null
}

export type RuntimeEpisode = {
  episode: number
  name: string
  runtimeMinutes: number | null
}

export type RuntimeMetadata = {
  seriesId: number
  seriesName: string
  episodes: RuntimeEpisode[]
}

export type RuntimeCheck = {
  verdict: 'good' | 'partial' | 'poor'
  matched: number
  compared: number
  deviations: number[]
}

export type SplitProgressPhase = 'probe' | 'runtime' | 'windows' | 'detect' | 'confirm' | 'extract'

export type SplitProgress = {
  phase: SplitProgressPhase
  completed: number
  total: number
  label: string
}

export type SplitHooks = {
  onProgress?: ((progress: SplitProgress) => void) | null
}
