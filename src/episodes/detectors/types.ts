import type { MediaSampler } from '../../media/sampler.js'
import type { SplitLog } from '../../run/log.js'
import type { TranscriptionService, VisionService } from '../../services/types.js'
import type { SplitSettings } from '../settings.js'
import type { RawDetection, SearchWindow, SourceFile } from '../types.js'

export type DetectorKind =
  | 'silence'
  | 'black_frame'
  | 'scene_change'
  | 'speech'
  | 'vision'
  | 'image_hash'
  | 'audio_fingerprint'
  | 'chapter'

export type DetectorServices = {
  vision: VisionService | null
  transcription: TranscriptionService | null
}

export type DetectionContext = {
  source: SourceFile
  sampler: MediaSampler
  services: DetectorServices
  settings: SplitSettings
  log: SplitLog
  warn: (message: string) => void
}

export type WindowDetector = {
  kind: DetectorKind
  detect(window: SearchWindow, context: DetectionContext): Promise<RawDetection[]>
}
