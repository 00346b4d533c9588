import type { RuntimeMetadata } from '../episodes/types.js'

export type FrameClassification = {
  credits: boolean
  logo: boolean
  outro: boolean
  titleCard: boolean
}

export type VisionRequest = {
  image: Uint8Array
  mediaType: string
}

export type VisionService = {
  classifyFrame(request: VisionRequest, signal?: AbortSignal): Promise<FrameClassification>
}

export type TranscriptSegment = {
  text: string
  /** Seconds from the start of the submitted clip. */
  start: number
  end: number
}

export type Transcript = {
  text: string
  segments: TranscriptSegment[]
}

export type TranscriptionRequest = {
  audio: Uint8Array
  mediaType: string
}

export type TranscriptionService = {
  transcribe(request: TranscriptionRequest, signal?: AbortSignal): Promise<Transcript>
}

export type RuntimeLookupRequest = {
  title: string
  season: number
  startEpisode: number
  episodeCount: number
}

export type RuntimeMetadataService = {
  lookup(request: RuntimeLookupRequest): Promise<RuntimeMetadata | null>
}
