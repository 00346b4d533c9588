import { ConfigurationError, describeError } from '../episodes/errors.js'
import { type GatewayModelId, parseGatewayStyleModelId } from '../llm/model-id.js'
import type { Transcript, TranscriptionRequest, TranscriptionService } from './types.js'

/**
 * OpenAI-compatible transcription (`openai/whisper-1` by default). `baseUrl`
 * points it at a local whisper server instead.
 */
export function createTranscriptionService({
  modelId,
  apiKey,
  baseUrl,
  timeoutMs,
  fetchImpl,
}: {
  modelId: string
  apiKey: string | null
  baseUrl: string | null
  timeoutMs: number
  fetchImpl: typeof fetch
}): TranscriptionService {
  let parsed: GatewayModelId
  try {
    parsed = parseGatewayStyleModelId(modelId)
  } catch (error) {
    throw new ConfigurationError(describeError(error))
  }
  if (parsed.provider !== 'openai') {
    throw new ConfigurationError(
      `Unsupported transcription model "${modelId}": only openai/... models are supported`
    )
  }
  if (!apiKey && !baseUrl) {
    throw new ConfigurationError('Missing OPENAI_API_KEY for the speech detector')
  }

  return {
    async transcribe({ audio }: TranscriptionRequest, signal?: AbortSignal): Promise<Transcript> {
      const controller = new AbortController()
      const timeout = setTimeout(() => controller.abort(), timeoutMs)
      const forwardAbort = () => controller.abort()
      signal?.addEventListener('abort', forwardAbort, { once: true })
      try {
        const { experimental_transcribe: transcribe } = await import('ai')
        const { createOpenAI } = await import('@ai-sdk/openai')
        const openai = createOpenAI({
          apiKey: apiKey ?? 'local',
          ...(baseUrl ? { baseURL: baseUrl } : {}),
          fetch: fetchImpl,
        })
        const result = await transcribe({
          model: openai.transcription(parsed.model),
          audio,
          abortSignal: controller.signal,
        })
        return {
          text: result.text,
          segments: result.segments.map((segment) => ({
            text: segment.text,
            start: segment.startSecond,
            end: segment.endSecond,
          })),
        }
      } catch (error) {
        if (error instanceof DOMException && error.name === 'AbortError') {
          throw new Error('Transcription request timed out')
        }
        throw error
      } finally {
        clearTimeout(timeout)
        signal?.removeEventListener('abort', forwardAbort)
      }
    },
  }
}
