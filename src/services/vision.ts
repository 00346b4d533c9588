import type { ModelMessage } from 'ai'

import { ConfigurationError, TransientServiceError, describeError } from '../episodes/errors.js'
import { type LlmApiKeys, generateTextWithModelId, missingApiKeyMessage } from '../llm/generate-text.js'
import { type GatewayModelId, parseGatewayStyleModelId } from '../llm/model-id.js'
import type { FrameClassification, VisionRequest, VisionService } from './types.js'

export const FRAME_PROMPT = [
  'You are looking at a single frame from a TV broadcast.',
  'Answer each question with YES or NO:',
  'CREDITS: Are end credits (scrolling or static cast/crew names) visible?',
  'LOGO: Is a network or studio logo shown full-screen or as an ident card?',
  'OUTRO: Is this an outro, "next time" teaser or closing sequence?',
  'TITLE_CARD: Is an episode or show title card shown?',
  'Reply with exactly four lines, e.g. "CREDITS: NO", or with a JSON object',
  'using the keys credits, logo, outro and titleCard.',
].join('\n')

const LINE_KEYS: Record<string, keyof FrameClassification> = {
  credits: 'credits',
  logo: 'logo',
  outro: 'outro',
  title_card: 'titleCard',
  titlecard: 'titleCard',
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readFlag(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === 'yes' || normalized === 'true') return true
    if (normalized === 'no' || normalized === 'false') return false
  }
  return null
}

function parseJsonClassification(text: string): FrameClassification | null {
  const start = text.indexOf('{')
  const end = text.lastIndexOf('}')
  if (start < 0 || end <= start) return null
  let parsed: unknown
  try {
    parsed = JSON.parse(text.slice(start, end + 1))
  } catch {
    return null
  }
  if (!isRecord(parsed)) return null
  const credits = readFlag(parsed.credits)
  const logo = readFlag(parsed.logo)
  const outro = readFlag(parsed.outro)
  const titleCard = readFlag(parsed.titleCard ?? parsed.title_card)
  if (credits == null || logo == null || outro == null || titleCard == null) return null
  return { credits, logo, outro, titleCard }
}

function parseLineClassification(text: string): FrameClassification | null {
  const found: Partial<FrameClassification> = {}
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*\**\s*([a-z_ ]+?)\s*\**\s*:\s*\**\s*(yes|no)\b/i.exec(line)
    if (!match) continue
    const key = LINE_KEYS[match[1].trim().toLowerCase().replace(/\s+/g, '_')]
    if (key) found[key] = match[2].toLowerCase() === 'yes'
  }
  const { credits, logo, outro, titleCard } = found
  if (credits == null || logo == null || outro == null || titleCard == null) return null
  return { credits, logo, outro, titleCard }
}

/** Accepts either the JSON form or `KEY: YES/NO` lines; anything else is a transient failure. */
export function parseFrameClassification(text: string): FrameClassification {
  const classification = parseJsonClassification(text) ?? parseLineClassification(text)
  if (!classification) {
    const preview = text.trim().slice(0, 120)
    throw new TransientServiceError(`Malformed vision response: ${JSON.stringify(preview)}`, {
      detector: 'vision',
    })
  }
  return classification
}

export function createLlmVisionService({
  modelId,
  apiKeys,
  ollamaHost,
  timeoutMs,
  fetchImpl,
}: {
  modelId: string
  apiKeys: LlmApiKeys
  ollamaHost: string
  timeoutMs: number
  fetchImpl: typeof fetch
}): VisionService {
  let parsed: GatewayModelId
  try {
    parsed = parseGatewayStyleModelId(modelId)
  } catch (error) {
    throw new ConfigurationError(describeError(error))
  }
  const missingKey = missingApiKeyMessage(parsed.provider, apiKeys)
  if (missingKey) throw new ConfigurationError(missingKey)

  return {
    async classifyFrame({ image, mediaType }: VisionRequest, signal?: AbortSignal) {
      const messages: ModelMessage[] = [
        {
          role: 'user',
          content: [
            { type: 'text', text: FRAME_PROMPT },
            { type: 'image', image, mediaType },
          ],
        },
      ]
      const result = await generateTextWithModelId({
        modelId,
        apiKeys,
        ollamaHost,
        prompt: messages,
        temperature: 0,
        maxOutputTokens: 100,
        timeoutMs,
        signal,
        fetchImpl,
      })
      return parseFrameClassification(result.text)
    },
  }
}
