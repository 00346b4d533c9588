import type { LanguageModel, ModelMessage } from 'ai'
import { type GatewayModelId, type LlmProvider, parseGatewayStyleModelId } from './model-id.js'

export type LlmApiKeys = {
  xaiApiKey: string | null
  openaiApiKey: string | null
  googleApiKey: string | null
  anthropicApiKey: string | null
}

export type LlmTokenUsage = {
  promptTokens: number | null
  completionTokens: number | null
  totalTokens: number | null
}

export function resolveLlmApiKeys(env: Record<string, string | undefined>): LlmApiKeys {
  const pick = (...keys: string[]) => {
    for (const key of keys) {
      const value = env[key]?.trim()
      if (value) return value
    }
    return null
  }
  return {
    xaiApiKey: pick('XAI_API_KEY'),
    openaiApiKey: pick('OPENAI_API_KEY'),
    googleApiKey: pick('GEMINI_API_KEY', 'GOOGLE_GENERATIVE_AI_API_KEY', 'GOOGLE_API_KEY'),
    anthropicApiKey: pick('ANTHROPIC_API_KEY'),
  }
}

/** The error a call would hit for lack of a provider key, or null when the key is there. */
export function missingApiKeyMessage(provider: LlmProvider, apiKeys: LlmApiKeys): string | null {
  switch (provider) {
    case 'ollama':
      return null
    case 'xai':
      return apiKeys.xaiApiKey ? null : 'Missing XAI_API_KEY for xai/... model'
    case 'google':
      return apiKeys.googleApiKey
        ? null
        : 'Missing GEMINI_API_KEY (or GOOGLE_GENERATIVE_AI_API_KEY / GOOGLE_API_KEY) for google/... model'
    case 'anthropic':
      return apiKeys.anthropicApiKey ? null : 'Missing ANTHROPIC_API_KEY for anthropic/... model'
    case 'openai':
      return apiKeys.openaiApiKey ? null : 'Missing OPENAI_API_KEY for openai/... model'
  }
}

async function resolveLanguageModel({
  parsed,
  apiKeys,
  ollamaHost,
  fetchImpl,
}: {
  parsed: GatewayModelId
  apiKeys: LlmApiKeys
  ollamaHost: string
  fetchImpl: typeof fetch
}): Promise<LanguageModel> {
  if (parsed.provider === 'ollama') {
    const { createOpenAI } = await import('@ai-sdk/openai')
    // Ollama speaks the chat-completions dialect on /v1 and ignores the key.
    const ollama = createOpenAI({
      baseURL: `${ollamaHost.replace(/\/+$/, '')}/v1`,
      apiKey: 'ollama',
      fetch: fetchImpl,
    })
    return ollama.chat(parsed.model)
  }

  if (parsed.provider === 'xai') {
    const apiKey = apiKeys.xaiApiKey
    if (!apiKey) throw new Error('Missing XAI_API_KEY for xai/... model')
    const { createXai } = await import('@ai-sdk/xai')
    return createXai({ apiKey, fetch: fetchImpl })(parsed.model)
  }

  if (parsed.provider === 'google') {
    const apiKey = apiKeys.googleApiKey
    if (!apiKey)
      throw new Error(
        'Missing GEMINI_API_KEY (or GOOGLE_GENERATIVE_AI_API_KEY / GOOGLE_API_KEY) for google/... model'
      )
    const { createGoogleGenerativeAI } = await import('@ai-sdk/google')
    return createGoogleGenerativeAI({ apiKey, fetch: fetchImpl })(parsed.model)
  }

  if (parsed.provider === 'anthropic') {
    const apiKey = apiKeys.anthropicApiKey
    if (!apiKey) throw new Error('Missing ANTHROPIC_API_KEY for anthropic/... model')
    const { createAnthropic } = await import('@ai-sdk/anthropic')
    return createAnthropic({ apiKey, fetch: fetchImpl })(parsed.model)
  }

  const apiKey = apiKeys.openaiApiKey
  if (!apiKey) throw new Error('Missing OPENAI_API_KEY for openai/... model')
  const { createOpenAI } = await import('@ai-sdk/openai')
  return createOpenAI({ apiKey, fetch: fetchImpl })(parsed.model)
}

export async function generateTextWithModelId({
  modelId,
  apiKeys,
  ollamaHost,
  system,
  prompt,
  temperature,
  maxOutputTokens,
  timeoutMs,
  signal,
  fetchImpl,
}: {
  modelId: string
  apiKeys: LlmApiKeys
  ollamaHost: string
  system?: string
  prompt: string | ModelMessage[]
  temperature?: number
  maxOutputTokens?: number
  timeoutMs: number
  signal?: AbortSignal
  fetchImpl: typeof fetch
}): Promise<{
  text: string
  canonicalModelId: string
  provider: LlmProvider
  usage: LlmTokenUsage | null
}> {
  const parsed = parseGatewayStyleModelId(modelId)

  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  const forwardAbort = () => controller.abort()
  signal?.addEventListener('abort', forwardAbort, { once: true })

  try {
    const { generateText } = await import('ai')
    const model = await resolveLanguageModel({ parsed, apiKeys, ollamaHost, fetchImpl })
    const result = await generateText({
      model,
      system,
      ...(typeof prompt === 'string' ? { prompt } : { messages: prompt }),
      ...(typeof temperature === 'number' ? { temperature } : {}),
      ...(typeof maxOutputTokens === 'number' ? { maxOutputTokens } : {}),
      abortSignal: controller.signal,
    })
    const usage = result.usage
    return {
      text: result.text,
      canonicalModelId: parsed.canonical,
      provider: parsed.provider,
      usage: usage
        ? {
            promptTokens: usage.inputTokens ?? null,
            completionTokens: usage.outputTokens ?? null,
            totalTokens: usage.totalTokens ?? null,
          }
        : null,
    }
  } catch (error) {
    if (error instanceof DOMException && error.name === 'AbortError') {
      throw new Error('LLM request timed out')
    }
    throw error
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener('abort', forwardAbort)
  }
}
