export type LlmProvider = 'ollama' | 'openai' | 'google' | 'anthropic' | 'xai'

export type GatewayModelId = {
  provider: LlmProvider
  model: string
  /** `provider/model`, provider lowercased. */
  canonical: string
}

const PROVIDERS: readonly LlmProvider[] = ['ollama', 'openai', 'google', 'anthropic', 'xai']

function isProvider(value: string): value is LlmProvider {
  return PROVIDERS.some((provider) => provider === value)
}

/**
 * `ollama/qwen2.5vl:3b` -> { provider: 'ollama', model: 'qwen2.5vl:3b' }.
 * Only the first slash separates the provider, so model names may contain more.
 */
export function parseGatewayStyleModelId(raw: string): GatewayModelId {
  const trimmed = raw.trim()
  const slash = trimmed.indexOf('/')
  if (slash <= 0 || slash === trimmed.length - 1) {
    throw new Error(`Invalid model id "${raw}": expected provider/model (e.g. ollama/qwen2.5vl:3b)`)
  }
  const provider = trimmed.slice(0, slash).toLowerCase()
  const model = trimmed.slice(slash + 1)
  if (!isProvider(provider)) {
    throw new Error(`Unsupported model provider "${provider}" (expected ${PROVIDERS.join(', ')})`)
  }
  return { provider, model, canonical: `${provider}/${model}` }
}
