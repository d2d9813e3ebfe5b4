export interface AIModelConfig {
  apiKey: string
  model: string
  temperature?: number
  maxTokens?: number
}

/**
 * Everything a provider may need; each provider reads the fields it knows
 */
export interface ProviderConfig extends AIModelConfig {
  /** Azure OpenAI resource endpoint */
  endpoint?: string
  apiVersion?: string
  deploymentName?: string
  /** Site sent to OpenRouter as HTTP-Referer */
  referer?: string
}

/**
 * Token usage information returned by AI providers
 */
export interface TokenUsageInfo {
  promptTokens: number
  completionTokens: number
  totalTokens: number
  estimatedCost?: number
}

export interface CompletionRequest {
  systemPrompt: string
  userPrompt: string
  /** Ask the provider for a bare JSON object when it supports it */
  jsonMode?: boolean
  signal?: AbortSignal
}

export interface AIResponseFormat {
  text: string
  tokenUsage?: TokenUsageInfo
}

export interface AIProvider {
  /**
   * Run a single chat completion and return the raw reply text
   */
  complete(request: CompletionRequest): Promise<AIResponseFormat>

  /**
   * Get model information
   */
  getModelInfo(): { provider: string; model: string }
}
