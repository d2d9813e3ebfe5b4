import { OpenAI } from 'openai'
import {
  AIModelConfig,
  AIProvider,
  AIResponseFormat,
  CompletionRequest,
  TokenUsageInfo,
} from '../types/AIProvider'

/**
 * Pricing information (USD per 1K tokens)
 */
export interface ModelPricing {
  input: number
  output: number
}

const OPENAI_PRICING: Record<string, ModelPricing> = {
  'gpt-4o': { input: 0.0025, output: 0.01 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  'gpt-4.1': { input: 0.002, output: 0.008 },
  'gpt-4.1-mini': { input: 0.0004, output: 0.0016 },
  'gpt-4.1-nano': { input: 0.0001, output: 0.0004 },
  'gpt-4-turbo': { input: 0.01, output: 0.03 },
  'gpt-3.5-turbo': { input: 0.0005, output: 0.0015 },
  'o3-mini': { input: 0.0011, output: 0.0044 },
  'o4-mini': { input: 0.0011, output: 0.0044 },
  // OpenRouter model ids
  'amazon/nova-micro-v1': { input: 0.000035, output: 0.00014 },
  'amazon/nova-lite-v1': { input: 0.00006, output: 0.00024 },
  'openai/gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  // Grok
  'grok-3': { input: 0.003, output: 0.015 },
  'grok-3-mini': { input: 0.0003, output: 0.0005 },
  default: { input: 0.0025, output: 0.01 },
}

export interface OpenAIProviderOptions {
  /** OpenAI-compatible endpoint, e.g. OpenRouter or xAI */
  baseURL?: string
  /** Name reported by getModelInfo */
  providerName?: string
  defaultHeaders?: Record<string, string>
  pricing?: Record<string, ModelPricing>
}

export class OpenAIProvider implements AIProvider {
  private openai: OpenAI
  private config: AIModelConfig
  private providerName: string
  private pricing: Record<string, ModelPricing>

  constructor(config: AIModelConfig, options: OpenAIProviderOptions = {}) {
    this.config = config
    this.providerName = options.providerName || 'openai'
    this.pricing = options.pricing || OPENAI_PRICING
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: options.baseURL,
      defaultHeaders: options.defaultHeaders,
    })
  }

  /**
   * Calculate estimated cost based on token usage and model
   */
  private calculateCost(
    promptTokens: number,
    completionTokens: number,
    model: string
  ): number {
    const pricing = this.pricing[model] || OPENAI_PRICING['default']

    const inputCost = (promptTokens / 1000) * pricing.input
    const outputCost = (completionTokens / 1000) * pricing.output

    return inputCost + outputCost
  }

  async complete(request: CompletionRequest): Promise<AIResponseFormat> {
    const model = this.config.model
    const completion = await this.openai.chat.completions.create(
      {
        model,
        temperature: this.config.temperature ?? 0,
        max_tokens: this.config.maxTokens || 4096,
        response_format: request.jsonMode ? { type: 'json_object' } : undefined,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
      },
      { signal: request.signal }
    )

    const text = completion.choices[0]?.message?.content || ''

    const promptTokens = completion.usage?.prompt_tokens || 0
    const completionTokens = completion.usage?.completion_tokens || 0
    const tokenUsage: TokenUsageInfo = {
      promptTokens,
      completionTokens,
      totalTokens: completion.usage?.total_tokens || promptTokens + completionTokens,
      estimatedCost: this.calculateCost(promptTokens, completionTokens, model),
    }

    return { text, tokenUsage }
  }

  getModelInfo(): { provider: string; model: string } {
    return {
      provider: this.providerName,
      model: this.config.model,
    }
  }
}
