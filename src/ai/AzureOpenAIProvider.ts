import { AzureOpenAI } from 'openai'
import {
  AIModelConfig,
  AIProvider,
  AIResponseFormat,
  CompletionRequest,
  TokenUsageInfo,
} from '../types/AIProvider'
import type { ModelPricing } from './OpenAIProvider'

export interface AzureOpenAIConfig extends AIModelConfig {
  endpoint: string
  apiVersion?: string
  deploymentName?: string
}

/**
 * Similar to OpenAI prices, but can vary based on Azure pricing tiers
 */
const AZURE_OPENAI_PRICING: Record<string, ModelPricing> = {
  'gpt-4': { input: 0.03, output: 0.06 },
  'gpt-4-turbo': { input: 0.01, output: 0.03 },
  'gpt-4o': { input: 0.0025, output: 0.01 },
  'gpt-4o-mini': { input: 0.000165, output: 0.00066 },
  'gpt-4.1': { input: 0.002, output: 0.008 },
  'gpt-4.1-mini': { input: 0.0004, output: 0.0016 },
  'gpt-35-turbo': { input: 0.0005, output: 0.0015 },
  default: { input: 0.002, output: 0.008 },
}

// Reasoning deployments reject a custom temperature
const FIXED_TEMPERATURE_MODELS = /(^|-)(o\d|o\d-mini)($|-)/

export class AzureOpenAIProvider implements AIProvider {
  private client: AzureOpenAI
  private config: AzureOpenAIConfig
  private deploymentName: string

  constructor(config: AzureOpenAIConfig) {
    this.config = config

    if (!config.deploymentName) {
      console.warn(
        `[AzureOpenAIProvider] No deploymentName provided, using model name "${config.model}" as the deployment name`
      )
    }
    this.deploymentName = config.deploymentName || config.model

    this.client = new AzureOpenAI({
      apiKey: config.apiKey,
      endpoint: config.endpoint,
      apiVersion: config.apiVersion || '2024-10-21',
      deployment: this.deploymentName,
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
    // First try the exact name, then a deployment name containing a model id
    let pricing = AZURE_OPENAI_PRICING[model]
    if (!pricing) {
      const matchingKey = Object.keys(AZURE_OPENAI_PRICING)
        .sort((a, b) => b.length - a.length)
        .find((key) => model.toLowerCase().includes(key.toLowerCase()))
      pricing = matchingKey
        ? AZURE_OPENAI_PRICING[matchingKey]
        : AZURE_OPENAI_PRICING['default']
    }

    const inputCost = (promptTokens / 1000) * pricing.input
    const outputCost = (completionTokens / 1000) * pricing.output

    return inputCost + outputCost
  }

  async complete(request: CompletionRequest): Promise<AIResponseFormat> {
    const completion = await this.client.chat.completions.create(
      {
        // Required by the SDK but ignored by Azure, which routes on deployment
        model: this.deploymentName,
        temperature: FIXED_TEMPERATURE_MODELS.test(this.deploymentName)
          ? undefined
          : this.config.temperature ?? 0,
        max_completion_tokens: this.config.maxTokens || 4096,
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
      estimatedCost: this.calculateCost(
        promptTokens,
        completionTokens,
        this.deploymentName
      ),
    }

    return { text, tokenUsage }
  }

  getModelInfo(): { provider: string; model: string } {
    return {
      provider: 'azure',
      model: this.deploymentName,
    }
  }
}
