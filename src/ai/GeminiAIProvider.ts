import { GoogleGenAI } from '@google/genai'
import {
  AIModelConfig,
  AIProvider,
  AIResponseFormat,
  CompletionRequest,
  TokenUsageInfo,
} from '../types/AIProvider'
import type { ModelPricing } from './OpenAIProvider'

const GEMINI_PRICING: Record<string, ModelPricing> = {
  // Gemini 2.5 models
  'gemini-2.5-flash': { input: 0.00015, output: 0.0006 },
  'gemini-2.5-pro': { input: 0.00125, output: 0.01 },

  // Gemini 2.0 models
  'gemini-2.0-flash': { input: 0.0001, output: 0.0004 },
  'gemini-2.0-flash-lite': { input: 0.000075, output: 0.0003 },

  // Gemini 1.5 models
  'gemini-1.5-pro': { input: 0.00125, output: 0.005 },
  'gemini-1.5-flash': { input: 0.000075, output: 0.0003 },

  default: { input: 0.00125, output: 0.005 },
}

export class GeminiAIProvider implements AIProvider {
  private ai: GoogleGenAI
  private config: AIModelConfig

  constructor(config: AIModelConfig) {
    this.config = config
    this.ai = new GoogleGenAI({ apiKey: config.apiKey })
  }

  /**
   * Calculate estimated cost based on token usage and model
   */
  private calculateCost(
    promptTokens: number,
    completionTokens: number,
    model: string
  ): number {
    const pricing = GEMINI_PRICING[model] || GEMINI_PRICING['default']

    const inputCost = (promptTokens / 1000) * pricing.input
    const outputCost = (completionTokens / 1000) * pricing.output

    return inputCost + outputCost
  }

  /**
   * Estimate token count based on text content
   */
  private estimateTokenCount(text: string): number {
    // Simple estimation: ~4 characters per token for English text
    return Math.ceil(text.length / 4)
  }

  async complete(request: CompletionRequest): Promise<AIResponseFormat> {
    const model = this.config.model

    const result = await this.ai.models.generateContent({
      model,
      contents: request.userPrompt,
      config: {
        systemInstruction: request.systemPrompt,
        temperature: this.config.temperature ?? 0,
        maxOutputTokens: this.config.maxTokens || 8192,
        responseMimeType: request.jsonMode ? 'application/json' : undefined,
        abortSignal: request.signal,
      },
    })

    const text = result.text || ''

    // Fall back to an estimate when the API omits usage metadata
    const promptTokens =
      result.usageMetadata?.promptTokenCount ??
      this.estimateTokenCount(request.systemPrompt + request.userPrompt)
    const completionTokens =
      result.usageMetadata?.candidatesTokenCount ?? this.estimateTokenCount(text)

    const tokenUsage: TokenUsageInfo = {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
      estimatedCost: this.calculateCost(promptTokens, completionTokens, model),
    }

    return { text, tokenUsage }
  }

  getModelInfo(): { provider: string; model: string } {
    return {
      provider: 'gemini',
      model: this.config.model,
    }
  }
}
