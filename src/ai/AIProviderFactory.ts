import { AIProvider, ProviderConfig } from '../types/AIProvider'
import { ConfigurationError } from '../utils/errors'
import { AzureOpenAIProvider } from './AzureOpenAIProvider'
import { GeminiAIProvider } from './GeminiAIProvider'
import { OpenAIProvider } from './OpenAIProvider'

export type AIProviderType = 'openai' | 'openrouter' | 'azure' | 'gemini' | 'grok'

export const AI_PROVIDER_TYPES: readonly AIProviderType[] = [
  'openai',
  'openrouter',
  'azure',
  'gemini',
  'grok',
]

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'
export const GROK_BASE_URL = 'https://api.x.ai/v1'

export function isAIProviderType(value: string): value is AIProviderType {
  return AI_PROVIDER_TYPES.some((type) => type === value)
}

export class AIProviderFactory {
  /**
   * Create an AI provider instance based on the specified type
   */
  static createProvider(type: AIProviderType, config: ProviderConfig): AIProvider {
    switch (type) {
      case 'openai':
        return new OpenAIProvider(config)
      case 'openrouter': {
        const headers: Record<string, string> = { 'X-Title': 'Resume Extractor' }
        if (config.referer) {
          headers['HTTP-Referer'] = config.referer
        }
        return new OpenAIProvider(config, {
          baseURL: OPENROUTER_BASE_URL,
          providerName: 'openrouter',
          defaultHeaders: headers,
        })
      }
      case 'grok':
        return new OpenAIProvider(config, {
          baseURL: GROK_BASE_URL,
          providerName: 'grok',
        })
      case 'azure':
        if (!config.endpoint) {
          throw new ConfigurationError('Azure OpenAI provider requires an endpoint')
        }
        return new AzureOpenAIProvider({ ...config, endpoint: config.endpoint })
      case 'gemini':
        return new GeminiAIProvider(config)
    }
  }
}
