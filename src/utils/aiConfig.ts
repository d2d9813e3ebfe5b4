import { AIProviderType } from '../ai/AIProviderFactory'
import { ProviderConfig } from '../types/AIProvider'
import { ConfigurationError } from './errors'

type Env = Record<string, string | undefined>

/**
 * Get AI configuration based on provider type and model
 * @param aiModel Optional specific model to use
 * @param env Variables to read, process.env by default
 */
export function getAIConfig(
  providerType: AIProviderType,
  aiModel?: string,
  env: Env = process.env
): ProviderConfig {
  const apiKeyEnvVar = `${providerType.toUpperCase()}_API_KEY`
  const apiKey = env[apiKeyEnvVar]

  if (!apiKey) {
    throw new ConfigurationError(
      `API key not found in environment variables (${apiKeyEnvVar}). Please set it in your .env file or environment`
    )
  }

  const aiConfig: ProviderConfig = {
    apiKey,
    model: aiModel || getDefaultModelForProvider(providerType),
  }

  if (providerType === 'azure') {
    const endpoint = env.AZURE_OPENAI_ENDPOINT
    if (!endpoint) {
      throw new ConfigurationError(
        'AZURE_OPENAI_ENDPOINT not found in environment variables'
      )
    }
    aiConfig.endpoint = endpoint
    aiConfig.apiVersion = env.AZURE_OPENAI_API_VERSION || '2024-10-21'
    aiConfig.deploymentName = env.AZURE_OPENAI_DEPLOYMENT_NAME || undefined
  } else if (providerType === 'openrouter') {
    aiConfig.referer = env.OPENROUTER_REFERER || undefined
  }

  return aiConfig
}

/**
 * Get the default model name for a given AI provider
 */
export function getDefaultModelForProvider(provider: AIProviderType): string {
  switch (provider) {
    case 'openai':
      return 'gpt-4o-mini'
    case 'openrouter':
      return 'amazon/nova-micro-v1'
    case 'azure':
      return 'gpt-4o' // Or the deployment name will be used
    case 'gemini':
      return 'gemini-2.0-flash'
    case 'grok':
      return 'grok-3'
  }
}

export interface WatchConfig {
  inputDir: string
  processingDir: string
  /** OCR text waiting to be parsed */
  textDir: string
  processedDir: string
  parsedDir: string
  failedDir: string
  /** Seconds between polls */
  checkInterval: number
}

/**
 * Orchestrator settings: explicit options first, then RESUME_* variables,
 * then defaults
 */
export function getWatchConfig(
  overrides: Partial<WatchConfig> = {},
  env: Env = process.env
): WatchConfig {
  const interval = overrides.checkInterval ?? Number(env.RESUME_CHECK_INTERVAL || 5)
  if (!Number.isFinite(interval) || interval <= 0) {
    throw new ConfigurationError(
      `Check interval must be a positive number of seconds, got ${interval}`
    )
  }

  return {
    inputDir: overrides.inputDir || env.RESUME_INPUT_DIR || 'resumes',
    processingDir:
      overrides.processingDir || env.RESUME_PROCESSING_DIR || 'processing',
    textDir: overrides.textDir || env.RESUME_TEXT_DIR || 'tobeprocessed',
    processedDir:
      overrides.processedDir || env.RESUME_PROCESSED_DIR || 'processed',
    parsedDir: overrides.parsedDir || env.RESUME_PARSED_DIR || 'parsed',
    failedDir: overrides.failedDir || env.RESUME_FAILED_DIR || 'failed',
    checkInterval: interval,
  }
}
