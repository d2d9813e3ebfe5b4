import { AIProviderFactory, isAIProviderType } from '../ai/AIProviderFactory'
import { ResponseFormat } from '../ai/prompts'
import { HeuristicExtractor } from '../extractors/HeuristicExtractor'
import { ModelAssistedExtractor } from '../extractors/ModelAssistedExtractor'
import { SectionParser } from '../extractors/SectionParser'
import { TextExtractor } from '../extractors/TextExtractor'
import { ResumeProcessor } from '../ResumeProcessor'
import { PdftoppmRasterizer } from '../utils/document'
import { getAIConfig } from '../utils/aiConfig'
import { ConfigurationError } from '../utils/errors'
import { TesseractOcrEngine } from '../utils/ocr'

/**
 * Options shared by the process and watch commands
 */
export interface PipelineOptions {
  verbose?: boolean
  /** Provider name, or true for the default provider */
  useAi?: string | boolean
  aiModel?: string
  responseFormat?: string
  /** Completion deadline in seconds */
  timeout?: string
  rawOutputDir?: string
  language?: string
  /** Directory with <language>.traineddata.gz files */
  langPath?: string
}

export interface Pipeline {
  textExtractor: TextExtractor
  processor: ResumeProcessor
}

const DEFAULT_PROVIDER = 'openrouter'

function parseResponseFormat(value: string | undefined): ResponseFormat {
  if (value === undefined || value === 'markdown' || value === 'json') {
    return value || 'markdown'
  }
  throw new ConfigurationError(
    `Unknown response format "${value}" (expected markdown or json)`
  )
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  const seconds = Number(value)
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`Invalid timeout "${value}"`)
  }
  return seconds * 1000
}

/**
 * Wire the extraction pipeline from CLI options and environment
 */
export function createPipeline(options: PipelineOptions): Pipeline {
  const verbose = options.verbose || false
  const heuristic = new HeuristicExtractor()
  let model: ModelAssistedExtractor | undefined

  if (options.useAi) {
    const providerType =
      options.useAi === true ? DEFAULT_PROVIDER : options.useAi
    if (!isAIProviderType(providerType)) {
      throw new ConfigurationError(
        `AI provider type ${providerType} not supported`
      )
    }
    console.log(`Using AI processing with provider: ${providerType}`)

    const aiConfig = getAIConfig(providerType, options.aiModel)
    const aiProvider = AIProviderFactory.createProvider(providerType, aiConfig)
    model = new ModelAssistedExtractor(
      aiProvider,
      {
        responseFormat: parseResponseFormat(options.responseFormat),
        timeoutMs: parseTimeout(options.timeout),
        rawOutputDir: options.rawOutputDir,
        verbose,
      },
      heuristic
    )
  }

  const textExtractor = new TextExtractor(
    new PdftoppmRasterizer({ verbose }),
    new TesseractOcrEngine(options.language || 'eng', options.langPath),
    { verbose }
  )
  const processor = new ResumeProcessor(
    textExtractor,
    new SectionParser(heuristic, model),
    { verbose, strategy: model ? 'model' : 'heuristic' }
  )

  return { textExtractor, processor }
}
