import * as fs from 'fs'
import * as path from 'path'
import { type ResponseFormat, SYSTEM_PROMPT, buildUserPrompt } from '../ai/prompts'
import { ExtractionStrategy, ResumeRecord } from '../types'
import {
  AIProvider,
  AIResponseFormat,
  TokenUsageInfo,
} from '../types/AIProvider'
import { EmptyInputError, ServiceFailureError, describeError } from '../utils/errors'
import { parseModelReply } from '../utils/responseParser'
import { HeuristicExtractor } from './HeuristicExtractor'

export interface ModelAssistedOptions {
  responseFormat?: ResponseFormat
  /** Deadline for one completion call */
  timeoutMs?: number
  /** Directory for raw replies; nothing is written when unset */
  rawOutputDir?: string
  verbose?: boolean
}

export interface ModelParseResult {
  record: ResumeRecord
  tokenUsage?: TokenUsageInfo
  provider: string
  model: string
}

const DEFAULT_TIMEOUT_MS = 60_000

/**
 * Parse resume text by asking a completion service for a structured reply
 */
export class ModelAssistedExtractor implements ExtractionStrategy {
  readonly name = 'model' as const

  private aiProvider: AIProvider
  private heuristic: HeuristicExtractor
  private responseFormat: ResponseFormat
  private timeoutMs: number
  private rawOutputDir?: string
  private verbose: boolean

  constructor(
    aiProvider: AIProvider,
    options: ModelAssistedOptions = {},
    heuristic: HeuristicExtractor = new HeuristicExtractor()
  ) {
    this.aiProvider = aiProvider
    this.heuristic = heuristic
    this.responseFormat = options.responseFormat || 'markdown'
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.rawOutputDir = options.rawOutputDir
    this.verbose = options.verbose || false
  }

  async parse(text: string): Promise<ResumeRecord> {
    const { record } = await this.parseWithUsage(text)
    return record
  }

  async parseWithUsage(text: string): Promise<ModelParseResult> {
    if (!text.trim()) {
      throw new EmptyInputError()
    }

    const { provider, model } = this.aiProvider.getModelInfo()
    if (this.verbose) {
      console.log(`[ModelAssistedExtractor] Requesting ${provider}/${model}`)
    }

    const startTime = Date.now()
    const response = await this.requestCompletion(text)
    const duration = (Date.now() - startTime) / 1000

    const usage = response.tokenUsage
    console.log(
      `[ModelAssistedExtractor] Transaction complete: duration=${duration.toFixed(2)}s ` +
        `model=${model} length=${response.text.length} chars ` +
        `prompt_tokens=${usage?.promptTokens ?? 'N/A'} ` +
        `completion_tokens=${usage?.completionTokens ?? 'N/A'}`
    )

    if (this.rawOutputDir) {
      this.saveRawOutput(this.rawOutputDir, response, duration, model)
    }

    const record = parseModelReply(response.text, this.responseFormat, this.heuristic)
    return { record, tokenUsage: usage, provider, model }
  }

  private async requestCompletion(text: string): Promise<AIResponseFormat> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(
          new ServiceFailureError(
            `Completion timed out after ${this.timeoutMs}ms`,
            'timeout'
          )
        )
      }, this.timeoutMs)
    })

    const request = this.aiProvider
      .complete({
        systemPrompt: SYSTEM_PROMPT,
        userPrompt: buildUserPrompt(text, this.responseFormat),
        jsonMode: this.responseFormat === 'json',
        signal: controller.signal,
      })
      .catch((error: unknown) => {
        if (controller.signal.aborted) {
          // the deadline already rejected; this rejection is never observed
          throw error
        }
        throw new ServiceFailureError(
          `Completion request failed: ${describeError(error)}`,
          'request',
          { cause: error }
        )
      })

    try {
      return await Promise.race([request, deadline])
    } finally {
      clearTimeout(timer)
    }
  }

  private saveRawOutput(
    directory: string,
    response: AIResponseFormat,
    duration: number,
    model: string
  ): void {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    const outputFile = path.join(directory, `llm_output_${timestamp}.txt`)
    const usage = response.tokenUsage
    const separator = '='.repeat(50)

    fs.mkdirSync(directory, { recursive: true })
    fs.writeFileSync(
      outputFile,
      [
        `Duration: ${duration.toFixed(2)} seconds`,
        `Model: ${model}`,
        `Completion Tokens: ${usage?.completionTokens ?? 'N/A'}`,
        `Prompt Tokens: ${usage?.promptTokens ?? 'N/A'}`,
        '',
        'RAW LLM RESPONSE:',
        separator,
        response.text,
        separator,
      ].join('\n')
    )

    if (this.verbose) {
      console.log(`[ModelAssistedExtractor] Raw output saved to ${outputFile}`)
    }
  }
}
