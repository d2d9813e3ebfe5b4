import { ExtractionStrategy, ResumeRecord, StrategyName } from '../types'
import { TokenUsageInfo } from '../types/AIProvider'
import { ConfigurationError } from '../utils/errors'
import { HeuristicExtractor } from './HeuristicExtractor'
import { ModelAssistedExtractor } from './ModelAssistedExtractor'

export interface SectionParseResult {
  record: ResumeRecord
  strategy: StrategyName
  provider: string
  model: string
  tokenUsage?: TokenUsageInfo
}

/**
 * Turns raw resume text into a record with the strategy the caller picks.
 * Both strategies produce the same record shape.
 */
export class SectionParser {
  private heuristic: HeuristicExtractor
  private model?: ModelAssistedExtractor

  constructor(
    heuristic: HeuristicExtractor = new HeuristicExtractor(),
    model?: ModelAssistedExtractor
  ) {
    this.heuristic = heuristic
    this.model = model
  }

  async parse(
    text: string,
    strategy: StrategyName = 'heuristic'
  ): Promise<ResumeRecord> {
    return this.getStrategy(strategy).parse(text)
  }

  async parseWithDetails(
    text: string,
    strategy: StrategyName = 'heuristic'
  ): Promise<SectionParseResult> {
    if (strategy === 'heuristic') {
      return {
        record: this.heuristic.parse(text),
        strategy,
        provider: 'heuristic',
        model: 'rule-based',
      }
    }

    const { record, tokenUsage, provider, model } =
      await this.requireModel().parseWithUsage(text)
    return { record, strategy, provider, model, tokenUsage }
  }

  getStrategy(strategy: StrategyName): ExtractionStrategy {
    return strategy === 'model' ? this.requireModel() : this.heuristic
  }

  hasModel(): boolean {
    return this.model !== undefined
  }

  private requireModel(): ModelAssistedExtractor {
    if (!this.model) {
      throw new ConfigurationError(
        'Model-assisted parsing requested but no completion provider is configured'
      )
    }
    return this.model
  }
}
