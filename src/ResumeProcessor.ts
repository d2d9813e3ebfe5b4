import * as fs from 'fs'
import * as path from 'path'
import { SectionParser } from './extractors/SectionParser'
import { TextExtractor } from './extractors/TextExtractor'
import {
  ProcessingResult,
  ProcessorOptions,
  ResumeRecord,
  StrategyName,
} from './types'
import { FieldCoverageCalculator } from './utils/FieldCoverageCalculator'
import { describeError } from './utils/errors'

/**
 * Main resume processor: text extraction plus parsing for one document
 */
export class ResumeProcessor {
  private textExtractor: TextExtractor
  private sectionParser: SectionParser
  private verbose: boolean
  private strategy: StrategyName

  constructor(
    textExtractor: TextExtractor,
    sectionParser: SectionParser,
    options: ProcessorOptions = {}
  ) {
    this.textExtractor = textExtractor
    this.sectionParser = sectionParser
    this.verbose = options.verbose || false
    this.strategy = options.strategy || 'heuristic'

    if (this.verbose) {
      console.log(`Resume Processor initialized (strategy: ${this.strategy})`)
    }
  }

  /**
   * OCR a PDF resume and parse the text
   */
  async processResume(pdfPath: string): Promise<ProcessingResult> {
    console.log(`Processing resume: ${pdfPath}`)
    const startTime = Date.now()

    const extraction = await this.textExtractor.extractFromFile(pdfPath)
    const result = await this.parse(extraction.text, pdfPath, startTime)

    result.metadata.pageCount = extraction.pageCount
    result.metadata.failedPages = extraction.failedPages
    return result
  }

  /**
   * Parse text that was already extracted (a .txt file from an earlier run)
   */
  async processText(text: string, sourceFile: string): Promise<ProcessingResult> {
    return this.parse(text, sourceFile, Date.now())
  }

  private async parse(
    text: string,
    sourceFile: string,
    startTime: number
  ): Promise<ProcessingResult> {
    const parsed = await this.sectionParser.parseWithDetails(text, this.strategy)
    const coverage = FieldCoverageCalculator.calculateCoverage(parsed.record)
    const processingTime = (Date.now() - startTime) / 1000

    if (this.verbose) {
      console.log(
        `Field coverage: ${coverage.percentage}% (${coverage.nonEmptyFields}/${coverage.totalFields})`
      )
    }

    return {
      record: parsed.record,
      metadata: {
        processedDate: new Date().toISOString(),
        sourceFile: path.basename(sourceFile),
        strategy: parsed.strategy,
        provider: parsed.provider,
        model: parsed.model,
        processingTime,
        coverage,
        tokenUsage: parsed.tokenUsage,
      },
    }
  }

  /**
   * Save a record to a JSON file
   */
  saveToJson(record: ResumeRecord, outputPath: string): void {
    try {
      fs.mkdirSync(path.dirname(outputPath), { recursive: true })
      fs.writeFileSync(outputPath, JSON.stringify(record, null, 2))
      console.log(`Results saved to ${outputPath}`)
    } catch (error) {
      console.error(`Error saving JSON file: ${describeError(error)}`)
      throw error
    }
  }

  getStrategy(): StrategyName {
    return this.strategy
  }
}
