import * as fs from 'fs'
import { glob } from 'glob'
import * as path from 'path'
import { ResumeProcessor } from './ResumeProcessor'
import { TextExtractor } from './extractors/TextExtractor'
import { WatchConfig } from './utils/aiConfig'
import { describeError } from './utils/errors'

export interface BatchSummary {
  resumes: { processed: number; failed: number }
  texts: { parsed: number; failed: number }
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * "20240131-154502"
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/**
 * Polls the input directory and moves each resume through
 * input -> processing -> processed (or failed), writing its OCR text to the
 * text directory. Pending text files are then parsed into JSON records.
 */
export class ResumeOrchestrator {
  private textExtractor: TextExtractor
  private processor: ResumeProcessor
  private config: WatchConfig
  private running = false
  private timer: NodeJS.Timeout | null = null
  private wake: (() => void) | null = null

  constructor(
    textExtractor: TextExtractor,
    processor: ResumeProcessor,
    config: WatchConfig
  ) {
    this.textExtractor = textExtractor
    this.processor = processor
    this.config = config
  }

  /**
   * Process everything currently pending, once
   */
  async runOnce(): Promise<BatchSummary> {
    this.ensureDirectories()
    const resumes = await this.processPendingResumes()
    const texts = await this.processPendingTexts()
    return { resumes, texts }
  }

  /**
   * Main loop; returns after stop() is called
   */
  async run(): Promise<void> {
    this.running = true
    console.log('Starting resume processing service...')
    console.log(`Monitoring directory: ${this.config.inputDir}`)
    console.log(`Checking every ${this.config.checkInterval} seconds`)

    while (this.running) {
      try {
        await this.runOnce()
      } catch (error) {
        console.error(`Error in main loop: ${describeError(error)}`)
      }
      if (this.running) {
        await this.sleep(this.config.checkInterval * 1000)
      }
    }

    console.log('Shutting down resume processing service...')
  }

  stop(): void {
    this.running = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    if (this.wake) {
      this.wake()
      this.wake = null
    }
  }

  async processPendingResumes(): Promise<BatchSummary['resumes']> {
    const summary = { processed: 0, failed: 0 }
    const pdfFiles = await this.listFiles(this.config.inputDir, '*.pdf')

    for (const pdfFile of pdfFiles) {
      let current = path.join(this.config.inputDir, pdfFile)
      try {
        console.log(`Moving ${pdfFile} to processing directory...`)
        current = this.moveFile(current, this.config.processingDir)

        const { text, pageCount, failedPages } =
          await this.textExtractor.extractFromFile(current)
        const stem = path.basename(current, path.extname(current))
        const outputFile = path.join(this.config.textDir, `${stem}.txt`)
        fs.writeFileSync(outputFile, text, 'utf-8')

        console.log(`✓ Successfully processed: ${pdfFile} (${pageCount} page(s))`)
        console.log(`  Saved to: ${outputFile}`)
        if (failedPages.length > 0) {
          console.warn(`  OCR failed on page(s): ${failedPages.join(', ')}`)
        }

        console.log(`Moving ${path.basename(current)} to processed directory...`)
        this.moveFile(current, this.config.processedDir)
        summary.processed++
      } catch (error) {
        console.error(`✗ Error processing ${pdfFile}: ${describeError(error)}`)
        this.quarantine(current)
        summary.failed++
      }
    }

    return summary
  }

  async processPendingTexts(): Promise<BatchSummary['texts']> {
    const summary = { parsed: 0, failed: 0 }
    const textFiles = await this.listFiles(this.config.textDir, '*.txt')

    for (const textFile of textFiles) {
      const textPath = path.join(this.config.textDir, textFile)
      try {
        console.log(`Starting processing of ${textFile}`)
        const text = fs.readFileSync(textPath, 'utf-8')
        const { record, metadata } = await this.processor.processText(
          text,
          textPath
        )

        const stem = path.basename(textFile, path.extname(textFile))
        this.processor.saveToJson(
          record,
          path.join(this.config.parsedDir, `${stem}.json`)
        )
        console.log(
          `Successfully parsed ${textFile} (coverage ${metadata.coverage.percentage}%)`
        )

        this.moveFile(textPath, this.config.processedDir)
        summary.parsed++
      } catch (error) {
        console.error(`Error processing text file ${textFile}: ${describeError(error)}`)
        this.quarantine(textPath)
        summary.failed++
      }
    }

    return summary
  }

  /**
   * Move a file, adding a timestamp when the name is taken
   */
  moveFile(filePath: string, destinationDir: string): string {
    const extension = path.extname(filePath)
    const stem = path.basename(filePath, extension)
    let destination = path.join(destinationDir, path.basename(filePath))

    if (fs.existsSync(destination)) {
      destination = path.join(
        destinationDir,
        `${stem}_${formatTimestamp(new Date())}${extension}`
      )
    }

    fs.renameSync(filePath, destination)
    return destination
  }

  private quarantine(filePath: string): void {
    if (!fs.existsSync(filePath)) {
      return
    }
    try {
      this.moveFile(filePath, this.config.failedDir)
    } catch (error) {
      console.error(
        `Could not move ${path.basename(filePath)} to failed directory: ${describeError(error)}`
      )
    }
  }

  private async listFiles(directory: string, pattern: string): Promise<string[]> {
    const files = await glob(pattern, { cwd: directory, nodir: true, nocase: true })
    return files.sort()
  }

  private ensureDirectories(): void {
    for (const directory of [
      this.config.inputDir,
      this.config.processingDir,
      this.config.textDir,
      this.config.processedDir,
      this.config.parsedDir,
      this.config.failedDir,
    ]) {
      fs.mkdirSync(directory, { recursive: true })
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve
      this.timer = setTimeout(() => {
        this.timer = null
        this.wake = null
        resolve()
      }, ms)
    })
  }
}
