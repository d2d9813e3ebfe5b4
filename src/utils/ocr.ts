import * as path from 'path'
import { OEM, type Worker, createWorker } from 'tesseract.js'
import { OcrEngine } from '../types'
import { ConfigurationError, describeError } from './errors'

// Folder inside each @tesseract.js-data/<lang> package with the LSTM model
const LANGUAGE_DATA_DIR = '4.0.0_best_int'

/**
 * Directory holding `<language>.traineddata.gz` from the installed
 * `@tesseract.js-data/<language>` package
 */
export function resolveLanguageData(language: string): string {
  if (language.includes('+')) {
    throw new ConfigurationError(
      `OCR languages "${language}" need a shared data directory (--lang-path)`
    )
  }
  let manifest: string
  try {
    manifest = require.resolve(`@tesseract.js-data/${language}/package.json`)
  } catch (error) {
    throw new ConfigurationError(
      `OCR language data for "${language}" is not installed (@tesseract.js-data/${language}): ${describeError(error)}`
    )
  }
  return path.join(path.dirname(manifest), LANGUAGE_DATA_DIR)
}

/**
 * OCR with a single tesseract.js worker, created on first use.
 * The worker queues concurrent jobs itself. Language data is read from
 * disk, never fetched.
 */
export class TesseractOcrEngine implements OcrEngine {
  private worker: Promise<Worker> | null = null
  private readonly langPath: string

  constructor(
    private readonly language: string = 'eng',
    langPath?: string
  ) {
    this.langPath = langPath || resolveLanguageData(language)
  }

  async recognize(image: Buffer): Promise<string> {
    const worker = await this.getWorker()
    const { data } = await worker.recognize(image)
    return data.text
  }

  async terminate(): Promise<void> {
    if (!this.worker) {
      return
    }
    const pending = this.worker
    this.worker = null
    const worker = await pending
    await worker.terminate()
  }

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      this.worker = createWorker(this.language, OEM.LSTM_ONLY, {
        langPath: this.langPath,
        cacheMethod: 'none',
      }).catch((error: unknown) => {
        // let the next page retry
        this.worker = null
        throw error
      })
    }
    return this.worker
  }
}
