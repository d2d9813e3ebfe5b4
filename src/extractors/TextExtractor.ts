import * as fs from 'fs'
import { OcrEngine, PageRasterizer } from '../types'
import { PdftoppmRasterizer } from '../utils/document'
import {
  PageRecognitionError,
  UnsupportedDocumentError,
  describeError,
} from '../utils/errors'
import { TesseractOcrEngine } from '../utils/ocr'
import { cleanText } from '../utils/text'

export interface TextExtractionResult {
  text: string
  pageCount: number
  /** 1-based numbers of pages whose OCR failed */
  failedPages: number[]
}

export interface TextExtractorOptions {
  verbose?: boolean
}

/**
 * Class for extracting text from scanned documents: rasterize, OCR every
 * page, join in page order and clean
 */
export class TextExtractor {
  private rasterizer: PageRasterizer
  private ocrEngine: OcrEngine
  private verbose: boolean

  constructor(
    rasterizer: PageRasterizer = new PdftoppmRasterizer(),
    ocrEngine: OcrEngine = new TesseractOcrEngine(),
    options: TextExtractorOptions = {}
  ) {
    this.rasterizer = rasterizer
    this.ocrEngine = ocrEngine
    this.verbose = options.verbose || false
  }

  async extract(document: Buffer): Promise<string> {
    const { text } = await this.extractWithDetails(document)
    return text
  }

  async extractWithDetails(document: Buffer): Promise<TextExtractionResult> {
    let pages: Buffer[]
    try {
      pages = await this.rasterizer.renderPages(document)
    } catch (error) {
      throw new UnsupportedDocumentError(
        `Could not rasterize document: ${describeError(error)}`,
        { cause: error }
      )
    }

    if (pages.length === 0) {
      throw new UnsupportedDocumentError('Document has no pages')
    }

    const failedPages: number[] = []
    const texts = await Promise.all(
      pages.map((image, index) =>
        this.recognizePage(image, index + 1, pages.length, failedPages)
      )
    )
    failedPages.sort((a, b) => a - b)

    return {
      text: cleanText(texts.join('\n')),
      pageCount: pages.length,
      failedPages,
    }
  }

  async extractFromFile(filePath: string): Promise<TextExtractionResult> {
    console.log(`Extracting text from PDF: ${filePath}`)
    const document = await fs.promises.readFile(filePath)
    return this.extractWithDetails(document)
  }

  async terminate(): Promise<void> {
    if (this.ocrEngine.terminate) {
      await this.ocrEngine.terminate()
    }
  }

  // A failed page becomes "" so the rest of the document still comes through
  private async recognizePage(
    image: Buffer,
    pageNumber: number,
    pageCount: number,
    failedPages: number[]
  ): Promise<string> {
    if (this.verbose) {
      console.log(`  OCR processing page ${pageNumber}/${pageCount}...`)
    }

    try {
      return await this.ocrEngine.recognize(image)
    } catch (error) {
      const failure = new PageRecognitionError(pageNumber, { cause: error })
      console.warn(`[TextExtractor] ${failure.message}: ${describeError(error)}`)
      failedPages.push(pageNumber)
      return ''
    }
  }
}
