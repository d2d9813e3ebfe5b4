import { execFile } from 'child_process'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { promisify } from 'util'
import { PageRasterizer } from '../types'

const execFileAsync = promisify(execFile)

const PAGE_FILE = /^page-(\d+)\.png$/

export interface PdftoppmOptions {
  /** Render resolution in DPI */
  resolution?: number
  verbose?: boolean
}

/**
 * True when the PDF signature appears in the first kilobyte
 */
export function looksLikePdf(document: Buffer): boolean {
  return document.subarray(0, 1024).includes('%PDF-')
}

/**
 * Order pdftoppm output ("page-2.png" before "page-10.png") and drop
 * anything else in the directory
 */
export function sortPageFiles(files: readonly string[]): string[] {
  return files
    .map((file) => ({ file, match: PAGE_FILE.exec(file) }))
    .filter(
      (entry): entry is { file: string; match: RegExpExecArray } =>
        entry.match !== null
    )
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
    .map((entry) => entry.file)
}

/**
 * Renders PDF pages to PNG images with pdftoppm.
 * Requires poppler-utils to be installed.
 */
export class PdftoppmRasterizer implements PageRasterizer {
  private resolution: number
  private verbose: boolean

  constructor(options: PdftoppmOptions = {}) {
    this.resolution = options.resolution || 200
    this.verbose = options.verbose || false
  }

  async renderPages(document: Buffer): Promise<Buffer[]> {
    if (!looksLikePdf(document)) {
      throw new Error('Missing PDF header')
    }

    // Loaded on first use: pdf-parse reads a bundled sample file when it
    // is imported without a parent module
    const { default: pdfParse } = await import('pdf-parse')
    const info = await pdfParse(document, { max: 1 })
    if (this.verbose) {
      console.log(`[PdftoppmRasterizer] Document has ${info.numpages} page(s)`)
    }

    const tempDir = await fs.promises.mkdtemp(
      path.join(os.tmpdir(), 'resume-pages-')
    )

    try {
      const pdfPath = path.join(tempDir, 'document.pdf')
      await fs.promises.writeFile(pdfPath, document)

      await execFileAsync('pdftoppm', [
        '-png',
        '-r',
        String(this.resolution),
        pdfPath,
        path.join(tempDir, 'page'),
      ])

      const files = sortPageFiles(await fs.promises.readdir(tempDir))
      if (this.verbose) {
        console.log(
          `[PdftoppmRasterizer] Rendered ${files.length} page image(s): ${files.join(', ')}`
        )
      }

      return await Promise.all(
        files.map((file) => fs.promises.readFile(path.join(tempDir, file)))
      )
    } finally {
      await fs.promises.rm(tempDir, { recursive: true, force: true })
    }
  }
}
