import fc from 'fast-check'
import * as fs from 'fs'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { HeuristicExtractor } from '../extractors/HeuristicExtractor'
import { TextExtractor } from '../extractors/TextExtractor'
import { OcrEngine } from '../types'
import { UnsupportedDocumentError } from '../utils/errors'
import { emptyEducation } from '../utils/record'
import {
  EchoOcrEngine,
  FakeRasterizer,
  makeTempDir,
  rejection,
  silenceConsole,
  sleep,
} from './helpers'

/**
 * Echoes each page after a per-page delay, so later pages can finish first
 */
class DelayedOcrEngine implements OcrEngine {
  constructor(private readonly delays: Map<string, number>) {}

  async recognize(image: Buffer): Promise<string> {
    const text = image.toString('utf-8')
    await sleep(this.delays.get(text) ?? 0)
    return text
  }
}

class FailingOcrEngine implements OcrEngine {
  constructor(private readonly failOn: string) {}

  async recognize(image: Buffer): Promise<string> {
    const text = image.toString('utf-8')
    if (text === this.failOn) {
      throw new Error('boom')
    }
    return text
  }
}

function pages(...texts: string[]): Buffer {
  return Buffer.from(texts.join('\f'), 'utf-8')
}

describe('TextExtractor', () => {
  beforeEach(() => {
    silenceConsole()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('joins pages in page order whatever order OCR finishes in', async () => {
    const delays = new Map([
      ['first page', 30],
      ['second page', 10],
      ['third page', 0],
    ])
    const extractor = new TextExtractor(
      new FakeRasterizer(),
      new DelayedOcrEngine(delays)
    )

    const result = await extractor.extractWithDetails(
      pages('first page', 'second page', 'third page')
    )

    expect(result).toEqual({
      text: 'first page second page third page',
      pageCount: 3,
      failedPages: [],
    })
  })

  it('keeps page order for any completion order', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.integer({ min: 0, max: 15 }), { minLength: 1, maxLength: 5 }),
        async (delays) => {
          const texts = delays.map((_delay, index) => `page${index}`)
          const engine = new DelayedOcrEngine(
            new Map(texts.map((text, index) => [text, delays[index]] as const))
          )
          const extractor = new TextExtractor(new FakeRasterizer(), engine)

          expect(await extractor.extract(pages(...texts))).toBe(texts.join(' '))
        }
      ),
      { numRuns: 20 }
    )
  })

  it('substitutes an empty string for a page that fails OCR', async () => {
    const extractor = new TextExtractor(
      new FakeRasterizer(),
      new FailingOcrEngine('two')
    )

    const result = await extractor.extractWithDetails(pages('one', 'two', 'three'))

    expect(result.text).toBe('one three')
    expect(result.failedPages).toEqual([2])
    expect(console.warn).toHaveBeenCalledWith(
      '[TextExtractor] OCR failed on page 2: boom'
    )
  })

  it('cleans OCR output', async () => {
    const extractor = new TextExtractor(new FakeRasterizer(), new EchoOcrEngine())
    expect(await extractor.extract(pages('SKILLS\ne Python\no Go'))).toBe(
      'SKILLS • Python • Go'
    )
  })

  it('yields text the heuristic parser splits into title-case sections', async () => {
    const extractor = new TextExtractor(new FakeRasterizer(), new EchoOcrEngine())
    const text = await extractor.extract(
      pages(
        'Personal Information\nFull name: Jane Roe\nEmail: jane@example.com\n\n' +
          'Education\n**State University, Springfield**\nDates: 2014 - 2018\n\n' +
          'Skills\nTechnical skills: Python, Go'
      )
    )

    const record = new HeuristicExtractor().parse(text)

    expect(record.personal_info).toEqual({
      name: 'Jane Roe',
      email: 'jane@example.com',
      phone: '',
      location: '',
      linkedin: '',
    })
    expect(record.education).toEqual([
      {
        ...emptyEducation(),
        institution: 'State University',
        location: 'Springfield',
        dates: '2014 - 2018',
      },
    ])
    expect(record.skills.technical).toEqual(['Python', 'Go'])
  })

  it('rejects a document that cannot be rasterized', async () => {
    const extractor = new TextExtractor(new FakeRasterizer(), new EchoOcrEngine())

    const error = await rejection(extractor.extract(Buffer.from('broken')))

    expect(error).toBeInstanceOf(UnsupportedDocumentError)
    expect(error).toMatchObject({
      message: 'Could not rasterize document: not a PDF',
    })
  })

  it('rejects a document without pages', async () => {
    const extractor = new TextExtractor(new FakeRasterizer(), new EchoOcrEngine())

    await expect(extractor.extract(Buffer.alloc(0))).rejects.toThrow(
      'Document has no pages'
    )
  })

  it('reads a document from disk', async () => {
    const filePath = path.join(makeTempDir(), 'resume.pdf')
    fs.writeFileSync(filePath, 'SKILLS Python')
    const extractor = new TextExtractor(new FakeRasterizer(), new EchoOcrEngine())

    expect(await extractor.extractFromFile(filePath)).toEqual({
      text: 'SKILLS Python',
      pageCount: 1,
      failedPages: [],
    })
  })

  it('terminates the OCR engine', async () => {
    const engine = new EchoOcrEngine()
    await new TextExtractor(new FakeRasterizer(), engine).terminate()
    expect(engine.terminated).toBe(true)
  })
})
