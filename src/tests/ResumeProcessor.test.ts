import * as fs from 'fs'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ResumeProcessor } from '../ResumeProcessor'
import { HeuristicExtractor } from '../extractors/HeuristicExtractor'
import { ModelAssistedExtractor } from '../extractors/ModelAssistedExtractor'
import { SectionParser } from '../extractors/SectionParser'
import { TextExtractor } from '../extractors/TextExtractor'
import {
  EchoOcrEngine,
  FakeRasterizer,
  JANE_ROE,
  StubProvider,
  makeTempDir,
  readFixture,
  silenceConsole,
} from './helpers'

function createProcessor(): ResumeProcessor {
  return new ResumeProcessor(
    new TextExtractor(new FakeRasterizer(), new EchoOcrEngine()),
    new SectionParser()
  )
}

describe('ResumeProcessor', () => {
  beforeEach(() => {
    silenceConsole()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('parses text and records metadata', async () => {
    const processor = createProcessor()

    const { record, metadata } = await processor.processText(
      'SKILLS Python, Go',
      '/data/tobeprocessed/resume.txt'
    )

    expect(record.skills.technical).toEqual(['Python', 'Go'])
    expect(metadata.sourceFile).toBe('resume.txt')
    expect(metadata.strategy).toBe('heuristic')
    expect(metadata.provider).toBe('heuristic')
    expect(metadata.model).toBe('rule-based')
    expect(metadata.coverage).toEqual({
      percentage: 15,
      totalFields: 13,
      nonEmptyFields: 2,
    })
    expect(metadata.tokenUsage).toBeUndefined()
    expect(metadata.pageCount).toBeUndefined()
    expect(metadata.processingTime).toBeGreaterThanOrEqual(0)
    expect(Number.isNaN(Date.parse(metadata.processedDate))).toBe(false)
  })

  it('OCRs a document before parsing it', async () => {
    const filePath = path.join(makeTempDir(), 'resume.pdf')
    fs.writeFileSync(filePath, 'SKILLS Python\fEDUCATION State University')

    const { record, metadata } = await createProcessor().processResume(filePath)

    expect(record.skills.technical).toEqual(['Python'])
    expect(record.education[0].institution).toBe('State University')
    expect(metadata.sourceFile).toBe('resume.pdf')
    expect(metadata.pageCount).toBe(2)
    expect(metadata.failedPages).toEqual([])
  })

  it('uses the configured strategy', async () => {
    const heuristic = new HeuristicExtractor()
    const processor = new ResumeProcessor(
      new TextExtractor(new FakeRasterizer(), new EchoOcrEngine()),
      new SectionParser(
        heuristic,
        new ModelAssistedExtractor(
          StubProvider.replying(readFixture('markdown-reply.md')),
          {},
          heuristic
        )
      ),
      { strategy: 'model' }
    )

    const { record, metadata } = await processor.processText('resume', 'resume.txt')

    expect(processor.getStrategy()).toBe('model')
    expect(record).toEqual(JANE_ROE)
    expect(metadata.provider).toBe('stub')
    expect(metadata.tokenUsage?.promptTokens).toBe(120)
  })

  it('saves the record as JSON, creating directories', () => {
    const outputPath = path.join(makeTempDir(), 'nested', 'resume.json')

    createProcessor().saveToJson(JANE_ROE, outputPath)

    expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toEqual(JANE_ROE)
  })
})
