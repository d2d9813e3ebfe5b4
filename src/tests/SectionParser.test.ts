import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { HeuristicExtractor } from '../extractors/HeuristicExtractor'
import { ModelAssistedExtractor } from '../extractors/ModelAssistedExtractor'
import { SectionParser } from '../extractors/SectionParser'
import { ConfigurationError } from '../utils/errors'
import { JANE_ROE, StubProvider, readFixture, silenceConsole } from './helpers'

describe('SectionParser', () => {
  beforeEach(() => {
    silenceConsole()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('uses the heuristic strategy by default', async () => {
    const parser = new SectionParser()

    const record = await parser.parse('SKILLS Python, Go')

    expect(record.skills.technical).toEqual(['Python', 'Go'])
    expect(parser.hasModel()).toBe(false)
    expect(parser.getStrategy('heuristic').name).toBe('heuristic')
  })

  it('reports the rule-based parser in details', async () => {
    const result = await new SectionParser().parseWithDetails('SKILLS Python')
    expect(result.strategy).toBe('heuristic')
    expect(result.provider).toBe('heuristic')
    expect(result.model).toBe('rule-based')
    expect(result.tokenUsage).toBeUndefined()
  })

  it('rejects the model strategy when no model is configured', async () => {
    const parser = new SectionParser()
    await expect(parser.parse('SKILLS Python', 'model')).rejects.toBeInstanceOf(
      ConfigurationError
    )
    await expect(
      parser.parseWithDetails('SKILLS Python', 'model')
    ).rejects.toBeInstanceOf(ConfigurationError)
  })

  it('delegates to the model strategy', async () => {
    const heuristic = new HeuristicExtractor()
    const model = new ModelAssistedExtractor(
      StubProvider.replying(readFixture('markdown-reply.md')),
      {},
      heuristic
    )
    const parser = new SectionParser(heuristic, model)

    const result = await parser.parseWithDetails('SKILLS Python', 'model')

    expect(parser.hasModel()).toBe(true)
    expect(result.record).toEqual(JANE_ROE)
    expect(result.strategy).toBe('model')
    expect(result.provider).toBe('stub')
    expect(result.model).toBe('stub-model')
    expect(result.tokenUsage?.totalTokens).toBe(200)
  })
})
