import * as path from 'path'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError } from '../utils/errors'
import { TesseractOcrEngine, resolveLanguageData } from '../utils/ocr'

const { createWorker, worker } = vi.hoisted(() => {
  const worker = {
    recognize: vi.fn(async () => ({ data: { text: 'page text' } })),
    terminate: vi.fn(async () => undefined),
  }
  return { worker, createWorker: vi.fn(async () => worker) }
})

vi.mock('tesseract.js', () => ({ createWorker, OEM: { LSTM_ONLY: 1 } }))

describe('resolveLanguageData', () => {
  it('points at the installed language data package', () => {
    const expected = path.join('@tesseract.js-data', 'eng', '4.0.0_best_int')
    expect(resolveLanguageData('eng').endsWith(expected)).toBe(true)
  })

  it('rejects a language without installed data', () => {
    expect(() => resolveLanguageData('xx-none')).toThrow(ConfigurationError)
  })

  it('asks for a data directory for combined languages', () => {
    expect(() => resolveLanguageData('eng+deu')).toThrow(
      'OCR languages "eng+deu" need a shared data directory (--lang-path)'
    )
  })
})

describe('TesseractOcrEngine', () => {
  beforeEach(() => {
    createWorker.mockClear()
    worker.terminate.mockClear()
  })

  it('loads language data from disk and reuses one worker', async () => {
    const engine = new TesseractOcrEngine('eng+deu', '/data/tessdata')

    expect(await engine.recognize(Buffer.from('one'))).toBe('page text')
    expect(await engine.recognize(Buffer.from('two'))).toBe('page text')

    expect(createWorker).toHaveBeenCalledTimes(1)
    expect(createWorker).toHaveBeenCalledWith('eng+deu', 1, {
      langPath: '/data/tessdata',
      cacheMethod: 'none',
    })
  })

  it('defaults to the installed English data', async () => {
    const engine = new TesseractOcrEngine()
    await engine.recognize(Buffer.from('one'))

    expect(createWorker).toHaveBeenCalledWith('eng', 1, {
      langPath: resolveLanguageData('eng'),
      cacheMethod: 'none',
    })
  })

  it('terminates the worker once', async () => {
    const engine = new TesseractOcrEngine('eng', '/data/tessdata')
    await engine.recognize(Buffer.from('one'))

    await engine.terminate()
    await engine.terminate()

    expect(worker.terminate).toHaveBeenCalledTimes(1)
  })
})
