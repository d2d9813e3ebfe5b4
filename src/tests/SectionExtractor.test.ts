import { describe, expect, it } from 'vitest'
import { SectionExtractor } from '../extractors/SectionExtractor'

describe('SectionExtractor', () => {
  const extractor = new SectionExtractor()

  it('drops sections it does not know', () => {
    const text = '## Skills\nPython\n## Hobbies\nChess\n## Projects\n- **Tracker**'
    expect(extractor.segment(text)).toEqual([
      { section: 'skills', lines: ['Python'] },
      { section: 'projects', lines: ['- **Tracker**'] },
    ])
  })

  it('keeps deeper headings inside the current section', () => {
    const text = '## Experience\n### Acme Corp\n- Built things\n## Skills\nPython'
    expect(extractor.segment(text)).toEqual([
      { section: 'experience', lines: ['### Acme Corp', '- Built things'] },
      { section: 'skills', lines: ['Python'] },
    ])
  })

  it('matches headings by keyword', () => {
    const text = '# Jane Roe\n## Professional Experience Summary\n- Led teams'
    expect(extractor.segment(text)).toEqual([
      { section: 'experience', lines: ['- Led teams'] },
    ])
  })

  it('recognises plain header lines and drops text before the first one', () => {
    expect(extractor.segment('Jane Roe\nSKILLS\nPython, Go')).toEqual([
      { section: 'skills', lines: ['Python, Go'] },
    ])
  })

  it('finds upper-case headers inside one-line OCR text', () => {
    const text =
      'JANE ROE jane@example.com WORK EXPERIENCE Acme Corp SKILLS Python, Go'
    expect(extractor.segment(text)).toEqual([
      { section: 'experience', lines: ['Acme Corp'] },
      { section: 'skills', lines: ['Python, Go'] },
    ])
  })

  it('does not treat a bulleted word as a header', () => {
    expect(extractor.segment('## Experience\n- Contact')).toEqual([
      { section: 'experience', lines: ['- Contact'] },
    ])
  })

  it('returns nothing when there are no headers', () => {
    expect(extractor.segment('Just some prose about a person')).toEqual([])
  })
})
