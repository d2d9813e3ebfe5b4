import fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { HeuristicExtractor } from '../extractors/HeuristicExtractor'
import { EmptyInputError } from '../utils/errors'
import { emptyEducation } from '../utils/record'
import { cleanText } from '../utils/text'
import { JANE_ROE, readFixture } from './helpers'

describe('HeuristicExtractor', () => {
  const extractor = new HeuristicExtractor()

  it('parses a markdown reply', () => {
    const { record, sectionsMatched } = extractor.parseWithStats(
      readFixture('markdown-reply.md')
    )
    expect(record).toEqual(JANE_ROE)
    expect(sectionsMatched).toBe(5)
  })

  it('returns a frozen record', () => {
    const record = extractor.parse(readFixture('markdown-reply.md'))
    expect(Object.isFrozen(record)).toBe(true)
    expect(Object.isFrozen(record.skills.technical)).toBe(true)
    expect(Object.isFrozen(record.education[0].certifications[0])).toBe(true)
  })

  it('parses cleaned OCR text', () => {
    const record = extractor.parse(
      'JANE ROE CONTACT Email: jane@example.com Phone: 555-0100 ' +
        'EDUCATION State University Bachelor of Science in Biology 2012 - 2016 ' +
        'EXPERIENCE • Built data pipelines • Mentored interns ' +
        'SKILLS Python, SQL, Excel'
    )
    expect(record.personal_info.email).toBe('jane@example.com')
    expect(record.personal_info.phone).toBe('555-0100')
    expect(record.education).toEqual([
      {
        ...emptyEducation(),
        institution: 'State University',
        degree: 'Bachelor of Science in Biology',
        dates: '2012 - 2016',
      },
    ])
    expect(record.experience[0].achievements).toEqual([
      'Built data pipelines',
      'Mentored interns',
    ])
    expect(record.skills.technical).toEqual(['Python', 'SQL', 'Excel'])
  })

  it('parses cleaned OCR text with one school per date range', () => {
    const record = extractor.parse(
      cleanText(
        'EDUCATION\nState University\nBachelor of Science, 2012 - 2016\n' +
          'City College\nMaster of Arts, 2016 - 2018'
      )
    )
    expect(record.education.map((entry) => entry.institution)).toEqual([
      'State University',
      'City College',
    ])
    expect(record.education.map((entry) => entry.degree)).toEqual([
      'Bachelor of Science',
      'Master of Arts',
    ])
    expect(record.education.map((entry) => entry.dates)).toEqual([
      '2012 - 2016',
      '2016 - 2018',
    ])
  })

  it('parses cleaned OCR text with title-case section names', () => {
    const record = extractor.parse(
      cleanText('Jane Roe\nExperience\nAcme Corp\nBuilt things\nSkills\nPython, Go')
    )
    expect(record.experience).toHaveLength(1)
    expect(record.experience[0].achievements).toEqual(['Acme Corp Built things'])
    expect(record.skills.technical).toEqual(['Python', 'Go'])
  })

  it('keeps skill-looking lines under experience as achievements', () => {
    const record = extractor.parse('## Experience\n- Python, Go')
    expect(record.experience[0].achievements).toEqual(['Python, Go'])
    expect(record.skills.technical).toEqual([])
  })

  it('reads a labeled skills category', () => {
    const record = extractor.parse('SKILLS\nTechnical skills: Python, Go, SQL')
    expect(record.skills.technical).toEqual(['Python', 'Go', 'SQL'])
  })

  it('returns no projects when none are listed', () => {
    const record = extractor.parse('## Projects\nNo explicitly listed projects.')
    expect(record.projects).toEqual([])
  })

  it('merges repeated skills sections', () => {
    const record = extractor.parse(
      '## Skills\nPython, Go\n## Experience\n- Built things\n## Key Skills\ngo, Rust'
    )
    expect(record.skills.technical).toEqual(['Python', 'Go', 'Rust'])
  })

  it('rejects blank input', () => {
    expect(() => extractor.parse('')).toThrow(EmptyInputError)
    expect(() => extractor.parse(' \n\t')).toThrow(EmptyInputError)
  })

  it('returns an empty record when nothing is recognised', () => {
    const { record, sectionsMatched } =
      extractor.parseWithStats('Just some prose')
    expect(sectionsMatched).toBe(0)
    expect(record.education).toEqual([])
    expect(record.personal_info.name).toBe('')
  })

  it('returns a complete record for any non-blank input', () => {
    const token = fc.oneof(
      fc.string({ maxLength: 12 }),
      fc.constantFrom(
        '## Skills',
        '### Acme Corp',
        'EDUCATION',
        'Email:',
        '**Degree:**',
        '- ',
        '•',
        'Not specified',
        '2019 - 2021',
        '\n',
        ' '
      )
    )
    const text = fc
      .array(token, { minLength: 1, maxLength: 20 })
      .map((tokens) => tokens.join(' '))
      .filter((value) => value.trim().length > 0)

    fc.assert(
      fc.property(text, (value) => {
        const record = extractor.parse(value)
        expect(Object.keys(record).sort()).toEqual([
          'education',
          'experience',
          'personal_info',
          'projects',
          'skills',
        ])
        expect(Object.keys(record.skills).sort()).toEqual([
          'languages',
          'soft',
          'technical',
          'tools',
        ])
      })
    )
  })
})
