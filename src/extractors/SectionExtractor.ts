import { SectionName } from '../types'
import { normalizeHeading, splitLogicalLines } from '../utils/lines'
import { Patterns, SectionKeywords, SectionSynonyms } from '../utils/patterns'

export interface SectionBuffer {
  section: SectionName
  lines: string[]
}

type CurrentSection = SectionName | 'unknown' | null

interface HeaderMatch {
  section: SectionName | 'unknown'
  level: number
}

/**
 * Per-call parse state. Nothing is kept on the extractor between calls.
 */
interface ParseContext {
  section: CurrentSection
  headerLevel: number
  buffer: string[]
  sections: SectionBuffer[]
}

/**
 * Class for splitting resume text into section buffers
 */
export class SectionExtractor {
  private readonly synonyms: Map<string, SectionName>

  constructor(
    synonyms: Record<SectionName, string[]> = SectionSynonyms,
    private readonly keywords: ReadonlyArray<
      readonly [SectionName, RegExp]
    > = SectionKeywords
  ) {
    this.synonyms = new Map()
    for (const [section, names] of Object.entries(synonyms)) {
      for (const name of names) {
        if (isSectionName(section)) {
          this.synonyms.set(name, section)
        }
      }
    }
  }

  /**
   * Walk the logical lines and return one buffer per recognised header,
   * in document order. Lines before the first header or under an unknown
   * header are dropped.
   */
  segment(text: string): SectionBuffer[] {
    const context: ParseContext = {
      section: null,
      headerLevel: 0,
      buffer: [],
      sections: [],
    }

    for (const line of splitLogicalLines(text)) {
      const header = this.matchHeader(line, context)
      if (header) {
        this.flush(context)
        context.section = header.section
        context.headerLevel = header.level
        continue
      }
      if (context.section && context.section !== 'unknown') {
        context.buffer.push(line)
      }
    }

    this.flush(context)
    return context.sections
  }

  private flush(context: ParseContext): void {
    if (context.section && context.section !== 'unknown') {
      context.sections.push({ section: context.section, lines: context.buffer })
    }
    context.buffer = []
  }

  private matchHeader(line: string, context: ParseContext): HeaderMatch | null {
    const heading = Patterns.heading.exec(line)

    if (heading) {
      const level = heading[1].length
      const name = normalizeHeading(heading[2])
      const exact = this.synonyms.get(name)
      if (exact) {
        return { section: exact, level }
      }

      // "### Acme Corp" under "## Experience" is an entry, not a section
      const inSection = context.section !== null && context.section !== 'unknown'
      if (inSection && level > context.headerLevel) {
        return null
      }

      for (const [section, keyword] of this.keywords) {
        if (keyword.test(name)) {
          return { section, level }
        }
      }
      return { section: 'unknown', level }
    }

    const section = this.synonyms.get(normalizeHeading(line))
    return section ? { section, level: 0 } : null
  }
}

function isSectionName(value: string): value is SectionName {
  return Object.prototype.hasOwnProperty.call(SectionSynonyms, value)
}
