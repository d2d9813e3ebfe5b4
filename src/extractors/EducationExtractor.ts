import { Education } from '../types'
import { type ClassifiedLine, classifyLine, matchLabel } from '../utils/lines'
import {
  CertificationKeywords,
  DegreeKeywords,
  EducationLabels,
  InstitutionKeywords,
  Patterns,
} from '../utils/patterns'
import { emptyEducation, hasContent } from '../utils/record'
import { appendUnique, splitCertification, splitList } from '../utils/text'

interface EducationState {
  entries: Education[]
  current: Education | null
  // Plain lines after a "Certifications:" label are certifications
  certifications: boolean
}

function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text))
}

/**
 * Class for extracting education entries from a section buffer
 */
export class EducationExtractor {
  extractEducation(lines: readonly string[]): Education[] {
    const state: EducationState = {
      entries: [],
      current: null,
      certifications: false,
    }

    for (const raw of lines) {
      const line = classifyLine(raw)
      if (!line) {
        continue
      }
      if (line.kind === 'item') {
        this.startEntry(state, line.text)
      } else if (line.kind === 'field') {
        this.applyField(state, line)
      } else {
        this.applyText(state, line.text)
      }
    }

    this.closeEntry(state)
    return state.entries
  }

  private startEntry(state: EducationState, heading: string): void {
    this.closeEntry(state)
    const entry = emptyEducation()
    this.assignInstitution(entry, heading)
    state.current = entry
    state.certifications = false
  }

  // "State University, Springfield" -> institution + location
  private assignInstitution(entry: Education, heading: string): void {
    const comma = heading.indexOf(',')
    if (comma >= 0) {
      entry.institution = heading.slice(0, comma).trim()
      entry.location = entry.location || heading.slice(comma + 1).trim()
    } else {
      entry.institution = heading
    }
  }

  private closeEntry(state: EducationState): void {
    if (state.current && hasContent(state.current)) {
      state.entries.push(state.current)
    }
    state.current = null
  }

  // Facts that show up before any heading open an implicit entry
  private currentEntry(state: EducationState): Education {
    if (!state.current) {
      state.current = emptyEducation()
    }
    return state.current
  }

  private applyField(
    state: EducationState,
    line: Extract<ClassifiedLine, { kind: 'field' }>
  ): void {
    const field = matchLabel(line.label, EducationLabels)
    if (!field) {
      this.applyText(state, line.line)
      return
    }

    if (field === 'institution') {
      this.startEntry(state, line.value)
      return
    }

    const entry = this.currentEntry(state)
    switch (field) {
      case 'degree':
      case 'dates':
      case 'location':
      case 'gpa':
        if (!entry[field]) {
          entry[field] = line.value
        }
        break
      case 'coursework':
        appendUnique(entry.coursework, splitList(line.value))
        break
      case 'certifications':
        state.certifications = !line.placeholder
        for (const name of splitList(line.value)) {
          entry.certifications.push(splitCertification(name))
        }
        break
    }
  }

  private applyText(state: EducationState, text: string): void {
    // "Certified Scrum Master" is a certification, not a master's degree
    if (state.certifications || matchesAny(text, CertificationKeywords)) {
      this.currentEntry(state).certifications.push(splitCertification(text))
      return
    }

    for (const chunk of splitAfterDates(text)) {
      this.applyChunk(state, chunk)
    }
  }

  private applyChunk(state: EducationState, text: string): void {
    if (matchesAny(text, DegreeKeywords)) {
      const school = splitSchool(text)
      if (school) {
        this.applyInstitution(state, school.institution)
        this.applyDegree(state, school.degree)
      } else {
        this.applyDegree(state, text)
      }
      return
    }

    if (matchesAny(text, InstitutionKeywords)) {
      this.applyInstitution(state, text)
      return
    }

    const gpa = Patterns.gpa.exec(text)
    if (gpa) {
      const entry = this.currentEntry(state)
      entry.gpa = entry.gpa || gpa[1]
      return
    }

    const years = Patterns.yearRange.exec(text)
    if (years) {
      const entry = this.currentEntry(state)
      entry.dates = entry.dates || years[0]
    }
  }

  // A second school name starts the next entry
  private applyInstitution(state: EducationState, name: string): void {
    const entry = state.current
    if (entry && !entry.institution) {
      this.assignInstitution(entry, name)
    } else {
      this.startEntry(state, name)
    }
  }

  private applyDegree(state: EducationState, text: string): void {
    const entry = this.currentEntry(state)
    let degree = text

    const gpa = Patterns.gpa.exec(degree)
    if (gpa) {
      entry.gpa = entry.gpa || gpa[1]
      degree = degree.replace(gpa[0], ' ')
    }

    const years = Patterns.yearRange.exec(degree)
    if (years) {
      entry.dates = entry.dates || years[0]
      degree = degree.replace(years[0], ' ')
    }

    degree = degree
      .replace(/\s+/g, ' ')
      .replace(/[\s,;|()–—-]+$/, '')
      .trim()
    entry.degree = entry.degree || degree
  }
}

// "A 2012 - 2016 B 2016 - 2018" holds two entries
function splitAfterDates(text: string): string[] {
  const pattern = new RegExp(Patterns.yearRange.source, 'gi')
  const chunks: string[] = []
  let start = 0
  let match: RegExpExecArray | null
  while ((match = pattern.exec(text)) !== null) {
    const end = match.index + match[0].length
    chunks.push(text.slice(start, end))
    start = end
  }
  chunks.push(text.slice(start))
  return chunks
    .map((chunk) => chunk.replace(/^[\s,;|)\]]+/, '').trim())
    .filter((chunk) => chunk.length > 0)
}

function firstIndex(text: string, patterns: readonly RegExp[]): number {
  const found = patterns
    .map((pattern) => pattern.exec(text)?.index ?? -1)
    .filter((index) => index >= 0)
  return found.length > 0 ? Math.min(...found) : -1
}

// "State University Bachelor of Science" or "Bachelor of Science, State University"
function splitSchool(text: string): { institution: string; degree: string } | null {
  const degreeAt = firstIndex(text, DegreeKeywords)
  if (degreeAt > 0) {
    const head = text.slice(0, degreeAt).replace(/[\s,;|–—-]+$/, '')
    if (matchesAny(head, InstitutionKeywords)) {
      return { institution: head, degree: text.slice(degreeAt) }
    }
  }

  const parts = text.split(/\s*[,;|]\s*/)
  const school = parts.find(
    (part) =>
      matchesAny(part, InstitutionKeywords) && !matchesAny(part, DegreeKeywords)
  )
  if (!school) {
    return null
  }
  return {
    institution: school,
    degree: parts.filter((part) => part !== school).join(', '),
  }
}
