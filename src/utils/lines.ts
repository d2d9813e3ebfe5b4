import {
  EducationLabels,
  ExperienceLabels,
  type LabelTable,
  Patterns,
  PersonalLabels,
  ProjectLabels,
  SectionSynonyms,
  SkillLabels,
} from './patterns'
import { cleanValue, escapeRegExp, isPlaceholder, normalizeKey } from './text'

export type ClassifiedLine =
  | { kind: 'item'; text: string; line: string }
  | {
      kind: 'field'
      label: string
      value: string
      placeholder: boolean
      line: string
    }
  | { kind: 'text'; text: string; line: string }

function byLengthDesc(a: string, b: string): number {
  return b.length - a.length
}

const FIELD_LABELS = Array.from(
  new Set(
    [
      ...PersonalLabels,
      ...EducationLabels,
      ...ExperienceLabels,
      ...SkillLabels,
      ...ProjectLabels,
    ].flatMap(([, aliases]) => aliases)
  )
).sort(byLengthDesc)

// "Phone number", "PHONE NUMBER" or "Phone Number" but never "phone number"
function capitalizedPattern(label: string): string {
  return Array.from(label)
    .map((char, index) => {
      const upper = char.toUpperCase()
      const lower = char.toLowerCase()
      if (upper === lower) {
        return char === ' ' ? '\\s+' : escapeRegExp(char)
      }
      return index === 0 ? upper : `[${upper}${lower}]`
    })
    .join('')
}

const INLINE_LABEL = new RegExp(
  `(^|\\s+)(${FIELD_LABELS.map(capitalizedPattern).join('|')})(\\s*:)`,
  'g'
)

const UPPERCASE_HEADERS = Array.from(
  new Set(Object.values(SectionSynonyms).flat())
)
  .sort(byLengthDesc)
  .map((name) =>
    escapeRegExp(name.toUpperCase())
      .replace(/ AND /g, ' (?:AND|&) ')
      .replace(/ /g, '\\s+')
  )

// "EDUCATION" on its own, or "SKILLS:" unless it ends "TECHNICAL SKILLS:"
const INLINE_HEADER = new RegExp(
  `(^|(?<![#.)])\\s+)(${UPPERCASE_HEADERS.join('|')})(?=\\s|$)(?!\\s*:)`,
  'g'
)
const INLINE_HEADER_WITH_COLON = new RegExp(
  `(^|(?<![#.)A-Z])\\s+)(${UPPERCASE_HEADERS.join('|')})\\s*:`,
  'g'
)

// Title-case names only split collapsed OCR text. "Personal" alone is left
// out: it opens too many project names ("Personal Finance Tracker").
const TITLECASE_HEADERS = Array.from(
  new Set(Object.values(SectionSynonyms).flat())
)
  .filter((name) => name !== 'personal')
  .sort(byLengthDesc)
  .map((name) =>
    name
      .split(' ')
      .map((word, index) => {
        if (word === 'and') {
          return '(?:and|And|&)'
        }
        const rest = escapeRegExp(word.slice(1))
        const first = word.charAt(0)
        return index === 0
          ? `${first.toUpperCase()}${rest}`
          : `[${first.toUpperCase()}${first}]${rest}`
      })
      .join('\\s+')
  )

// "Experience Acme Corp", "Education **State University**", "Skills • Go"
const TITLECASE_HEADER = new RegExp(
  `(^|\\s+)(${TITLECASE_HEADERS.join('|')})(?=\\s+(?:[A-Z#(•]|\\*\\*[A-Z]))`,
  'g'
)
// "things Skills: Go" but not "Technical Skills: Go"
const TITLECASE_HEADER_WITH_COLON = new RegExp(
  `(^|(?<![A-Z][\\w-]*)\\s+)(${TITLECASE_HEADERS.join('|')})\\s*:`,
  'g'
)

function ownLine(_match: string, _lead: string, name: string): string {
  return `\n${name}\n`
}

function splitSegment(segment: string, collapsed: boolean): string[] {
  const titled =
    collapsed && !segment.trimStart().startsWith('#')
      ? segment
          .replace(TITLECASE_HEADER, ownLine)
          .replace(TITLECASE_HEADER_WITH_COLON, ownLine)
      : segment
  return titled
    .replace(/\s+(?=•)/g, '\n')
    .replace(INLINE_HEADER, ownLine)
    .replace(INLINE_HEADER_WITH_COLON, ownLine)
    .replace(
      INLINE_LABEL,
      (_match, lead: string, label: string, colon: string) =>
        `${lead ? '\n' : ''}${label}${colon}`
    )
    .split('\n')
}

/**
 * Break text into logical lines.
 *
 * Model replies keep their newlines, but cleaned OCR text is one long
 * line, so bullets, inline headings, section names and "Label:" prefixes
 * also start a new line. Title-case section names count only when the
 * whole text is one line.
 */
export function splitLogicalLines(text: string): string[] {
  const collapsed = !text.trim().includes('\n')
  return text
    .split(/\r?\n/)
    .flatMap((line) =>
      line
        .replace(/\s+(?=#{2,6}\s)/g, '\n')
        .split('\n')
        .flatMap((segment) => splitSegment(segment, collapsed))
    )
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

/**
 * Reduce a heading line to the lower-case name used for section lookups
 */
export function normalizeHeading(text: string): string {
  return normalizeKey(
    text
      .replace(Patterns.emphasis, '')
      .trim()
      .replace(Patterns.numbering, '')
      .replace(/\s*:\s*$/, '')
  )
}

function fieldLine(
  label: string,
  rawValue: string,
  line: string
): ClassifiedLine {
  return {
    kind: 'field',
    label: normalizeKey(label),
    value: cleanValue(rawValue),
    placeholder: isPlaceholder(rawValue.replace(Patterns.emphasis, '')),
    line,
  }
}

/**
 * Classify one logical line as an item marker, a "Label: value" field or
 * plain text. Returns null for lines with nothing left after cleaning.
 */
export function classifyLine(rawLine: string): ClassifiedLine | null {
  const raw = rawLine.trim()
  if (!raw) {
    return null
  }

  const heading = Patterns.heading.exec(raw)
  if (heading) {
    const text = cleanValue(heading[2].replace(/\s*:\s*$/, ''))
    return text ? { kind: 'item', text, line: text } : null
  }

  const body = raw.replace(Patterns.listMarker, '')
  if (!body) {
    return null
  }
  const plain = cleanValue(body)

  const bold = Patterns.bold.exec(body)
  if (bold) {
    const strong = bold[2].trim()
    const rest = bold[3].trim()

    if (strong.endsWith(':')) {
      return fieldLine(strong.slice(0, -1), rest, plain)
    }
    if (rest.startsWith(':')) {
      return fieldLine(strong, rest.slice(1), plain)
    }

    const joined = !rest ? strong : /^[,;]/.test(rest) ? strong + rest : `${strong} ${rest}`
    const text = cleanValue(joined)
    return text ? { kind: 'item', text, line: text } : null
  }

  const labeled = Patterns.label.exec(body.replace(Patterns.emphasis, ''))
  if (labeled && !labeled[2].startsWith('//')) {
    return fieldLine(labeled[1], labeled[2], plain)
  }

  return plain ? { kind: 'text', text: plain, line: plain } : null
}

/**
 * First table entry listing the label wins
 */
export function matchLabel<F extends string>(
  label: string,
  table: LabelTable<F>
): F | undefined {
  const key = normalizeKey(label)
  for (const [field, aliases] of table) {
    if (aliases.includes(key)) {
      return field
    }
  }
  return undefined
}
