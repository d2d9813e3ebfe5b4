import { Certification } from '../types'
import { Patterns } from './patterns'

/**
 * Normalize raw OCR output.
 *
 * Bullet glyphs misread as "e", "o" or "-" at the start of a line become
 * "•", blank-line runs are squeezed, then every whitespace run (newlines
 * included) collapses to one space. Line structure is lost on purpose: OCR
 * line breaks are not reliable.
 */
export function cleanText(text: string): string {
  return text
    .replace(/^[^\S\n]*[eo-]\s+/gm, '• ')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/\s+/g, ' ')
    .trim()
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Lower-case a label or heading for table lookups
 */
export function normalizeKey(value: string): string {
  return value
    .replace(/&/g, ' and ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
}

export function isPlaceholder(value: string): boolean {
  return Patterns.placeholder.test(value.trim())
}

/**
 * Strip markdown emphasis and stray whitespace from a field value.
 * Placeholders such as "Not specified" come back as "".
 */
export function cleanValue(value: string): string {
  const cleaned = value
    .replace(Patterns.emphasis, '')
    .replace(/^[\s*_]+|[\s*_]+$/g, '')
    .replace(/\s+/g, ' ')

  return isPlaceholder(cleaned) ? '' : cleaned
}

/**
 * Split a comma (or semicolon/pipe/bullet) separated list into clean tokens
 */
export function splitList(value: string): string[] {
  return value
    .split(Patterns.listSeparator)
    .map((token) => cleanValue(token.replace(Patterns.listMarker, '')))
    .map((token) => token.replace(/\.$/, '').trim())
    .filter((token) => token.length > 0)
}

/**
 * Append values that are not already present (case-insensitive),
 * keeping first spelling and first position
 */
export function appendUnique(target: string[], values: readonly string[]): void {
  const seen = new Set(target.map((value) => value.toLowerCase()))
  for (const value of values) {
    const key = value.toLowerCase()
    if (!seen.has(key)) {
      seen.add(key)
      target.push(value)
    }
  }
}

/**
 * "AWS Certified Developer (2021)" -> { name: 'AWS Certified Developer', date: '2021' }
 */
export function splitCertification(text: string): Certification {
  const match = Patterns.trailingDate.exec(text)
  if (match && match.index > 0) {
    return {
      name: text.slice(0, match.index).replace(/[\s,;:–—-]+$/, ''),
      date: match[1],
    }
  }
  return { name: text, date: '' }
}
