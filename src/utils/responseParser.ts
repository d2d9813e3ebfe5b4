import { jsonrepair } from 'jsonrepair'
import type { ResponseFormat } from '../ai/prompts'
import type { HeuristicExtractor } from '../extractors/HeuristicExtractor'
import { ResumeData, ResumeRecord } from '../types'
import { ServiceFailureError } from './errors'
import { SKILL_CATEGORIES, freezeRecord, hasContent } from './record'
import { RESUME_KEYS, resumeSchema } from './resumeSchema'
import { appendUnique } from './text'

// A markdown reply may open with a link, so only an object or a json fence counts
const JSON_START = /^(?:\{|```json\b|```\s*\{)/i
const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i

/**
 * Turn a completion reply into a record. Markdown replies go through the
 * heuristic section parser; JSON replies are repaired and validated.
 */
export function parseModelReply(
  reply: string,
  format: ResponseFormat,
  heuristic: HeuristicExtractor
): ResumeRecord {
  const trimmed = reply.trim()
  if (!trimmed) {
    throw new ServiceFailureError('Model returned an empty reply', 'empty')
  }

  if (format === 'json' || JSON_START.test(trimmed)) {
    return parseJsonReply(trimmed)
  }

  const { record, sectionsMatched } = heuristic.parseWithStats(trimmed)
  if (sectionsMatched === 0) {
    throw new ServiceFailureError(
      'Model reply has no recognizable section headers',
      'malformed'
    )
  }
  return record
}

function extractJsonBody(reply: string): string {
  const fenced = FENCED_BLOCK.exec(reply)
  if (fenced) {
    return fenced[1].trim()
  }

  const start = reply.indexOf('{')
  const end = reply.lastIndexOf('}')
  if (start === -1 || end <= start) {
    throw new ServiceFailureError('Model reply contains no JSON object', 'malformed')
  }
  return reply.slice(start, end + 1)
}

function decodeJson(body: string): unknown {
  try {
    return JSON.parse(jsonrepair(body))
  } catch (error) {
    throw new ServiceFailureError('Model reply is not valid JSON', 'malformed', {
      cause: error,
    })
  }
}

export function parseJsonReply(reply: string): ResumeRecord {
  const parsed = decodeJson(extractJsonBody(reply))

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ServiceFailureError('Model reply is not a JSON object', 'malformed')
  }
  if (!RESUME_KEYS.some((key) => key in parsed)) {
    throw new ServiceFailureError(
      'Model reply has none of the resume sections',
      'malformed'
    )
  }

  const result = resumeSchema.safeParse(parsed)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ServiceFailureError(
      `Model reply does not match the resume schema: ${issue.path.join('.')} ${issue.message}`,
      'validation',
      { cause: result.error }
    )
  }

  const data: ResumeData = result.data
  return freezeRecord(normalizeRecord(data))
}

/**
 * Drop empty entries and de-duplicate the lists a parser would de-duplicate
 */
function normalizeRecord(data: ResumeData): ResumeData {
  for (const category of SKILL_CATEGORIES) {
    const unique: string[] = []
    appendUnique(unique, data.skills[category])
    data.skills[category] = unique
  }

  data.education = data.education
    .filter((entry) => hasContent(entry))
    .map((entry) => ({
      ...entry,
      certifications: entry.certifications.filter((item) => item.name),
    }))
  data.experience = data.experience.filter((entry) => hasContent(entry))
  data.projects = data.projects.filter((entry) => hasContent(entry))

  return data
}
