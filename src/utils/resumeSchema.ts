import { z } from 'zod'
import { emptyPersonalInfo, emptySkills } from './record'
import { cleanValue, splitCertification, splitList } from './text'

/**
 * Zod schema for model JSON replies. Lenient on input (nulls, numbers,
 * comma strings) and strict on output: every key of ResumeData is present
 * and every value has its final type. Unknown keys are dropped.
 */

function normalizeScalar(
  value: string | number | boolean | null | undefined
): string {
  return value === null || value === undefined ? '' : cleanValue(String(value))
}

const scalar = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform(normalizeScalar)

// ["Python", "Go"] or "Python, Go"
const stringList = z
  .union([z.array(scalar), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return []
    }
    return typeof value === 'string'
      ? splitList(value)
      : value.filter((item) => item.length > 0)
  })

// Sentences may contain commas, so a string is only split on newlines
const sentenceList = z
  .union([z.array(scalar), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return []
    }
    const items = typeof value === 'string' ? value.split(/\r?\n/) : value
    return items
      .map((item) => cleanValue(item.replace(/^\s*[-•*]\s+/, '')))
      .filter((item) => item.length > 0)
  })

function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? [])
}

const certification = z.union([
  z.string().transform((value) => splitCertification(cleanValue(value))),
  z.object({ name: scalar, date: scalar }),
])

const personalInfo = z
  .object({
    name: scalar,
    email: scalar,
    phone: scalar,
    location: scalar,
    linkedin: scalar,
  })
  .nullish()
  .transform((value) => value ?? emptyPersonalInfo())

const education = z.object({
  institution: scalar,
  location: scalar,
  degree: scalar,
  dates: scalar,
  gpa: scalar,
  coursework: stringList,
  certifications: list(certification),
})

const experience = z.object({
  company: scalar,
  title: scalar,
  dates: scalar,
  location: scalar,
  achievements: sentenceList,
})

// A bare list of skills is read as technical skills; a missing one is empty
const skills = z.union([
  z.object({
    technical: stringList,
    soft: stringList,
    languages: stringList,
    tools: stringList,
  }),
  stringList.transform((technical) => ({ ...emptySkills(), technical })),
])

const project = z.object({
  name: scalar,
  description: scalar,
  technologies: stringList,
  url: scalar,
})

export const resumeSchema = z.object({
  personal_info: personalInfo,
  education: list(education),
  experience: list(experience),
  skills,
  projects: list(project),
})


export const RESUME_KEYS = [
  'personal_info',
  'education',
  'experience',
  'skills',
  'projects',
] as const
