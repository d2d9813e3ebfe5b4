import {
  Education,
  Experience,
  PersonalInfo,
  Project,
  ResumeData,
  ResumeRecord,
  SkillCategory,
  Skills,
} from '../types'
import { appendUnique } from './text'

export const SKILL_CATEGORIES: readonly SkillCategory[] = [
  'technical',
  'soft',
  'languages',
  'tools',
]

export const PERSONAL_FIELDS: ReadonlyArray<keyof PersonalInfo> = [
  'name',
  'email',
  'phone',
  'location',
  'linkedin',
]

export function emptyPersonalInfo(): PersonalInfo {
  return { name: '', email: '', phone: '', location: '', linkedin: '' }
}

export function emptyEducation(): Education {
  return {
    institution: '',
    location: '',
    degree: '',
    dates: '',
    gpa: '',
    coursework: [],
    certifications: [],
  }
}

export function emptyExperience(): Experience {
  return { company: '', title: '', dates: '', location: '', achievements: [] }
}

export function emptySkills(): Skills {
  return { technical: [], soft: [], languages: [], tools: [] }
}

export function emptyProject(): Project {
  return { name: '', description: '', technologies: [], url: '' }
}

export function emptyResumeData(): ResumeData {
  return {
    personal_info: emptyPersonalInfo(),
    education: [],
    experience: [],
    skills: emptySkills(),
    projects: [],
  }
}

/**
 * True when any string in the item is non-empty or any list has entries
 */
export function hasContent(item: object): boolean {
  return Object.values(item).some((value: unknown) =>
    Array.isArray(value) ? value.length > 0 : value !== '' && value != null
  )
}

/**
 * Fill personal fields that are still empty, append every sequence and
 * de-duplicate skills
 */
export function mergeInto(target: ResumeData, source: Partial<ResumeData>): void {
  if (source.personal_info) {
    const personal = source.personal_info
    for (const field of PERSONAL_FIELDS) {
      if (!target.personal_info[field] && personal[field]) {
        target.personal_info[field] = personal[field]
      }
    }
  }
  if (source.education) {
    target.education.push(...source.education)
  }
  if (source.experience) {
    target.experience.push(...source.experience)
  }
  if (source.skills) {
    for (const category of SKILL_CATEGORIES) {
      appendUnique(target.skills[category], source.skills[category])
    }
  }
  if (source.projects) {
    target.projects.push(...source.projects)
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Freeze a finished record so callers cannot mutate parser output
 */
export function freezeRecord(data: ResumeData): ResumeRecord {
  return deepFreeze(data)
}
