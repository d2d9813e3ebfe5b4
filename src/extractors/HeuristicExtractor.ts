import { ExtractionStrategy, ResumeData, ResumeRecord, SectionName } from '../types'
import { EmptyInputError } from '../utils/errors'
import { emptyResumeData, freezeRecord, mergeInto } from '../utils/record'
import { EducationExtractor } from './EducationExtractor'
import { ExperienceExtractor } from './ExperienceExtractor'
import { PersonalInfoExtractor } from './PersonalInfoExtractor'
import { ProjectsExtractor } from './ProjectsExtractor'
import { SectionExtractor } from './SectionExtractor'
import { SkillsExtractor } from './SkillsExtractor'

export interface HeuristicParseResult {
  record: ResumeRecord
  /** Number of section headers recognised, repeated sections included */
  sectionsMatched: number
}

/**
 * Rule-based parser: splits the text into sections, then runs each
 * section's extractor over its buffer
 */
export class HeuristicExtractor implements ExtractionStrategy {
  readonly name = 'heuristic' as const

  private sectionExtractor: SectionExtractor
  private personalInfoExtractor: PersonalInfoExtractor
  private educationExtractor: EducationExtractor
  private experienceExtractor: ExperienceExtractor
  private skillsExtractor: SkillsExtractor
  private projectsExtractor: ProjectsExtractor

  constructor(sectionExtractor: SectionExtractor = new SectionExtractor()) {
    this.sectionExtractor = sectionExtractor
    this.personalInfoExtractor = new PersonalInfoExtractor()
    this.educationExtractor = new EducationExtractor()
    this.experienceExtractor = new ExperienceExtractor()
    this.skillsExtractor = new SkillsExtractor()
    this.projectsExtractor = new ProjectsExtractor()
  }

  parse(text: string): ResumeRecord {
    return this.parseWithStats(text).record
  }

  parseWithStats(text: string): HeuristicParseResult {
    if (!text.trim()) {
      throw new EmptyInputError()
    }

    const data = emptyResumeData()
    const sections = this.sectionExtractor.segment(text)

    for (const { section, lines } of sections) {
      mergeInto(data, this.extractSection(section, lines))
    }

    return { record: freezeRecord(data), sectionsMatched: sections.length }
  }

  private extractSection(
    section: SectionName,
    lines: readonly string[]
  ): Partial<ResumeData> {
    switch (section) {
      case 'personal_info':
        return {
          personal_info: this.personalInfoExtractor.extractPersonalInfo(lines),
        }
      case 'education':
        return { education: this.educationExtractor.extractEducation(lines) }
      case 'experience':
        return { experience: this.experienceExtractor.extractExperience(lines) }
      case 'skills':
        return { skills: this.skillsExtractor.extractSkills(lines) }
      case 'projects':
        return { projects: this.projectsExtractor.extractProjects(lines) }
    }
  }
}
