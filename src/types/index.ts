import type { TokenUsageInfo } from './AIProvider'

export type SectionName =
  | 'personal_info'
  | 'education'
  | 'experience'
  | 'skills'
  | 'projects'

export type SkillCategory = 'technical' | 'soft' | 'languages' | 'tools'

export interface PersonalInfo {
  name: string
  email: string
  phone: string
  location: string
  linkedin: string
}

export interface Certification {
  name: string
  date: string
}

export interface Education {
  institution: string
  location: string
  degree: string
  dates: string
  gpa: string
  coursework: string[]
  certifications: Certification[]
}

export interface Experience {
  company: string
  title: string
  dates: string
  location: string
  achievements: string[]
}

export type Skills = Record<SkillCategory, string[]>

export interface Project {
  name: string
  description: string
  technologies: string[]
  url: string
}

/**
 * Mutable shape of a resume while a parser is still filling it in
 */
export interface ResumeData {
  personal_info: PersonalInfo
  education: Education[]
  experience: Experience[]
  skills: Skills
  projects: Project[]
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
  ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
  : T

/**
 * Canonical output of every extraction strategy. Frozen once returned.
 */
export type ResumeRecord = DeepReadonly<ResumeData>

export type StrategyName = 'heuristic' | 'model'

export interface ExtractionStrategy {
  readonly name: StrategyName
  parse(text: string): ResumeRecord | Promise<ResumeRecord>
}

export interface ProcessingMetadata {
  processedDate: string
  sourceFile: string
  strategy: StrategyName
  provider: string
  model: string
  pageCount?: number
  failedPages?: number[]
  processingTime: number // seconds
  coverage: {
    percentage: number
    totalFields: number
    nonEmptyFields: number
  }
  tokenUsage?: TokenUsageInfo
}

export interface ProcessingResult {
  record: ResumeRecord
  metadata: ProcessingMetadata
}

export interface ProcessorOptions {
  verbose?: boolean
  strategy?: StrategyName
}

/**
 * Renders a document into ordered page images
 */
export interface PageRasterizer {
  renderPages(document: Buffer): Promise<Buffer[]>
}

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>
  /** Release workers or other resources held by the engine */
  terminate?(): Promise<void>
}
