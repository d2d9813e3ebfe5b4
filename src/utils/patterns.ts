import type { SectionName, SkillCategory } from '../types'

/**
 * Regex patterns and keyword tables for resume parsing
 */

const MONTH =
  '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)[a-z]*\\.?'

export const Patterns = {
  // Markdown structure
  heading: /^(#{1,6})\s+(.*)$/,
  bold: /^(\*\*|__)(.+?)\1(.*)$/,
  listMarker: /^\s*(?:[-+•‣▪◦●]|\*(?!\*)|\d{1,2}[.)](?=\s))\s*/,
  numbering: /^\d{1,2}[.)]\s*/,
  emphasis: /\*\*|__/g,
  label: /^([A-Za-z][A-Za-z /&'-]{0,40}?)\s*:\s*(.*)$/,

  // "2016 – 2020", "2019 - Present"
  yearRange:
    /\b(?:19|20)\d{2}\s*[-–—]+\s*(?:(?:19|20)\d{2}|present|current|now)\b/i,
  trailingDate: new RegExp(
    `[\\s,–—-]*[([]?((?:${MONTH}\\s+)?(?:19|20)\\d{2})[)\\]]?\\s*$`
  ),

  // GPA extraction
  gpa: /GPA[:of\s]+(\d+\.\d+|\d+)(?:\s*\/\s*\d+(?:\.\d+)?)?/i,

  // "No explicitly listed projects", "no projects listed", ...
  noProjects:
    /\bno\s+(?:explicitly\s+)?listed\s+projects\b|\bno\s+projects\s+(?:were\s+|are\s+)?(?:explicitly\s+)?(?:listed|mentioned|provided|found|specified)\b/i,

  // Values a model writes instead of leaving a field empty
  placeholder:
    /^(?:not\s+(?:specified|provided|available|listed|mentioned|applicable)|n\/?a|none|unknown|-)\.?$/i,

  listSeparator: /[,;|•]/,
}

/**
 * Whole-line names of each section, lower case, "&" already read as "and"
 */
export const SectionSynonyms: Record<SectionName, string[]> = {
  personal_info: [
    'personal information',
    'personal info',
    'personal details',
    'personal',
    'contact information',
    'contact info',
    'contact details',
    'contact',
  ],
  education: [
    'education',
    'education and training',
    'education and certifications',
    'educational background',
    'academic background',
    'academic history',
    'academics',
    'qualifications',
  ],
  experience: [
    'experience',
    'work experience',
    'professional experience',
    'relevant experience',
    'employment',
    'employment history',
    'work history',
    'career history',
  ],
  skills: [
    'skills',
    'key skills',
    'core skills',
    'skills and competencies',
    'core competencies',
    'competencies',
    'technical expertise',
    'expertise',
  ],
  projects: [
    'projects',
    'personal projects',
    'key projects',
    'academic projects',
    'selected projects',
    'portfolio',
  ],
}

/**
 * Keywords that make a markdown heading a section header even when it
 * carries extra words ("### Professional Experience Summary")
 */
export const SectionKeywords: ReadonlyArray<readonly [SectionName, RegExp]> = [
  ['personal_info', /\b(?:personal|contact)\b/i],
  ['education', /\beducation\b/i],
  ['experience', /\b(?:experience|employment)\b/i],
  ['skills', /\bskills?\b/i],
  ['projects', /\bprojects?\b/i],
]

/**
 * Ordered label tables; the first entry whose alias matches wins
 */
export type LabelTable<F extends string> = ReadonlyArray<
  readonly [F, readonly string[]]
>

export type PersonalField = 'name' | 'email' | 'phone' | 'location' | 'linkedin'

export const PersonalLabels: LabelTable<PersonalField> = [
  ['name', ['full name', 'name']],
  ['email', ['email', 'e-mail', 'email address']],
  ['phone', ['phone number', 'phone', 'mobile', 'telephone', 'contact number']],
  ['location', ['location', 'address', 'city']],
  ['linkedin', ['linkedin profile', 'linkedin', 'linkedin url']],
]

export type EducationField =
  | 'institution'
  | 'degree'
  | 'dates'
  | 'location'
  | 'gpa'
  | 'coursework'
  | 'certifications'

export const EducationLabels: LabelTable<EducationField> = [
  ['institution', ['institution', 'university', 'school', 'college']],
  ['degree', ['degree', 'degree program', 'qualification', 'program']],
  ['dates', ['dates', 'date', 'duration', 'years', 'graduation', 'graduation date']],
  ['location', ['location']],
  ['gpa', ['gpa', 'grade', 'cgpa']],
  ['coursework', ['coursework', 'relevant coursework', 'courses']],
  ['certifications', ['certifications', 'certification', 'certificates']],
]

export type ExperienceField =
  | 'company'
  | 'title'
  | 'dates'
  | 'location'
  | 'achievements'

export const ExperienceLabels: LabelTable<ExperienceField> = [
  ['company', ['company', 'employer', 'organization', 'organisation']],
  ['title', ['title', 'job title', 'position', 'role']],
  ['dates', ['dates', 'date', 'duration', 'period', 'employment dates']],
  ['location', ['location']],
  [
    'achievements',
    [
      'achievements',
      'key achievements',
      'responsibilities',
      'key responsibilities',
      'highlights',
    ],
  ],
]

export const SkillLabels: LabelTable<SkillCategory> = [
  [
    'technical',
    ['technical skills', 'technical', 'hard skills', 'programming languages'],
  ],
  ['soft', ['soft skills', 'interpersonal skills']],
  ['languages', ['languages', 'spoken languages']],
  ['tools', ['tools', 'tools and technologies', 'software']],
]

export type ProjectField = 'name' | 'description' | 'technologies' | 'url'

export const ProjectLabels: LabelTable<ProjectField> = [
  ['name', ['project', 'name', 'project name', 'project title']],
  ['description', ['description', 'summary', 'details']],
  [
    'technologies',
    ['technologies', 'technologies used', 'tech stack', 'stack', 'tools'],
  ],
  ['url', ['url', 'link', 'github', 'website', 'repository']],
]

/**
 * Degree and certification keywords. Hand-picked and English only; extend
 * as new resumes show up.
 */
export const DegreeKeywords: RegExp[] = [
  /\b(?:Bachelor|Master|Doctorate|Associate|Diploma)(?:['’]?s)?\b|\bDegree\b/i,
  /\b(?:Ph\.?D|MBA|B\.?Sc|M\.?Sc|B\.?Eng|M\.?Eng|B\.S\.|M\.S\.|B\.A\.|M\.A\.)(?![A-Za-z])/,
]

export const CertificationKeywords: RegExp[] = [
  /\b(?:CCNA|CCNP|CCIE|CISSP|CISM|CISA|CEH|PMP|ITIL|CKA|CKAD|OSCP)\b/,
  /\bCompTIA\b/i,
  /\b(?:AWS|Azure|Google Cloud|Microsoft|Oracle|Salesforce) Certified\b/i,
  /\bCertified\b/,
  /\bCertificat(?:e|ion)\b/i,
]

export const InstitutionKeywords: RegExp[] = [
  /\b(?:University|College|Institute|School|Academy|Polytechnic)\b/,
]
