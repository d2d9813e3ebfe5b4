export type ResponseFormat = 'markdown' | 'json'

export const SYSTEM_PROMPT = 'You are a resume analysis expert.'

/**
 * JSON shape the model is asked to fill in json mode
 */
export const RESUME_JSON_SCHEMA = {
  type: 'object',
  properties: {
    personal_info: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        email: { type: 'string' },
        phone: { type: 'string' },
        location: { type: 'string' },
        linkedin: { type: 'string' },
      },
    },
    education: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          institution: { type: 'string' },
          location: { type: 'string' },
          degree: { type: 'string' },
          dates: { type: 'string' },
          gpa: { type: 'string' },
          coursework: { type: 'array', items: { type: 'string' } },
          certifications: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                date: { type: 'string' },
              },
            },
          },
        },
      },
    },
    experience: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          company: { type: 'string' },
          title: { type: 'string' },
          dates: { type: 'string' },
          location: { type: 'string' },
          achievements: { type: 'array', items: { type: 'string' } },
        },
      },
    },
    skills: {
      type: 'object',
      properties: {
        technical: { type: 'array', items: { type: 'string' } },
        soft: { type: 'array', items: { type: 'string' } },
        languages: { type: 'array', items: { type: 'string' } },
        tools: { type: 'array', items: { type: 'string' } },
      },
    },
    projects: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          description: { type: 'string' },
          technologies: { type: 'array', items: { type: 'string' } },
          url: { type: 'string' },
        },
      },
    },
  },
} as const

const MARKDOWN_INSTRUCTIONS = `
Analyze this resume and extract key information using exactly these markdown
headings and labels. Write "Not specified" for any missing value.

### Personal Information
- **Full name:** ...
- **Email:** ...
- **Phone number:** ...
- **Location:** ...
- **LinkedIn profile:** ...

### Education
For each degree:
- **Institution name, Location**
  - **Degree:** ...
  - **Dates:** ...
  - **GPA:** ...
  - **Coursework:** comma separated list
  - **Certifications:** comma separated list, each with its year in parentheses

### Experience
For each position:
- **Company name**
  - **Title:** ...
  - **Dates:** ...
  - **Location:** ...
  - **Key achievements:**
    - one achievement per line

### Skills
- **Technical skills:** comma separated list
- **Soft skills:** comma separated list
- **Languages:** comma separated list
- **Tools:** comma separated list

### Projects
For each project:
- **Project name**
  - **Description:** ...
  - **Technologies:** comma separated list
  - **URL:** ...
If the resume has no projects, write "No explicitly listed projects".
`

const JSON_INSTRUCTIONS = `
Analyze this resume and extract key information as a single JSON object that
follows this JSON schema. Use "" for missing text values and [] for missing
lists. Reply with the JSON object only.

${JSON.stringify(RESUME_JSON_SCHEMA, null, 2)}
`

export function buildUserPrompt(text: string, format: ResponseFormat): string {
  const instructions =
    format === 'json' ? JSON_INSTRUCTIONS : MARKDOWN_INSTRUCTIONS

  return `${instructions.trim()}

Resume text:
${text}`
}
