import * as fs from 'fs'
import * as path from 'path'
import * as os from 'os'
import { vi } from 'vitest'
import { OcrEngine, PageRasterizer, ResumeData } from '../types'
import {
  AIProvider,
  AIResponseFormat,
  CompletionRequest,
} from '../types/AIProvider'

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8')
}

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  vi.spyOn(console, 'error').mockImplementation(() => undefined)
}

/**
 * Record parsed from fixtures/markdown-reply.md
 */
export const JANE_ROE: ResumeData = {
  personal_info: {
    name: 'Jane Roe',
    email: 'jane.roe@example.com',
    phone: '555-0100',
    location: 'Springfield',
    linkedin: '',
  },
  education: [
    {
      institution: 'State University',
      location: 'Springfield',
      degree: 'Bachelor of Science in Computer Science',
      dates: '2014 - 2018',
      gpa: '3.7',
      coursework: ['Algorithms', 'Databases'],
      certifications: [{ name: 'AWS Certified Developer', date: '2021' }],
    },
  ],
  experience: [
    {
      company: 'Acme Corp',
      title: 'Software Engineer',
      dates: 'Jan 2019 - Present',
      location: 'Remote',
      achievements: ['Cut build times by 40%', 'Led migration to TypeScript'],
    },
  ],
  skills: {
    technical: ['Python', 'TypeScript', 'SQL'],
    soft: [],
    languages: ['English', 'Spanish'],
    tools: ['Docker', 'Git'],
  },
  projects: [
    {
      name: 'Resume Parser',
      description: 'Parses resumes into JSON',
      technologies: ['TypeScript', 'Vitest'],
      url: 'https://example.com/parser',
    },
  ],
}

/**
 * Completion provider that answers from a callback and records requests
 */
export class StubProvider implements AIProvider {
  readonly requests: CompletionRequest[] = []

  constructor(
    private readonly reply: (request: CompletionRequest) => Promise<AIResponseFormat>
  ) {}

  static replying(text: string): StubProvider {
    return new StubProvider(async () => ({
      text,
      tokenUsage: { promptTokens: 120, completionTokens: 80, totalTokens: 200 },
    }))
  }

  complete(request: CompletionRequest): Promise<AIResponseFormat> {
    this.requests.push(request)
    return this.reply(request)
  }

  getModelInfo(): { provider: string; model: string } {
    return { provider: 'stub', model: 'stub-model' }
  }
}

/**
 * Rasterizer that treats the document bytes as one page per "\f"-separated
 * chunk, or fails when the document says "broken"
 */
export class FakeRasterizer implements PageRasterizer {
  async renderPages(document: Buffer): Promise<Buffer[]> {
    const content = document.toString('utf-8')
    if (content === 'broken') {
      throw new Error('not a PDF')
    }
    if (!content) {
      return []
    }
    return content.split('\f').map((page) => Buffer.from(page, 'utf-8'))
  }
}

/**
 * OCR engine that reads the image bytes back as text
 */
export class EchoOcrEngine implements OcrEngine {
  terminated = false

  async recognize(image: Buffer): Promise<string> {
    return image.toString('utf-8')
  }

  async terminate(): Promise<void> {
    this.terminated = true
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('Expected the promise to reject')
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'resume-test-'))
}
