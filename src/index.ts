#!/usr/bin/env node
/**
 * Resume Extractor CLI - turn scanned resume PDFs into structured JSON
 *
 * Usage:
 *   resume-extractor process resume.pdf
 *   resume-extractor process resume.txt --use-ai openrouter
 *   resume-extractor watch --input-dir resumes
 */

import { Command } from 'commander'
import * as dotenv from 'dotenv'
import registerProcessCommand from './cli/processCommand'
import registerWatchCommand from './cli/watchCommand'
import { describeError } from './utils/errors'

export { ResumeOrchestrator } from './ResumeOrchestrator'
export { ResumeProcessor } from './ResumeProcessor'
export { AIProviderFactory } from './ai/AIProviderFactory'
export type { AIProviderType } from './ai/AIProviderFactory'
export { HeuristicExtractor } from './extractors/HeuristicExtractor'
export { ModelAssistedExtractor } from './extractors/ModelAssistedExtractor'
export { SectionParser } from './extractors/SectionParser'
export { TextExtractor } from './extractors/TextExtractor'
export * from './utils/errors'
export type * from './types'
export type * from './types/AIProvider'

function main(): void {
  dotenv.config()

  const program = new Command()

  program
    .name('resume-extractor')
    .description('Extract structured data from scanned resume PDFs')
    .version('1.0.0')

  registerProcessCommand(program)
  registerWatchCommand(program)

  if (process.argv.length <= 2) {
    program.help()
  }

  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`)
    process.exit(1)
  })
}

if (require.main === module) {
  main()
}
