import { Command } from 'commander'
import * as fs from 'fs'
import * as path from 'path'
import { describeError } from '../utils/errors'
import { type PipelineOptions, createPipeline } from './pipeline'

interface ProcessCommandOptions extends PipelineOptions {
  output?: string
}

export default function registerProcessCommand(program: Command) {
  program
    .command('process')
    .description('Process a resume PDF, or a text file from an earlier OCR run')
    .argument('<input>', 'Path to the resume PDF or .txt file to process')
    .option(
      '-o, --output <file>',
      'Output JSON file (defaults to input filename with .json extension)'
    )
    .option('-v, --verbose', 'Verbose output')
    .option(
      '--use-ai [provider]',
      'Use a completion model for parsing (openrouter, openai, azure, gemini, grok)'
    )
    .option('--ai-model <model>', 'AI model to use (default depends on provider)')
    .option('--response-format <format>', 'Model reply format (markdown, json)')
    .option('--timeout <seconds>', 'Deadline for the completion call')
    .option('--raw-output-dir <dir>', 'Save raw model replies to this directory')
    .option('--language <lang>', 'OCR language', 'eng')
    .option(
      '--lang-path <dir>',
      'Directory with OCR language data (defaults to the installed @tesseract.js-data package)'
    )
    .action(async (input: string, options: ProcessCommandOptions) => {
      if (!fs.existsSync(input)) {
        console.error(`Error: Input file not found: ${input}`)
        process.exit(1)
      }

      const outputFile =
        options.output || `${path.basename(input, path.extname(input))}.json`

      const { textExtractor, processor } = createPipeline(options)
      try {
        const startTime = new Date()
        console.log(`Starting resume processing at ${startTime.toISOString()}`)

        const result =
          path.extname(input).toLowerCase() === '.txt'
            ? await processor.processText(fs.readFileSync(input, 'utf-8'), input)
            : await processor.processResume(input)

        processor.saveToJson(result.record, outputFile)

        const { metadata } = result
        console.log(
          `Parsed with ${metadata.provider}/${metadata.model}, field coverage ${metadata.coverage.percentage}%`
        )
        if (metadata.tokenUsage) {
          console.log(
            `Tokens: ${metadata.tokenUsage.totalTokens} (estimated cost $${(metadata.tokenUsage.estimatedCost ?? 0).toFixed(4)})`
          )
        }
        console.log(
          `Resume processing completed in ${metadata.processingTime.toFixed(2)} seconds`
        )
      } catch (error) {
        console.error(`Error processing resume: ${describeError(error)}`)
        process.exitCode = 1
      } finally {
        await textExtractor.terminate()
      }
    })
}
