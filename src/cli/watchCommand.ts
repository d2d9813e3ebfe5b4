import { Command } from 'commander'
import { ResumeOrchestrator } from '../ResumeOrchestrator'
import { getWatchConfig } from '../utils/aiConfig'
import { type PipelineOptions, createPipeline } from './pipeline'

interface WatchCommandOptions extends PipelineOptions {
  inputDir?: string
  processingDir?: string
  textDir?: string
  processedDir?: string
  parsedDir?: string
  failedDir?: string
  interval?: string
  once?: boolean
}

export default function registerWatchCommand(program: Command) {
  program
    .command('watch')
    .description(
      'Poll a directory for resume PDFs, OCR them and parse the text into JSON'
    )
    .option('--input-dir <dir>', 'Directory to watch for PDFs')
    .option('--processing-dir <dir>', 'Directory for PDFs being processed')
    .option('--text-dir <dir>', 'Directory for extracted text waiting to be parsed')
    .option('--processed-dir <dir>', 'Directory for finished PDFs and text files')
    .option('--parsed-dir <dir>', 'Directory for parsed JSON records')
    .option('--failed-dir <dir>', 'Directory for files that could not be processed')
    .option('-i, --interval <seconds>', 'Seconds between directory checks')
    .option('--once', 'Process pending files once and exit')
    .option('-v, --verbose', 'Verbose output')
    .option(
      '--use-ai [provider]',
      'Use a completion model for parsing (openrouter, openai, azure, gemini, grok)'
    )
    .option('--ai-model <model>', 'AI model to use (default depends on provider)')
    .option('--response-format <format>', 'Model reply format (markdown, json)')
    .option('--timeout <seconds>', 'Deadline for each completion call')
    .option('--raw-output-dir <dir>', 'Save raw model replies to this directory')
    .option('--language <lang>', 'OCR language', 'eng')
    .option(
      '--lang-path <dir>',
      'Directory with OCR language data (defaults to the installed @tesseract.js-data package)'
    )
    .action(async (options: WatchCommandOptions) => {
      const config = getWatchConfig({
        inputDir: options.inputDir,
        processingDir: options.processingDir,
        textDir: options.textDir,
        processedDir: options.processedDir,
        parsedDir: options.parsedDir,
        failedDir: options.failedDir,
        checkInterval:
          options.interval === undefined ? undefined : Number(options.interval),
      })

      const { textExtractor, processor } = createPipeline(options)
      const orchestrator = new ResumeOrchestrator(textExtractor, processor, config)

      try {
        if (options.once) {
          const summary = await orchestrator.runOnce()
          console.log(
            `Resumes: ${summary.resumes.processed} processed, ${summary.resumes.failed} failed. ` +
              `Texts: ${summary.texts.parsed} parsed, ${summary.texts.failed} failed.`
          )
          return
        }

        process.once('SIGINT', () => orchestrator.stop())
        process.once('SIGTERM', () => orchestrator.stop())
        await orchestrator.run()
      } finally {
        await textExtractor.terminate()
      }
    })
}
