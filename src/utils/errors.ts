/**
 * Error types raised by the extraction pipeline.
 *
 * Every error is scoped to a single document or call; the orchestrator
 * catches them per document and keeps going.
 */

export interface ExtractionErrorOptions {
  cause?: unknown
}

export class ResumeExtractionError extends Error {
  public readonly recoverable: boolean

  constructor(
    message: string,
    recoverable: boolean,
    options: ExtractionErrorOptions = {}
  ) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.recoverable = recoverable
  }
}

/**
 * The document could not be decoded or rasterized
 */
export class UnsupportedDocumentError extends ResumeExtractionError {
  constructor(message: string, options?: ExtractionErrorOptions) {
    super(message, false, options)
  }
}

/**
 * OCR failed for one page. Recovered by using an empty string for that page.
 */
export class PageRecognitionError extends ResumeExtractionError {
  public readonly pageNumber: number

  constructor(pageNumber: number, options?: ExtractionErrorOptions) {
    super(`OCR failed on page ${pageNumber}`, true, options)
    this.pageNumber = pageNumber
  }
}

export class EmptyInputError extends ResumeExtractionError {
  constructor(message = 'No text to parse') {
    super(message, false)
  }
}

export type ServiceFailureReason =
  | 'timeout'
  | 'request'
  | 'empty'
  | 'malformed'
  | 'validation'

/**
 * The completion service failed, timed out, or replied with unusable data
 */
export class ServiceFailureError extends ResumeExtractionError {
  public readonly reason: ServiceFailureReason

  constructor(
    message: string,
    reason: ServiceFailureReason,
    options?: ExtractionErrorOptions
  ) {
    super(message, false, options)
    this.reason = reason
  }
}

export class ConfigurationError extends ResumeExtractionError {
  constructor(message: string) {
    super(message, false)
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
