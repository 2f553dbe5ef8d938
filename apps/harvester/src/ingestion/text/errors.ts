/**
 * Error taxonomy for the extraction pipeline.
 *
 * Configuration and alignment problems are fatal and thrown before or between
 * stages. Modifier failures are recovered and never thrown out of the pipeline;
 * `ModifierError` exists so they can be reported with the same shape.
 */

export type PipelineErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'MISSING_KEY'
  | 'MALFORMED_CHUNK'
  | 'ALIGNMENT_ERROR'
  | 'MODIFIER_ERROR'

export class PipelineError extends Error {
  readonly code: PipelineErrorCode
  readonly details: Record<string, unknown>

  constructor(code: PipelineErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.name = 'PipelineError'
    this.code = code
    this.details = details
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIGURATION_ERROR', message, details)
    this.name = 'ConfigurationError'
  }
}

export class MissingKeyError extends PipelineError {
  constructor(field: string, recordIndex: number) {
    super('MISSING_KEY', `Record ${recordIndex} is missing identifying field '${field}'`, {
      field,
      recordIndex,
    })
    this.name = 'MissingKeyError'
  }
}

export class MalformedChunkError extends PipelineError {
  constructor(chunkIndex: number, patternIndex: number, lineCount: number) {
    super(
      'MALFORMED_CHUNK',
      `Chunk ${chunkIndex} has ${lineCount} line(s) but pattern ${patternIndex} expects line ${patternIndex + 1}`,
      { chunkIndex, patternIndex, lineCount }
    )
    this.name = 'MalformedChunkError'
  }
}

export class AlignmentError extends PipelineError {
  constructor(stage: string, expected: number, received: number) {
    super(
      'ALIGNMENT_ERROR',
      `${stage} returned ${received} result(s) for ${expected} request(s)`,
      { stage, expected, received }
    )
    this.name = 'AlignmentError'
  }
}

export class ModifierError extends PipelineError {
  constructor(modifier: string, cause: unknown, recordIndex?: number) {
    super('MODIFIER_ERROR', `Modifier '${modifier}' failed: ${describeError(cause)}`, {
      modifier,
      recordIndex,
    })
    this.name = 'ModifierError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError
}
