import { ConfigurationError, isPipelineError } from '../ingestion/text/errors.js'

export const EXIT_CODES = {
  OK: 0,
  UNEXPECTED: 1,
  USAGE: 2,
  INPUT: 3,
  PIPELINE: 4,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError || error instanceof ConfigurationError) return EXIT_CODES.USAGE
  if (isPipelineError(error)) return EXIT_CODES.PIPELINE
  if (isSystemError(error)) return EXIT_CODES.INPUT
  return EXIT_CODES.UNEXPECTED
}
