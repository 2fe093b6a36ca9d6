/**
 * Error Classification
 *
 * Bad snapshot data never reaches here: the pipeline degrades it to absent
 * values or dropped records. These errors cover the tool itself: invalid
 * flags or settings, unreadable output locations, and bugs.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'validation' // Invalid flags or settings
  | 'io' // File system failures
  | 'internal' // Unexpected errors

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  exitCode: number
  isOperational: boolean // Expected errors vs bugs
  details?: Record<string, unknown>
  originalError?: Error
}

export const ERROR_CODES = {
  // Validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_FLAG: 'INVALID_FLAG',
  UNKNOWN_COMMAND: 'UNKNOWN_COMMAND',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // IO
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  VALIDATION_FAILED: 'validation',
  INVALID_FLAG: 'validation',
  UNKNOWN_COMMAND: 'validation',
  CONFIGURATION_ERROR: 'validation',
  OUTPUT_WRITE_FAILED: 'io',
  UNEXPECTED_ERROR: 'internal',
}

/** Usage errors exit 2, everything else 1 */
export function exitCodeFor(category: ErrorCategory): number {
  return category === 'validation' ? 2 : 1
}

export class AppError extends Error {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly details?: Record<string, unknown>

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AppError'
    this.code = code
    this.category = CATEGORY_BY_CODE[code]
    this.details = details
  }

  get exitCode(): number {
    return exitCodeFor(this.category)
  }
}

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof AppError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      exitCode: error.exitCode,
      isOperational: true,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: formatZodIssues(error),
      exitCode: exitCodeFor('validation'),
      isOperational: true,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      exitCode: exitCodeFor('internal'),
      isOperational: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    exitCode: exitCodeFor('internal'),
    isOperational: false,
  }
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
