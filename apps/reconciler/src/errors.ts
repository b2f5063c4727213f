/**
 * Error Classification and Structured Error Handling
 *
 * Every failure the engine raises is a ConcordanceError carrying a stable code.
 * Structural errors (conflicting overrides, out-of-range indices) abort the
 * resolution of one dataset and always name that dataset. Per-name failures
 * (no confident match, malformed names) are outcomes, not errors.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'override' // Curated override ledger is inconsistent
  | 'dataset' // Dataset shape or row index problems
  | 'configuration' // Invalid env, flags or ledger files
  | 'validation' // Schema validation failures
  | 'internal' // Unexpected errors

export const ERROR_CODES = {
  // Override ledger
  CONFLICTING_OVERRIDE: 'CONFLICTING_OVERRIDE',
  LEDGER_DATASET_MISMATCH: 'LEDGER_DATASET_MISMATCH',

  // Dataset
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  INVALID_DATASET: 'INVALID_DATASET',
  MISSING_COLUMN: 'MISSING_COLUMN',

  // Configuration
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_OVERRIDE_LEDGER: 'INVALID_OVERRIDE_LEDGER',

  // Validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export interface ConcordanceErrorOptions {
  datasetId?: string
  index?: number
  details?: Record<string, unknown>
  cause?: unknown
}

export class ConcordanceError extends Error {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly datasetId?: string
  readonly index?: number
  readonly details?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    category: ErrorCategory,
    message: string,
    options: ConcordanceErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'ConcordanceError'
    this.code = code
    this.category = category
    this.datasetId = options.datasetId
    this.index = options.index
    this.details = options.details
  }

  /** Structural errors abort resolution of the dataset they name. */
  get isStructural(): boolean {
    return this.category === 'override' || this.code === ERROR_CODES.INDEX_OUT_OF_RANGE
  }
}

/**
 * Two ledger entries target the same row with different corrected names.
 */
export class ConflictingOverrideError extends ConcordanceError {
  readonly values: readonly [string, string]

  constructor(datasetId: string, index: number, values: readonly [string, string]) {
    super(
      ERROR_CODES.CONFLICTING_OVERRIDE,
      'override',
      `Conflicting overrides for dataset "${datasetId}" at index ${index}: "${values[0]}" vs "${values[1]}"`,
      { datasetId, index, details: { values: [...values] } }
    )
    this.name = 'ConflictingOverrideError'
    this.values = values
  }
}

export type IndexSource = 'override' | 'match' | 'lookup'

/**
 * A row index referenced by an override, a match result or a lookup does not
 * exist in the dataset.
 */
export class IndexOutOfRangeError extends ConcordanceError {
  readonly source: IndexSource

  constructor(datasetId: string, index: number, source: IndexSource) {
    super(
      ERROR_CODES.INDEX_OUT_OF_RANGE,
      'dataset',
      `Index ${index} referenced by ${source} is not a row of dataset "${datasetId}"`,
      { datasetId, index, details: { source } }
    )
    this.name = 'IndexOutOfRangeError'
    this.source = source
  }
}

export class DatasetError extends ConcordanceError {
  constructor(
    message: string,
    datasetId: string,
    code: ErrorCode = ERROR_CODES.INVALID_DATASET,
    details?: Record<string, unknown>
  ) {
    super(code, 'dataset', message, { datasetId, details })
    this.name = 'DatasetError'
  }
}

export class ConfigurationError extends ConcordanceError {
  constructor(
    message: string,
    code: ErrorCode = ERROR_CODES.CONFIGURATION_ERROR,
    options: ConcordanceErrorOptions = {}
  ) {
    super(code, 'configuration', message, options)
    this.name = 'ConfigurationError'
  }
}

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  isStructural: boolean
  datasetId?: string
  index?: number
  details?: Record<string, unknown>
  originalError?: Error
}

export function zodIssues(error: ZodError): Array<{ path: string; message: string; code: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }))
}

/**
 * Classify any thrown value into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ConcordanceError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isStructural: error.isStructural,
      datasetId: error.datasetId,
      index: error.index,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      isStructural: false,
      details: { issues: zodIssues(error) },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isStructural: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isStructural: false,
  }
}
