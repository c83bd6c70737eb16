/**
 * Consolidated error system for price-period-resolver.
 *
 * All error classes extend PeriodResolverError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from either place.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const PeriodResolverErrorCode = {
  // Parsing
  PARSE_ERROR: 'PARSE_ERROR',

  // Period validation
  VALIDATION: 'VALIDATION',

  // Data access
  INVALID_DATA: 'INVALID_DATA',
  DATA_SOURCE: 'DATA_SOURCE',

  // Configuration
  CONFIG: 'CONFIG',

  // Period log
  LOG_WRITE: 'LOG_WRITE',
} as const

export type PeriodResolverErrorCode =
  (typeof PeriodResolverErrorCode)[keyof typeof PeriodResolverErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class PeriodResolverError extends Error {
  readonly code: PeriodResolverErrorCode

  constructor(code: PeriodResolverErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PeriodResolverError'
    this.code = code
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

export class ParseError extends PeriodResolverError {
  constructor(message: string) {
    super(PeriodResolverErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

/** One rejected record: its position in the batch, its id and what is wrong with it. */
export type PeriodIssue = {
  index: number
  id: unknown
  message: string
}

export class ValidationError extends PeriodResolverError {
  readonly issues: PeriodIssue[]

  constructor(message: string, issues: PeriodIssue[] = []) {
    super(PeriodResolverErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
    this.issues = issues
  }
}

// ============================================================================
// Data Access Errors
// ============================================================================

export class InvalidDataError extends PeriodResolverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(PeriodResolverErrorCode.INVALID_DATA, message, options)
    this.name = 'InvalidDataError'
  }
}

export class DataSourceError extends PeriodResolverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(PeriodResolverErrorCode.DATA_SOURCE, message, options)
    this.name = 'DataSourceError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends PeriodResolverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(PeriodResolverErrorCode.CONFIG, message, options)
    this.name = 'ConfigError'
  }
}

// ============================================================================
// Period Log Errors
// ============================================================================

export class LogWriteError extends PeriodResolverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(PeriodResolverErrorCode.LOG_WRITE, message, options)
    this.name = 'LogWriteError'
  }
}

/** Message of any thrown value, for wrapping foreign errors. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
