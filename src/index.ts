/**
 * price-period-resolver
 *
 * Public API exports
 */

// Error system
export {
  PeriodResolverError, PeriodResolverErrorCode,
  ParseError, ValidationError, InvalidDataError, DataSourceError,
  ConfigError, LogWriteError,
} from './errors'
export type { PeriodIssue } from './errors'
export type { PeriodResolverErrorCode as PeriodResolverErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar dates
export type { LocalDate } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseDateValue, isValidDate, makeDate,
  yearOf, monthOf, dayOf,
  addDays, nextDay, previousDay, daysBetween,
  compareDates, dateBefore, dateAfter,
  formatTimestamp,
} from './time-date'

// Period model
export type { Period } from './types'
export { copyPeriod } from './types'

// Ordering + resolution (the core)
export { comparePeriods, sortPeriods, isSorted } from './ordering'
export type { ResolutionEvent, ResolutionEventType, ResolveOptions } from './resolution'
export { resolvePeriods, periodsOverlap } from './resolution'
export { partitionByProduct, resolveByProduct } from './partition'

// Validation
export type { InvalidPeriodPolicy, ValidatedBatch } from './validation'
export { validatePeriod, validatePeriods } from './validation'

// Data access
export type { PeriodStore, MemoryPeriodStore } from './adapter'
export { createMemoryPeriodStore } from './adapter'
export type { SqlitePeriodStore, SqlitePeriodStoreOptions } from './sqlite-adapter'
export { createSqlitePeriodStore, readQuery } from './sqlite-adapter'

// Collaborators
export type { Config, Environment, LogLevel, LoadConfigOptions } from './config'
export { loadConfig, parseConfig, resolveConfigDir, CONFIG_FILES, ENVIRONMENTS } from './config'
export type { Logger, LoggerConfig } from './logger'
export { createLogger } from './logger'
export { formatPeriodLine, appendPeriodLog } from './period-log'
export type { RunOptions, RunSummary, RunResult } from './run'
export { runResolution, traceResolution } from './run'
export type { CliOptions, CliDeps } from './program'
export { buildProgram, parseCliOptions, runCli } from './program'
