/**
 * Period Validation
 *
 * Checks the resolution engine's preconditions before it runs. The engine
 * itself trusts its input; a period ending before it starts would give
 * undefined results there, so it is caught here instead.
 */

import type { Period } from './types'
import { type Result, Ok, Err } from './result'
import { isValidDate, dateAfter } from './time-date'

export { ValidationError } from './errors'
import { ValidationError, type PeriodIssue } from './errors'

export type { PeriodIssue } from './errors'

// ============================================================================
// Types
// ============================================================================

/**
 * `reject`: one bad record fails the whole batch.
 * `drop`: bad records are left out and reported.
 */
export type InvalidPeriodPolicy = 'reject' | 'drop'

export type ValidatedBatch = {
  valid: Period[]
  rejected: PeriodIssue[]
}

// ============================================================================
// Single Record
// ============================================================================

function findProblems(period: Period): string[] {
  const problems: string[] = []

  // Products are keyed by number, so beyond 2^53 two distinct keys can compare equal.
  if (!Number.isSafeInteger(period.id)) problems.push(`id must be an integer, got ${period.id}`)
  if (!Number.isSafeInteger(period.productNumber)) {
    problems.push(`product number must be an integer, got ${period.productNumber}`)
  }
  if (!Number.isSafeInteger(period.priority)) problems.push(`priority must be an integer, got ${period.priority}`)
  if (!Number.isFinite(period.price)) problems.push(`price must be a finite number, got ${period.price}`)

  const startOk = isValidDate(period.start)
  const endOk = isValidDate(period.end)
  if (!startOk) problems.push(`invalid start date '${period.start}'`)
  if (!endOk) problems.push(`invalid end date '${period.end}'`)
  if (startOk && endOk && dateAfter(period.start, period.end)) {
    problems.push(`start ${period.start} is after end ${period.end}`)
  }

  return problems
}

export function validatePeriod(period: Period): Result<Period, ValidationError> {
  const problems = findProblems(period)
  if (problems.length === 0) return Ok(period)
  const message = `Period ${period.id}: ${problems.join('; ')}`
  return Err(new ValidationError(message, [{ index: 0, id: period.id, message }]))
}

// ============================================================================
// Batch
// ============================================================================

export function validatePeriods(
  periods: readonly Period[],
  policy: InvalidPeriodPolicy = 'reject',
): Result<ValidatedBatch, ValidationError> {
  const valid: Period[] = []
  const rejected: PeriodIssue[] = []

  periods.forEach((period, index) => {
    const problems = findProblems(period)
    if (problems.length === 0) {
      valid.push(period)
    } else {
      rejected.push({ index, id: period.id, message: `Period ${period.id}: ${problems.join('; ')}` })
    }
  })

  if (policy === 'reject' && rejected.length > 0) {
    const noun = rejected.length === 1 ? 'period' : 'periods'
    return Err(new ValidationError(
      `${rejected.length} invalid ${noun} in batch of ${periods.length}: ${rejected.map((r) => r.message).join(' | ')}`,
      rejected,
    ))
  }

  return Ok({ valid, rejected })
}
