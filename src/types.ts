/**
 * Shared Types
 *
 * The period record flowing between the store, the validator, the
 * resolution engine and the period log.
 */

import type { LocalDate } from './time-date'

export type { LocalDate } from './time-date'

// ============================================================================
// Domain Types
// ============================================================================

/** A pricing-validity interval for one product. Both bounds are inclusive. */
export type Period = {
  /** Opaque record identifier; split fragments keep the original's. */
  id: number
  start: LocalDate
  end: LocalDate
  price: number
  productNumber: number
  /** Lower value wins. */
  priority: number
}

export function copyPeriod(period: Period): Period {
  return { ...period }
}
