/**
 * Period Ordering
 *
 * Total order used by the resolution engine: product, then start date, then
 * priority (stronger first). Within one product this makes overlap detectable
 * from adjacent pairs alone: if an element does not reach its successor's
 * start, it cannot reach any later element either.
 */

import type { Period } from './types'
import { compareDates } from './time-date'

export function comparePeriods(a: Period, b: Period): number {
  if (a.productNumber !== b.productNumber) return a.productNumber - b.productNumber
  const byStart = compareDates(a.start, b.start)
  if (byStart !== 0) return byStart
  return a.priority - b.priority
}

/** Sorts in place (stable) and returns the same array. */
export function sortPeriods<T extends Period>(periods: T[]): T[] {
  return periods.sort(comparePeriods)
}

export function isSorted(periods: readonly Period[]): boolean {
  for (let i = 1; i < periods.length; i++) {
    const prev = periods[i - 1]
    const cur = periods[i]
    if (prev && cur && comparePeriods(prev, cur) > 0) return false
  }
  return true
}
