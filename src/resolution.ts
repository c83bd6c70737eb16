/**
 * Resolution Engine
 *
 * Collapses overlapping periods of the same product into a non-overlapping
 * set. Works on a sorted copy of the input: scan adjacent pairs, resolve the
 * first overlap found by trimming, splitting or removing, re-sort, and start
 * over from the top. Stops when a full pass changes nothing.
 *
 * Every mutation hands days only to the stronger (or, on a priority tie, the
 * earlier) period, so each day ends up owned by a period of the lowest
 * priority value that covered it on input.
 *
 * The engine does no validation: callers must pass periods with
 * `start <= end` (see validation.ts).
 */

import type { Period } from './types'
import { copyPeriod } from './types'
import { sortPeriods } from './ordering'
import { nextDay, previousDay, dateAfter, dateBefore } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type ResolutionEvent =
  | { type: 'compare'; index: number; current: Period; next: Period; overlap: boolean }
  | { type: 'split'; original: Period; head: Period; tail: Period; winner: Period }
  | { type: 'trim'; side: 'current' | 'next'; before: Period; after: Period; winner: Period }
  | { type: 'remove'; removed: Period; winner: Period }
  | { type: 'restart'; size: number }

export type ResolutionEventType = ResolutionEvent['type']

export type ResolveOptions = {
  /** Receives copies; mutating them has no effect on the run. */
  onEvent?: (event: ResolutionEvent) => void
}

type Emit = (event: ResolutionEvent) => void

// ============================================================================
// Overlap
// ============================================================================

/**
 * True when both periods belong to the same product and share at least one
 * day. Periods that merely touch (one ends the day before the other starts)
 * do not overlap.
 */
export function periodsOverlap(a: Period, b: Period): boolean {
  if (a.productNumber !== b.productNumber) return false
  return !dateBefore(a.end, b.start) && !dateBefore(b.end, a.start)
}

// ============================================================================
// Engine
// ============================================================================

export function resolvePeriods(periods: readonly Period[], options: ResolveOptions = {}): Period[] {
  const working = sortPeriods(periods.map(copyPeriod))
  const emit = options.onEvent

  let i = 0
  while (i < working.length - 1) {
    const current = working[i]
    const next = working[i + 1]
    if (current === undefined || next === undefined) break

    // Sorted order: next.start >= current.start, so sharing a day reduces to this.
    const overlap = current.productNumber === next.productNumber && !dateBefore(current.end, next.start)
    emit?.({ type: 'compare', index: i, current: copyPeriod(current), next: copyPeriod(next), overlap })

    if (!overlap) {
      i++
      continue
    }

    resolvePair(working, i, current, next, emit)
    sortPeriods(working)
    i = 0
    emit?.({ type: 'restart', size: working.length })
  }

  return working
}

/** Applies exactly one mutation for the overlapping pair at `index`, `index + 1`. */
function resolvePair(working: Period[], index: number, current: Period, next: Period, emit: Emit | undefined): void {
  const before = emit ? copyPeriod(current) : undefined

  if (current.priority > next.priority) {
    // Current is weaker. Sorting puts the stronger of two same-start periods
    // first, so here next.start > current.start and the head stays non-empty.
    if (dateAfter(current.end, next.end)) {
      const tail: Period = { ...current, start: nextDay(next.end) }
      working.push(tail)
      current.end = previousDay(next.start)
      if (emit && before) {
        emit({ type: 'split', original: before, head: copyPeriod(current), tail: copyPeriod(tail), winner: copyPeriod(next) })
      }
    } else {
      current.end = previousDay(next.start)
      if (emit && before) {
        emit({ type: 'trim', side: 'current', before, after: copyPeriod(current), winner: copyPeriod(next) })
      }
    }
    return
  }

  // Current is equal or stronger and keeps the shared days.
  if (dateBefore(current.end, next.end)) {
    const trimmed = emit ? copyPeriod(next) : undefined
    next.start = nextDay(current.end)
    if (emit && trimmed) {
      emit({ type: 'trim', side: 'next', before: trimmed, after: copyPeriod(next), winner: copyPeriod(current) })
    }
  } else {
    working.splice(index + 1, 1)
    emit?.({ type: 'remove', removed: copyPeriod(next), winner: copyPeriod(current) })
  }
}
