/**
 * Adapter
 *
 * Data-access interface for period records + in-memory implementation.
 * All methods are async so a networked database client can sit behind it.
 */

import type { Period } from './types'
import { copyPeriod } from './types'
import { DataSourceError } from './errors'

export type { Period, LocalDate } from './types'

// ============================================================================
// Interface
// ============================================================================

export type PeriodStore = {
  /** Snapshot of the source records, in source order. */
  fetchPeriods(): Promise<Period[]>
  /** Replaces the previously saved resolved set. */
  saveResolved(periods: readonly Period[]): Promise<void>
  close(): Promise<void>
}

export type MemoryPeriodStore = PeriodStore & {
  /** Sets passed to saveResolved, oldest first. */
  getSaved(): Period[][]
  isClosed(): boolean
}

// ============================================================================
// In-Memory Store
// ============================================================================

export function createMemoryPeriodStore(initial: readonly Period[] = []): MemoryPeriodStore {
  const source = initial.map(copyPeriod)
  const saved: Period[][] = []
  let closed = false

  function assertOpen(): void {
    if (closed) throw new DataSourceError('Period store is closed')
  }

  return {
    async fetchPeriods() {
      assertOpen()
      return source.map(copyPeriod)
    },

    async saveResolved(periods) {
      assertOpen()
      saved.push(periods.map(copyPeriod))
    },

    async close() {
      closed = true
    },

    getSaved() {
      return saved.map((set) => set.map(copyPeriod))
    },

    isClosed() {
      return closed
    },
  }
}
