/**
 * Product Partitioning
 *
 * Periods of different products never interact, so a record set can be cut
 * into per-product chunks, each resolved on its own, and the results
 * concatenated without a merge step. Chunks run one after another here; the
 * split is what a worker pool would hand out.
 */

import type { Period } from './types'
import { resolvePeriods, type ResolveOptions } from './resolution'

/** Groups periods by product number. Keys come out in ascending order; chunk order follows input order. */
export function partitionByProduct(periods: readonly Period[]): Map<number, Period[]> {
  const byProduct = new Map<number, Period[]>()
  for (const period of periods) {
    const chunk = byProduct.get(period.productNumber)
    if (chunk) chunk.push(period)
    else byProduct.set(period.productNumber, [period])
  }

  const keys = [...byProduct.keys()].sort((a, b) => a - b)
  const ordered = new Map<number, Period[]>()
  for (const key of keys) {
    const chunk = byProduct.get(key)
    if (chunk) ordered.set(key, chunk)
  }
  return ordered
}

/** Same output as `resolvePeriods` over the whole set, one product at a time. */
export function resolveByProduct(periods: readonly Period[], options: ResolveOptions = {}): Period[] {
  const resolved: Period[] = []
  for (const chunk of partitionByProduct(periods).values()) {
    resolved.push(...resolvePeriods(chunk, options))
  }
  return resolved
}
