/**
 * Segment 02: Period Ordering
 *
 * Product, then start date, then priority.
 */
import { describe, it, expect } from 'vitest'
import { comparePeriods, sortPeriods, isSorted } from '../src/ordering'
import { period } from './helpers/periods'

describe('Segment 02: Period Ordering', () => {
  it('orders by product number first', () => {
    const a = period(1, '2024-01-01', '2024-01-31', 1, { productNumber: 2 })
    const b = period(2, '2024-06-01', '2024-06-30', 1, { productNumber: 1 })
    expect(comparePeriods(a, b)).toBeGreaterThan(0)
    expect(sortPeriods([a, b]).map((p) => p.id)).toEqual([2, 1])
  })

  it('then by start date', () => {
    const a = period(1, '2024-02-01', '2024-02-10', 1)
    const b = period(2, '2024-01-15', '2024-03-01', 5)
    expect(sortPeriods([a, b]).map((p) => p.id)).toEqual([2, 1])
  })

  it('then by priority, stronger first', () => {
    const weak = period(1, '2024-01-01', '2024-01-31', 3)
    const strong = period(2, '2024-01-01', '2024-01-05', 1)
    expect(sortPeriods([weak, strong]).map((p) => p.id)).toEqual([2, 1])
  })

  it('keeps input order for full ties', () => {
    const a = period(1, '2024-01-01', '2024-01-31', 1)
    const b = period(2, '2024-01-01', '2024-01-10', 1)
    expect(comparePeriods(a, b)).toBe(0)
    expect(sortPeriods([a, b]).map((p) => p.id)).toEqual([1, 2])
    expect(sortPeriods([b, a]).map((p) => p.id)).toEqual([2, 1])
  })

  it('sorts in place and returns the same array', () => {
    const list = [period(1, '2024-02-01', '2024-02-02', 1), period(2, '2024-01-01', '2024-01-02', 1)]
    expect(sortPeriods(list)).toBe(list)
    expect(list[0]?.id).toBe(2)
  })

  it('isSorted', () => {
    const a = period(1, '2024-01-01', '2024-01-02', 1)
    const b = period(2, '2024-01-03', '2024-01-04', 1)
    expect(isSorted([a, b])).toBe(true)
    expect(isSorted([b, a])).toBe(false)
    expect(isSorted([])).toBe(true)
  })
})
