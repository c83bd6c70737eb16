/**
 * Period Log
 *
 * Human-readable, one line per period, appended to a plain text file:
 *
 *   2024-01-05 09:30:00 - Period 2024-01-01 to 2024-01-31, Prodnum: 42, Price 9.99, Priority 1
 */

import { appendFile, mkdir } from 'node:fs/promises'
import path from 'node:path'
import type { Period } from './types'
import { formatTimestamp } from './time-date'
import { LogWriteError, describeError } from './errors'

export { LogWriteError }

export type AppendPeriodLogOptions = {
  now?: () => Date
}

export function formatPeriodLine(period: Period, timestamp: string): string {
  return (
    `${timestamp} - Period ${period.start} to ${period.end}, ` +
    `Prodnum: ${period.productNumber}, Price ${period.price.toFixed(2)}, Priority ${period.priority}`
  )
}

/**
 * Appends one line per period in a single write. Every line of a call shares
 * one timestamp. Returns the number of lines written.
 */
export async function appendPeriodLog(
  filePath: string,
  periods: readonly Period[],
  options: AppendPeriodLogOptions = {},
): Promise<number> {
  if (periods.length === 0) return 0

  const timestamp = formatTimestamp((options.now ?? (() => new Date()))())
  const text = periods.map((p) => formatPeriodLine(p, timestamp) + '\n').join('')

  try {
    await mkdir(path.dirname(filePath), { recursive: true })
    await appendFile(filePath, text, 'utf8')
  } catch (e) {
    throw new LogWriteError(`Writing period log '${filePath}': ${describeError(e)}`, { cause: e })
  }
  return periods.length
}
