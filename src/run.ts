/**
 * Run Orchestration
 *
 * One resolution run: fetch, validate, resolve, log, persist. Fails fast:
 * nothing is written to the period log or the output table until the
 * resolved set exists.
 */

import type { Config } from './config'
import type { Logger } from './logger'
import type { PeriodStore } from './adapter'
import type { Period } from './types'
import { validatePeriods, type InvalidPeriodPolicy } from './validation'
import { resolveByProduct } from './partition'
import type { ResolutionEvent } from './resolution'
import { appendPeriodLog } from './period-log'

// ============================================================================
// Types
// ============================================================================

export type RunOptions = {
  config: Config
  store: PeriodStore
  logger: Logger
  /** Log every comparison and mutation of the resolution engine. */
  debug?: boolean
  onInvalid?: InvalidPeriodPolicy
  now?: () => Date
}

export type RunSummary = {
  fetched: number
  dropped: number
  resolved: number
  splits: number
  trims: number
  removals: number
  restarts: number
  saved: boolean
}

export type RunResult = {
  periods: Period[]
  summary: RunSummary
}

// ============================================================================
// Engine Tracing
// ============================================================================

function describe(p: Period): string {
  return `prodnum ${p.productNumber} ${p.start}..${p.end} priority ${p.priority}`
}

/** Routes engine events to the logger at debug level. */
export function traceResolution(logger: Logger): (event: ResolutionEvent) => void {
  return (event) => {
    switch (event.type) {
      case 'compare':
        logger.debug(
          { index: event.index, overlap: event.overlap },
          `compare [${describe(event.current)}] with [${describe(event.next)}]`,
        )
        break
      case 'split':
        logger.debug(
          { id: event.original.id },
          `split [${describe(event.original)}] around [${describe(event.winner)}] into ${event.head.start}..${event.head.end} and ${event.tail.start}..${event.tail.end}`,
        )
        break
      case 'trim':
        logger.debug(
          { id: event.before.id, side: event.side },
          `trim [${describe(event.before)}] to ${event.after.start}..${event.after.end} for [${describe(event.winner)}]`,
        )
        break
      case 'remove':
        logger.debug({ id: event.removed.id }, `remove [${describe(event.removed)}] covered by [${describe(event.winner)}]`)
        break
      case 'restart':
        logger.debug({ size: event.size }, 'resorted, restarting scan')
        break
    }
  }
}

// ============================================================================
// Run
// ============================================================================

export async function runResolution(options: RunOptions): Promise<RunResult> {
  const { config, store, logger } = options
  const now = options.now ?? (() => new Date())

  const fetched = await store.fetchPeriods()
  logger.info({ count: fetched.length }, 'fetched periods')

  const validated = validatePeriods(fetched, options.onInvalid ?? 'reject')
  if (!validated.ok) throw validated.error
  const { valid, rejected } = validated.value
  for (const issue of rejected) {
    logger.warn({ index: issue.index, id: issue.id }, `dropped invalid period: ${issue.message}`)
  }

  const counts = { splits: 0, trims: 0, removals: 0, restarts: 0 }
  const trace = options.debug ? traceResolution(logger) : undefined
  const resolved = resolveByProduct(valid, {
    onEvent: (event) => {
      if (event.type === 'split') counts.splits++
      else if (event.type === 'trim') counts.trims++
      else if (event.type === 'remove') counts.removals++
      else if (event.type === 'restart') counts.restarts++
      trace?.(event)
    },
  })

  const filePath = config.logging.filePath
  if (config.logging.logToFile && filePath !== undefined) {
    const before = await appendPeriodLog(filePath, fetched, { now })
    const after = await appendPeriodLog(filePath, resolved, { now })
    logger.info({ filePath, fetched: before, resolved: after }, 'periods logged')
  }

  let saved = false
  if (config.output) {
    await store.saveResolved(resolved)
    saved = true
    logger.info({ table: config.output.table, count: resolved.length }, 'resolved periods saved')
  }

  const summary: RunSummary = {
    fetched: fetched.length,
    dropped: rejected.length,
    resolved: resolved.length,
    ...counts,
    saved,
  }
  logger.info(summary, 'resolution complete')
  return { periods: resolved, summary }
}
