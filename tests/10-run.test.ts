/**
 * Segment 10: Run Orchestration
 *
 * fetch → validate → resolve → period log → persist, failing fast.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { runResolution } from '../src/run'
import { createMemoryPeriodStore } from '../src/adapter'
import { parseConfig, type Config } from '../src/config'
import { ValidationError } from '../src/errors'
import { period } from './helpers/periods'
import { captureLogs, messages } from './helpers/logs'

const fixedNow = () => new Date(2024, 0, 5, 9, 30, 0)

const input = [
  period(1, '2024-01-01', '2024-01-31', 2, { productNumber: 1 }),
  period(2, '2024-01-10', '2024-01-20', 1, { productNumber: 1 }),
  period(3, '2024-01-01', '2024-01-31', 1, { productNumber: 2 }),
  period(4, '2024-01-10', '2024-01-20', 2, { productNumber: 2 }),
]

function makeConfig(overrides: Record<string, unknown> = {}): Config {
  return parseConfig({
    database: { filename: ':memory:', readonly: false },
    queryPath: 'periods.sql',
    logging: {},
    ...overrides,
  })
}

describe('Segment 10: Run Orchestration', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'period-run-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('resolves the fetched set and summarises the run', async () => {
    const { logger, records } = captureLogs()
    const store = createMemoryPeriodStore(input)

    const { periods, summary } = await runResolution({ config: makeConfig(), store, logger, now: fixedNow })

    expect(periods.map((p) => [p.id, p.start, p.end])).toEqual([
      [1, '2024-01-01', '2024-01-09'],
      [2, '2024-01-10', '2024-01-20'],
      [1, '2024-01-21', '2024-01-31'],
      [3, '2024-01-01', '2024-01-31'],
    ])
    expect(summary).toEqual({
      fetched: 4,
      dropped: 0,
      resolved: 4,
      splits: 1,
      trims: 0,
      removals: 1,
      restarts: 2,
      saved: false,
    })
    expect(messages(records)).toEqual(['fetched periods', 'resolution complete'])
    expect(store.getSaved()).toEqual([])
  })

  it('appends the input set, then the resolved set, to the period log', async () => {
    const { logger } = captureLogs()
    const filePath = path.join(dir, 'periods.log')
    const config = makeConfig({ logging: { logToFile: true, filePath } })

    await runResolution({ config, store: createMemoryPeriodStore(input), logger, now: fixedNow })

    const lines = (await readFile(filePath, 'utf8')).trimEnd().split('\n')
    expect(lines).toHaveLength(8)
    expect(lines[0]).toBe('2024-01-05 09:30:00 - Period 2024-01-01 to 2024-01-31, Prodnum: 1, Price 10.00, Priority 2')
    expect(lines[4]).toBe('2024-01-05 09:30:00 - Period 2024-01-01 to 2024-01-09, Prodnum: 1, Price 10.00, Priority 2')
    expect(lines[7]).toBe('2024-01-05 09:30:00 - Period 2024-01-01 to 2024-01-31, Prodnum: 2, Price 10.00, Priority 1')
  })

  it('saves the resolved set when an output table is configured', async () => {
    const { logger } = captureLogs()
    const store = createMemoryPeriodStore(input)
    const config = makeConfig({ output: { table: 'resolved_period' } })

    const { periods, summary } = await runResolution({ config, store, logger })

    expect(summary.saved).toBe(true)
    expect(store.getSaved()).toEqual([periods])
  })

  it('rejects a batch with an invalid period before writing anything', async () => {
    const { logger } = captureLogs()
    const filePath = path.join(dir, 'periods.log')
    const store = createMemoryPeriodStore([...input, period(5, '2024-03-10', '2024-03-01', 1)])
    const config = makeConfig({ logging: { logToFile: true, filePath }, output: { table: 'resolved_period' } })

    await expect(runResolution({ config, store, logger })).rejects.toThrow(ValidationError)

    await expect(stat(filePath)).rejects.toThrow()
    expect(store.getSaved()).toEqual([])
  })

  it('drop policy leaves invalid periods out and warns', async () => {
    const { logger, records } = captureLogs()
    const store = createMemoryPeriodStore([period(5, '2024-03-10', '2024-03-01', 1), ...input])

    const { summary } = await runResolution({ config: makeConfig(), store, logger, onInvalid: 'drop' })

    expect(summary.fetched).toBe(5)
    expect(summary.dropped).toBe(1)
    expect(summary.resolved).toBe(4)
    const warning = records.find((r) => r.level === 40)
    expect(warning).toMatchObject({
      index: 0,
      id: 5,
      msg: 'dropped invalid period: Period 5: start 2024-03-10 is after end 2024-03-01',
    })
  })

  it('traces engine steps at debug level when asked', async () => {
    const { logger, records } = captureLogs('debug')

    await runResolution({
      config: makeConfig(),
      store: createMemoryPeriodStore(input.slice(0, 2)),
      logger,
      debug: true,
    })

    expect(messages(records)).toEqual([
      'fetched periods',
      'compare [prodnum 1 2024-01-01..2024-01-31 priority 2] with [prodnum 1 2024-01-10..2024-01-20 priority 1]',
      'split [prodnum 1 2024-01-01..2024-01-31 priority 2] around [prodnum 1 2024-01-10..2024-01-20 priority 1] into 2024-01-01..2024-01-09 and 2024-01-21..2024-01-31',
      'resorted, restarting scan',
      'compare [prodnum 1 2024-01-01..2024-01-09 priority 2] with [prodnum 1 2024-01-10..2024-01-20 priority 1]',
      'compare [prodnum 1 2024-01-10..2024-01-20 priority 1] with [prodnum 1 2024-01-21..2024-01-31 priority 2]',
      'resolution complete',
    ])
  })

  it('does not trace without debug', async () => {
    const { logger, records } = captureLogs('debug')
    await runResolution({ config: makeConfig(), store: createMemoryPeriodStore(input), logger })
    expect(messages(records)).toEqual(['fetched periods', 'resolution complete'])
  })
})
