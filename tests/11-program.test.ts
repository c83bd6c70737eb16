/**
 * Segment 11: Command-line Program
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { parseCliOptions, runCli } from '../src/program'
import { createSqlitePeriodStore } from '../src/sqlite-adapter'
import { CONFIG_FILES } from '../src/config'
import { captureLogs } from './helpers/logs'

const fixedNow = () => new Date(2024, 0, 5, 9, 30, 0)

const QUERY = 'SELECT id, starts_on, ends_on, price, prod_num, priority FROM price_period'

const SEED = `
  CREATE TABLE price_period (id INTEGER, starts_on TEXT, ends_on TEXT, price REAL, prod_num INTEGER, priority INTEGER);
  INSERT INTO price_period VALUES (1, '2024-01-01', '2024-01-31', 9.99, 42, 2);
  INSERT INTO price_period VALUES (2, '2024-01-10', '2024-01-20', 7.5, 42, 1);
`

describe('Segment 11: Command-line Program', () => {
  describe('parseCliOptions', () => {
    it('defaults to production, no debug, reject invalid periods', () => {
      expect(parseCliOptions(['node', 'period-resolver'])).toEqual({
        dev: false,
        debug: false,
        onInvalid: 'reject',
      })
    })

    it('reads every flag', () => {
      expect(
        parseCliOptions(['node', 'period-resolver', '--dev', '--debug', '--config-dir', '/srv/periods', '--on-invalid', 'drop']),
      ).toEqual({ dev: true, debug: true, configDir: '/srv/periods', onInvalid: 'drop' })
    })
  })

  describe('runCli', () => {
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'period-cli-'))
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    async function writeSetup(config: Record<string, unknown>): Promise<void> {
      const seeder = await createSqlitePeriodStore({ filename: path.join(dir, 'periods.db'), query: QUERY })
      await seeder.execute(SEED)
      await seeder.close()
      await writeFile(path.join(dir, 'periods.sql'), QUERY, 'utf8')
      await writeFile(path.join(dir, CONFIG_FILES.production), JSON.stringify(config), 'utf8')
    }

    it('runs end to end against a SQLite file', async () => {
      await writeSetup({
        database: { filename: 'periods.db', readonly: false },
        queryPath: 'periods.sql',
        logging: { logToFile: true, filePath: 'logs/periods.log' },
        output: { table: 'resolved_period' },
      })
      const { records, destination } = captureLogs()

      const code = await runCli(['node', 'period-resolver', '--config-dir', dir], { destination, now: fixedNow })

      expect(code).toBe(0)
      expect(records[0]?.msg).toBe('Running in production mode')
      expect(records.at(-1)?.msg).toBe('resolution complete')

      const check = await createSqlitePeriodStore({ filename: path.join(dir, 'periods.db'), query: QUERY })
      try {
        expect(await check.rawQuery('SELECT id, period_start, period_end FROM resolved_period')).toEqual([
          { id: 1, period_start: '2024-01-01', period_end: '2024-01-09' },
          { id: 2, period_start: '2024-01-10', period_end: '2024-01-20' },
          { id: 1, period_start: '2024-01-21', period_end: '2024-01-31' },
        ])
      } finally {
        await check.close()
      }

      const log = await readFile(path.join(dir, 'logs', 'periods.log'), 'utf8')
      expect(log.trimEnd().split('\n')).toHaveLength(5)
    })

    it('exits 1 and logs the error code when the config is missing', async () => {
      const { records, destination } = captureLogs()

      const code = await runCli(['node', 'period-resolver', '--dev', '--config-dir', dir], { destination })

      expect(code).toBe(1)
      expect(records[0]?.msg).toBe('Running in development mode')
      const failure = records.find((r) => r.level === 50)
      expect(failure?.code).toBe('CONFIG')
    })

    it('exits 1 when the query file is missing', async () => {
      await writeSetup({ database: { filename: 'periods.db' }, queryPath: 'nope.sql', logging: {} })
      const { records, destination } = captureLogs()

      expect(await runCli(['node', 'period-resolver', '--config-dir', dir], { destination })).toBe(1)
      expect(records.find((r) => r.level === 50)?.code).toBe('DATA_SOURCE')
    })

    it('exits with commander\'s code on a bad flag value', async () => {
      const { destination } = captureLogs()
      const code = await runCli(['node', 'period-resolver', '--on-invalid', 'ignore'], { destination })
      expect(code).toBe(1)
    })
  })
})
