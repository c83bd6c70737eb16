/**
 * SQLite Adapter
 *
 * Production period store on better-sqlite3. Reads periods with a
 * caller-supplied query and optionally writes the resolved set to an output
 * table.
 */
import Database from 'better-sqlite3'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { PeriodStore, Period } from './adapter'
import { parseDateValue } from './time-date'
import { DataSourceError, InvalidDataError, describeError } from './errors'

// Re-export errors for callers of this module
export { DataSourceError, InvalidDataError }

// ============================================================================
// Types
// ============================================================================

export type SqlitePeriodStoreOptions = {
  filename: string
  /**
   * Must select, in this order: id, start date, end date, price,
   * product number, priority. Columns are read by position, not name.
   */
  query: string
  readonly?: boolean
  timeoutMs?: number
  outputTable?: string
}

export type SqliteExtras = {
  listTables(): Promise<string[]>
  execute(sql: string): Promise<void>
  rawQuery(sql: string): Promise<unknown[]>
}

export type SqlitePeriodStore = PeriodStore & SqliteExtras

// ============================================================================
// Row Decoding
// ============================================================================

const dateCell = z.string().transform((value, ctx) => {
  const parsed = parseDateValue(value)
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
    return z.NEVER
  }
  return parsed.value
})

// Statements run with safeIntegers, so INTEGER cells arrive as bigint.
const intCell = z.union([z.bigint(), z.number()]).transform((value, ctx) => {
  const n = Number(value)
  if (!Number.isSafeInteger(n)) {
    const message = typeof value === 'bigint' || Number.isInteger(n)
      ? `${value} is outside the safe integer range`
      : `expected an integer, got ${value}`
    ctx.addIssue({ code: z.ZodIssueCode.custom, message })
    return z.NEVER
  }
  return n
})

const priceCell = z.union([z.bigint(), z.number()]).transform((value, ctx) => {
  const n = Number(value)
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a finite number, got ${value}` })
    return z.NEVER
  }
  return n
})

const PeriodRowSchema = z.tuple([intCell, dateCell, dateCell, priceCell, intCell, intCell])

const COLUMN_NAMES = ['id', 'start', 'end', 'price', 'product number', 'priority']

function decodeRow(row: unknown, index: number): Period {
  const parsed = PeriodRowSchema.safeParse(row)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => {
        const column = typeof issue.path[0] === 'number' ? COLUMN_NAMES[issue.path[0]] : undefined
        return column ? `${column}: ${issue.message}` : issue.message
      })
      .join('; ')
    throw new InvalidDataError(`Row ${index + 1}: ${detail}`)
  }
  const [id, start, end, price, productNumber, priority] = parsed.data
  return { id, start, end, price, productNumber, priority }
}

// ============================================================================
// Helpers
// ============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

function quoteIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) throw new DataSourceError(`Invalid table name: '${name}'`)
  return `"${name}"`
}

function safe<T>(context: string, fn: () => T): T {
  try {
    return fn()
  } catch (e) {
    if (e instanceof DataSourceError || e instanceof InvalidDataError) throw e
    throw new DataSourceError(`${context}: ${describeError(e)}`, { cause: e })
  }
}

/** Loads the period query from its file. */
export async function readQuery(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8')
  } catch (e) {
    throw new DataSourceError(`Failed to read query from '${path}': ${describeError(e)}`, { cause: e })
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqlitePeriodStore(options: SqlitePeriodStoreOptions): Promise<SqlitePeriodStore> {
  const readonly = options.readonly ?? false
  const db = safe(`Failed to open database '${options.filename}'`, () =>
    new Database(options.filename, {
      readonly,
      fileMustExist: readonly,
      timeout: options.timeoutMs ?? 5000,
    }),
  )

  const outputTable = options.outputTable

  const store: SqlitePeriodStore = {
    async fetchPeriods() {
      const rows = safe('Period query failed', () => db.prepare(options.query).raw(true).safeIntegers(true).all())
      return rows.map(decodeRow)
    },

    async saveResolved(periods) {
      if (outputTable === undefined) {
        throw new DataSourceError('No output table configured for resolved periods')
      }
      if (readonly) {
        throw new DataSourceError('Cannot save resolved periods: database opened read-only')
      }
      const table = quoteIdentifier(outputTable)

      safe(`Failed to save resolved periods to '${outputTable}'`, () => {
        db.exec(`
          CREATE TABLE IF NOT EXISTS ${table} (
            id INTEGER NOT NULL,
            period_start TEXT NOT NULL,
            period_end TEXT NOT NULL,
            price REAL NOT NULL,
            prod_num INTEGER NOT NULL,
            period_priority INTEGER NOT NULL
          )
        `)
        const clear = db.prepare(`DELETE FROM ${table}`)
        const insert = db.prepare(
          `INSERT INTO ${table} (id, period_start, period_end, price, prod_num, period_priority) VALUES (?, ?, ?, ?, ?, ?)`,
        )
        const replaceAll = db.transaction((rows: readonly Period[]) => {
          clear.run()
          for (const p of rows) {
            insert.run(p.id, p.start, p.end, p.price, p.productNumber, p.priority)
          }
        })
        replaceAll(periods)
      })
    },

    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = safe('Listing tables failed', () => db.prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).pluck().all())
      return rows.filter((name): name is string => typeof name === 'string')
    },

    async execute(sql: string) {
      safe('Statement failed', () => db.exec(sql))
    },

    async rawQuery(sql: string) {
      return safe('Query failed', () => db.prepare(sql).all())
    },
  }

  return store
}
