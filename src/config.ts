/**
 * Configuration
 *
 * One JSON file per environment, validated with zod. Relative paths in the
 * file are resolved against the file's own directory so a run does not depend
 * on the working directory.
 */

import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { config as loadEnv } from 'dotenv'
import { z } from 'zod'
import { ConfigError, describeError } from './errors'

export { ConfigError }

// ============================================================================
// Environments
// ============================================================================

export const ENVIRONMENTS = ['development', 'production'] as const

export type Environment = (typeof ENVIRONMENTS)[number]

export const CONFIG_FILES: Record<Environment, string> = {
  development: 'config.development.json',
  production: 'config.production.json',
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

// ============================================================================
// Schema
// ============================================================================

const ConfigSchema = z
  .object({
    database: z.object({
      filename: z.string().min(1),
      readonly: z.boolean().default(true),
      timeoutMs: z.number().int().min(0).default(5000),
    }),
    queryPath: z.string().min(1),
    logging: z.object({
      logToFile: z.boolean().default(false),
      filePath: z.string().min(1).optional(),
      level: z.enum(LOG_LEVELS).default('info'),
    }),
    output: z
      .object({
        table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier'),
      })
      .optional(),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.logging.logToFile && cfg.logging.filePath === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['logging', 'filePath'],
        message: 'required when logToFile is true',
      })
    }
    if (cfg.output && cfg.database.readonly) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['database', 'readonly'],
        message: 'must be false when an output table is configured',
      })
    }
  })

export type Config = z.infer<typeof ConfigSchema>

// ============================================================================
// Loading
// ============================================================================

export type LoadConfigOptions = {
  /** Directory holding the config files. Defaults to PERIOD_RESOLVER_CONFIG_DIR, then cwd. */
  configDir?: string
  env?: NodeJS.ProcessEnv
}

/** Loads `.env` from the working directory into process.env; a missing file is fine. */
export function loadDotenv(): void {
  loadEnv()
}

export function resolveConfigDir(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env
  return path.resolve(options.configDir ?? env.PERIOD_RESOLVER_CONFIG_DIR ?? process.cwd())
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/** Validates an already-parsed config object. Paths are left as written. */
export function parseConfig(raw: unknown, source = 'config'): Config {
  const parsed = ConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

function resolvePaths(config: Config, baseDir: string): Config {
  const resolve = (p: string) => (p === ':memory:' ? p : path.resolve(baseDir, p))
  return {
    ...config,
    database: { ...config.database, filename: resolve(config.database.filename) },
    queryPath: resolve(config.queryPath),
    logging: {
      ...config.logging,
      filePath: config.logging.filePath === undefined ? undefined : resolve(config.logging.filePath),
    },
  }
}

export async function loadConfig(environment: Environment, options: LoadConfigOptions = {}): Promise<Config> {
  const dir = resolveConfigDir(options)
  const file = path.join(dir, CONFIG_FILES[environment])

  let text: string
  try {
    text = await readFile(file, 'utf8')
  } catch (e) {
    throw new ConfigError(`Reading config file '${file}': ${describeError(e)}`, { cause: e })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (e) {
    throw new ConfigError(`Parsing config file '${file}': ${describeError(e)}`, { cause: e })
  }

  return resolvePaths(parseConfig(raw, `config file '${file}'`), dir)
}
