/**
 * Command-line program
 *
 * Flags pick the environment and verbosity; everything else comes from the
 * environment's config file.
 */

import { Command, CommanderError, Option } from 'commander'
import type { DestinationStream } from 'pino'
import { z } from 'zod'
import { loadConfig, type Environment } from './config'
import { createLogger } from './logger'
import { createSqlitePeriodStore, readQuery } from './sqlite-adapter'
import type { PeriodStore } from './adapter'
import { runResolution } from './run'
import { PeriodResolverError, describeError } from './errors'

// ============================================================================
// Options
// ============================================================================

const CliOptionsSchema = z.object({
  dev: z.boolean(),
  debug: z.boolean(),
  configDir: z.string().optional(),
  onInvalid: z.enum(['reject', 'drop']),
})

export type CliOptions = z.infer<typeof CliOptionsSchema>

export function buildProgram(): Command {
  return new Command()
    .name('period-resolver')
    .description('Collapse overlapping product pricing periods so stronger priorities win')
    .option('--dev', 'run in development mode (config.development.json)', false)
    .option('--debug', 'log every comparison and mutation of the resolution run', false)
    .option('--config-dir <dir>', 'directory holding the config files')
    .addOption(
      new Option('--on-invalid <policy>', 'what to do with periods that fail validation')
        .choices(['reject', 'drop'])
        .default('reject'),
    )
}

/** Parses argv (node-style: executable and script first). */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  const program = buildProgram().exitOverride()
  program.parse([...argv], { from: 'node' })
  return CliOptionsSchema.parse(program.opts())
}

// ============================================================================
// Entry
// ============================================================================

export type CliDeps = {
  /** Log destination; defaults to stdout (pretty in development). */
  destination?: DestinationStream
  env?: NodeJS.ProcessEnv
  now?: () => Date
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliOptions(argv)
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode
    throw e
  }

  const environment: Environment = options.dev ? 'development' : 'production'
  const logger = createLogger({
    level: options.debug ? 'debug' : 'info',
    pretty: environment === 'development' && deps.destination === undefined,
    destination: deps.destination,
  })
  logger.info(`Running in ${environment} mode`)

  let store: PeriodStore | undefined
  try {
    const config = await loadConfig(environment, { configDir: options.configDir, env: deps.env })
    if (!options.debug) logger.level = config.logging.level
    logger.debug({ config }, 'config loaded')

    const query = await readQuery(config.queryPath)
    logger.debug({ query }, 'query loaded')

    store = await createSqlitePeriodStore({
      filename: config.database.filename,
      readonly: config.database.readonly,
      timeoutMs: config.database.timeoutMs,
      query,
      outputTable: config.output?.table,
    })
    logger.debug({ filename: config.database.filename }, 'database opened')

    await runResolution({
      config,
      store,
      logger,
      debug: options.debug,
      onInvalid: options.onInvalid,
      now: deps.now,
    })
    return 0
  } catch (e) {
    const code = e instanceof PeriodResolverError ? e.code : undefined
    logger.error({ code }, describeError(e))
    return 1
  } finally {
    await store?.close()
  }
}
