/**
 * Pino-based logger
 *
 * JSON lines by default, pino-pretty when asked for (development runs).
 * Tests pass their own destination stream to capture output.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino'
import type { LogLevel } from './config'

export type { Logger } from 'pino'

export type LoggerConfig = {
  name?: string
  level?: LogLevel
  pretty?: boolean
  destination?: DestinationStream
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: config.name ?? 'period-resolver',
    level: config.level ?? 'info',
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  }

  if (config.destination) {
    return pino(options, config.destination)
  }

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  }

  return pino(options)
}
