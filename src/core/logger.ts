import { pino, destination, type LevelWithSilent, type Logger } from 'pino'

export type { Logger }
export type LogLevel = LevelWithSilent

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LogLevel[]

/**
 * Component logger. Writes to stderr: stdout and the entry-point responses
 * belong to the host, logs are a side channel.
 */
export function createLogger(name: string, level: LogLevel = 'info'): Logger {
  return pino({ name, level }, destination(2))
}

/** Logger that drops everything (tests, embedding hosts that don't want output). */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
