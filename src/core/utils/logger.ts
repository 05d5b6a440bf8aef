import { pino, type Logger, type LevelWithSilent } from 'pino'

export type { Logger }

export interface LoggerOptions {
  level?: LevelWithSilent
  name?: string
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'splitledger',
    level: options.level ?? 'info'
  })
}

/**
 * Default for services constructed without a logger
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
