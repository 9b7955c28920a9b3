import { pino, stdSerializers } from 'pino'
import type { Logger, LevelWithSilent } from 'pino'

export type { Logger }

export interface LoggerOptions {
  /** Minimum level emitted (defaults to LOG_LEVEL, then 'info') */
  level?: LevelWithSilent
  /** Name bound to every record */
  name?: string
}

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

/**
 * Narrows an arbitrary string (typically an env var) to a pino level.
 */
export function parseLogLevel(value: string | undefined): LevelWithSilent | undefined {
  if (!value) return undefined
  const lowered = value.toLowerCase()
  return LEVELS.find((level) => level === lowered)
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'roster-canon',
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: stdSerializers.err,
      error: stdSerializers.err,
    },
  })
}

export const logger = createLogger()

/** Logger that discards everything; handy default for tests */
export const silentLogger: Logger = pino({ level: 'silent' })

export function moduleLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module })
}
