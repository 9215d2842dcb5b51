/**
 * Logging for collection verbs and engines
 * @module utils/logger
 */

/**
 * Logger interface accepted by collections and engines
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export type LogLevel = keyof Logger

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export interface ConsoleLoggerOptions {
  /** Lowest level written (default: 'info') */
  level?: LogLevel
}

/**
 * Logger writing `LEVEL message` lines to the console. Messages below
 * `level` are discarded.
 *
 * @example
 * ```typescript
 * new Collection(rows, { logger: createConsoleLogger({ level: 'debug' }) })
 *   .leftJoin(other, { id: 'id' })
 * // DEBUG [rowset:leftJoin] left join matched 3 of 4 left rows { ... }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info']
  const sink = (level: LogLevel, method: 'log' | 'warn' | 'error') =>
    (message: string, context?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] < threshold) return
      const line = `${level.toUpperCase()} ${message}`
      if (context === undefined) {
        console[method](line)
      } else {
        console[method](line, context)
      }
    }
  return {
    debug: sink('debug', 'log'),
    info: sink('info', 'log'),
    warn: sink('warn', 'warn'),
    error: sink('error', 'error'),
  }
}

/**
 * Console logger at the default `info` level
 */
export const defaultLogger: Logger = createConsoleLogger()

/**
 * Logger that discards everything; the default for collections
 */
export function createSilentLogger(): Logger {
  const discard = (): void => {}
  return { debug: discard, info: discard, warn: discard, error: discard }
}

/**
 * Scopes a logger to one collection verb. Messages are prefixed with
 * `[rowset:<verb>]` and every context is merged over `verbContext`, so
 * engine messages carry the collection's group keys and size.
 */
export function createVerbLogger(
  verb: string,
  base: Logger,
  verbContext: Record<string, unknown> = {}
): Logger {
  const prefix = `[rowset:${verb}]`
  const forward = (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void => {
      base[level](`${prefix} ${message}`, { ...verbContext, ...context })
    }
  return {
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  }
}
