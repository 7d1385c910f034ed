/**
 * Logger
 *
 * Leveled console logging with a scope prefix. A custom sink replaces
 * console output entirely (tests use it to capture lines).
 *
 * @module logging/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

/**
 * Receives every message at or above the configured level
 */
export type LogSink = (level: LogLevel, scope: string, message: string, data?: unknown) => void

export interface Logger {
  readonly level: LogLevel
  readonly scope: string
  debug(message: string, data?: unknown): void
  info(message: string, data?: unknown): void
  warn(message: string, data?: unknown): void
  error(message: string, data?: unknown): void
  /** Logger sharing level and sink under a nested scope */
  child(scope: string): Logger
}

export interface LoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel
  /** Scope shown in the prefix (default: 'oplog-stats') */
  scope?: string
  /** Replaces console output */
  sink?: LogSink
}

const consoleSink: LogSink = (level, scope, message, data) => {
  const timestamp = new Date().toISOString()
  const prefix = `[${timestamp}] [${scope}:${level.toUpperCase()}]`

  switch (level) {
    case 'debug':
      console.debug(prefix, message, data ?? '')
      break
    case 'info':
      console.info(prefix, message, data ?? '')
      break
    case 'warn':
      console.warn(prefix, message, data ?? '')
      break
    case 'error':
      console.error(prefix, message, data ?? '')
      break
  }
}

class ScopedLogger implements Logger {
  constructor(
    readonly level: LogLevel,
    readonly scope: string,
    private readonly sink: LogSink
  ) {}

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data)
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.level, `${this.scope}:${scope}`, this.sink)
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return
    }
    this.sink(level, this.scope, message, data)
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ScopedLogger(options.level ?? 'info', options.scope ?? 'oplog-stats', options.sink ?? consoleSink)
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = createLogger({ sink: () => {} })
