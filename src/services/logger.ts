/**
 * Structured Logging for the wallet core
 *
 * Leveled console output with context objects. When `bufferSize` is above
 * zero the most recent entries are also retained in memory so a host can
 * export them for diagnostics.
 *
 * Never pass mnemonics, WIFs or passphrases as context.
 */

import { resolveLogLevel } from '../config'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogContext = Record<string, unknown>

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  context?: LogContext
  error?: {
    name: string
    message: string
    stack?: string
  }
}

export interface LoggerConfig {
  minLevel: LogLevel
  console: boolean
  /** Entries retained for {@link Logger.getEntries}; 0 keeps none */
  bufferSize: number
}

/**
 * What module code logs through; implemented by the root logger and its
 * children.
 */
export interface LogSink {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext, error?: unknown): void
  error(message: string, error?: unknown, context?: LogContext): void
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  console: true,
  bufferSize: 0
}

function describeError(error: Error): NonNullable<LogEntry['error']> {
  return { name: error.name, message: error.message, stack: error.stack }
}

/**
 * Non-Error throwables are kept as a string in the context.
 */
function withThrown(context: LogContext | undefined, thrown: unknown): {
  context: LogContext | undefined
  error: Error | undefined
} {
  if (thrown instanceof Error) {
    return { context, error: thrown }
  }
  if (thrown === undefined) {
    return { context, error: undefined }
  }
  return { context: { ...context, errorValue: String(thrown) }, error: undefined }
}

function formatEntry(entry: LogEntry): string {
  const time = entry.timestamp.slice(11, 19)
  const context = entry.context && Object.keys(entry.context).length > 0
    ? ` ${JSON.stringify(entry.context)}`
    : ''
  return `[${time}] ${entry.level.toUpperCase()}: ${entry.message}${context}`
}

class Logger implements LogSink {
  private config: LoggerConfig
  private entries: LogEntry[] = []

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config }
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config }
    this.trim()
  }

  private trim(): void {
    const overflow = this.entries.length - this.config.bufferSize
    if (overflow > 0) {
      this.entries.splice(0, overflow)
    }
  }

  private write(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (SEVERITY[level] < SEVERITY[this.config.minLevel]) return

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, context }
    if (error) {
      entry.error = describeError(error)
    }

    if (this.config.console) {
      console[level](formatEntry(entry))
      if (entry.error && SEVERITY[level] >= SEVERITY.warn) {
        console[level](entry.error.stack ?? entry.error.message)
      }
    }

    if (this.config.bufferSize > 0) {
      this.entries.push(entry)
      this.trim()
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext, error?: unknown): void {
    const merged = withThrown(context, error)
    this.write('warn', message, merged.context, merged.error)
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const merged = withThrown(context, error)
    this.write('error', message, merged.context, merged.error)
  }

  /**
   * Retained entries, oldest first
   */
  getEntries(): LogEntry[] {
    return [...this.entries]
  }

  exportEntries(): string {
    return JSON.stringify(this.entries, null, 2)
  }

  child(baseContext: LogContext): LogSink {
    const merge = (context?: LogContext): LogContext => ({ ...baseContext, ...context })
    return {
      debug: (message, context) => this.debug(message, merge(context)),
      info: (message, context) => this.info(message, merge(context)),
      warn: (message, context, error) => this.warn(message, merge(context), error),
      error: (message, error, context) => this.error(message, error, merge(context))
    }
  }
}

export const logger = new Logger({
  minLevel: resolveLogLevel(process.env.WALLET_LOG_LEVEL)
})

export { Logger }

// Module loggers
export const walletLogger = logger.child({ module: 'wallet' })
export const keyLogger = logger.child({ module: 'keys' })
export const apiLogger = logger.child({ module: 'api' })
export const cryptoLogger = logger.child({ module: 'crypto' })

export function logTransaction(action: string, txid: string, details?: LogContext): void {
  logger.info(`Transaction ${action}`, { txid, ...details })
}

export function logApiCall(endpoint: string, method: string, status?: number): void {
  logger.debug(`API ${method} ${endpoint}`, status !== undefined ? { status } : undefined)
}
