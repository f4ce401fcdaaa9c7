/**
 * @file Datastore Logger
 *
 * Logging is injected rather than global. Every component takes a
 * `StoreLogger`; the default writes timestamped lines to the console and
 * `silentLogger` drops everything.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log sink for one severity.
 * @param message - The message to log
 * @param data - Optional structured data to include
 */
export interface LogFn {
  (message: string, data?: Record<string, unknown>): void
}

/**
 * Logger used by every datastore component.
 */
export interface StoreLogger {
  debug: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /**
   * Prefix placed before the timestamp.
   * @default 'search-datastore'
   */
  name?: string

  /**
   * Emit debug lines.
   * @default false
   */
  debug?: boolean
}

// =============================================================================
// Implementations
// =============================================================================

const noop: LogFn = () => {}

/**
 * Logger that discards everything.
 */
export const silentLogger: StoreLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}

/**
 * Create a logger writing to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): StoreLogger {
  const name = options.name ?? 'search-datastore'

  const write = (sink: (...args: unknown[]) => void): LogFn => {
    return (message, data) => {
      const prefix = `[${name} ${new Date().toISOString()}]`
      if (data) {
        sink(prefix, message, data)
      } else {
        sink(prefix, message)
      }
    }
  }

  return {
    debug: options.debug ? write(console.debug) : noop,
    info: write(console.info),
    warn: write(console.warn),
    error: write(console.error),
  }
}
