/**
 * Injectable structured logger.
 *
 * Discovery components accept a Logger and default to `silentLogger`;
 * where entries end up is decided by whoever builds the sink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, unknown>

export interface LogEntry {
  level: LogLevel
  message: string
  fields?: LogFields
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
}

/** Build a Logger that forwards every entry to `sink`. */
export function createLogger(sink: LogSink): Logger {
  const at = (level: LogLevel) => (message: string, fields?: LogFields) => {
    sink(fields ? { level, message, fields } : { level, message })
  }
  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  }
}

/** Drops every entry. */
export const silentLogger: Logger = createLogger(() => undefined)

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s|"/.test(value) ? JSON.stringify(value) : value
  }
  if (value instanceof Error) return JSON.stringify(value.message)
  if (value !== null && typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

/**
 * Render an entry as `message key=value ...`. String values containing
 * whitespace or quotes are JSON-quoted.
 */
export function formatEntry(entry: LogEntry): string {
  if (!entry.fields) return entry.message
  const pairs = Object.entries(entry.fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
  return pairs.length > 0 ? `${entry.message} ${pairs.join(' ')}` : entry.message
}
