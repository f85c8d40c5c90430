import createDebug from 'debug'
import { createLogger, formatEntry, type Logger } from '../logging/logger.js'
import { output } from './output.js'

/** Debug namespace used for verbose output */
export const DEBUG_NAMESPACE = 'ssdp-scout'

/**
 * Logger for the command line. Debug entries go through `debug` and are
 * shown only when `verbose` is set; the rest go to stderr.
 */
export function createCliLogger(options: { verbose?: boolean } = {}): Logger {
  const trace = createDebug(DEBUG_NAMESPACE)
  trace.enabled = options.verbose ?? false

  return createLogger((entry) => {
    const line = formatEntry(entry)
    switch (entry.level) {
      case 'debug':
        trace(line)
        break
      case 'info':
        output.log(line)
        break
      case 'warn':
        output.warn(line)
        break
      case 'error':
        output.error(line)
        break
    }
  })
}
