export * from './discovery/index.js'
export { resolveDiscoveryRequest, DEFAULT_REQUEST } from './config/index.js'
export type { RequestOverrides } from './config/index.js'
export { createLogger, formatEntry, silentLogger } from './logging/logger.js'
export type { Logger, LogEntry, LogFields, LogLevel, LogSink } from './logging/logger.js'
