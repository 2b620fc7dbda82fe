export { createLogger, silentLogger } from './logger.js'
export type { Logger, LogStream, LoggerOptions } from './logger.js'
