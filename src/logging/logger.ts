/**
 * Leveled line logger.
 *
 * All output goes through stream.write for testability.
 * No colors, no timestamps -- one "LEVEL: message" line per call.
 */

import type { LogLevel } from '../types/index.js'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

/** Anything with a write(string) method: process.stderr, a file stream, a test buffer. */
export interface LogStream {
  write(chunk: string): unknown
}

export interface LoggerOptions {
  level?: LogLevel
  stream?: LogStream
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Create a logger that writes messages at or above `level` (default "warn")
 * to `stream` (default process.stderr).
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? 'warn']
  const stream = options.stream ?? process.stderr

  const write = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (SEVERITY[level] < threshold) return
    stream.write(level.toUpperCase() + ': ' + message + '\n')
  }

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  }
}

/** Logger that drops everything. Default for stores opened without one. */
export const silentLogger: Logger = createLogger({ level: 'silent' })
