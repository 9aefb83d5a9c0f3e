// src/logging/logger.ts
import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface ConsoleLoggerOptions {
  level?: LogLevel
  stream?: { write(chunk: string): unknown }
  now?: () => Date
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[]

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

/**
 * Logger writing `YYYY-MM-DD HH:MM:SS - LEVEL: message` lines.
 * Defaults to stderr so that stdout stays free for reports.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS.indexOf(options.level || 'info')
  const stream = options.stream || process.stderr
  const now = options.now || (() => new Date())

  const write = (level: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(level) < minLevel) return
    const label = LEVEL_COLORS[level](level.toUpperCase())
    stream.write(`${formatTimestamp(now())} - ${label}: ${message}\n`)
  }

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: message => write('error', message)
  }
}

const noop = () => {}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
}
