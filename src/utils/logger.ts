/**
 * Leveled console logger.
 *
 * The level is read from `LOG_LEVEL` on every call so tests and scripts can
 * change it without reloading modules. Priority: ERROR > WARN > INFO > DEBUG.
 */

export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

export type LogFields = Record<string, unknown>

const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3
} as const

const COLORS = {
  [LogLevel.ERROR]: '\x1b[31m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.INFO]: '\x1b[36m',
  [LogLevel.DEBUG]: '\x1b[32m'
} as const

const RESET = '\x1b[0m'

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value)
}

export function getCurrentLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase()
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel
  }
  return LogLevel.INFO
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()]
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  if (!shouldLog(level)) return

  const header = `${COLORS[level]}[${new Date().toISOString()}] [${level}]${RESET}`
  const args: unknown[] = [header, message]
  if (fields && Object.keys(fields).length > 0) {
    args.push(fields)
  }

  if (level === LogLevel.ERROR) {
    console.error(...args)
  } else if (level === LogLevel.WARN) {
    console.warn(...args)
  } else {
    console.log(...args)
  }
}

export const logger = {
  error: (message: string, fields?: LogFields) => write(LogLevel.ERROR, message, fields),
  warn: (message: string, fields?: LogFields) => write(LogLevel.WARN, message, fields),
  info: (message: string, fields?: LogFields) => write(LogLevel.INFO, message, fields),
  debug: (message: string, fields?: LogFields) => write(LogLevel.DEBUG, message, fields)
}

export type Logger = typeof logger
