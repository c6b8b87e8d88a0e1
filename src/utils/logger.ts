import { appConfig, type LogLevel } from '@/config/appConfig'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

type LogFields = Record<string, unknown>

export interface Logger {
  debug: (message: string, fields?: LogFields) => void
  info: (message: string, fields?: LogFields) => void
  warn: (message: string, fields?: LogFields) => void
  error: (message: string, fields?: LogFields) => void
}

/** Console logger tagged with a scope, dropping anything below `level`. */
export function createLogger(scope: string, level: LogLevel = appConfig.logLevel): Logger {
  const threshold = LEVEL_RANK[level]
  const prefix = `[${scope}]`

  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[at] < threshold) return
    if (fields) {
      console[at](prefix, message, fields)
    } else {
      console[at](prefix, message)
    }
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  }
}
