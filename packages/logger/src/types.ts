/** Levels in loglevel's order; `silent` turns a logger off */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Logger {
  trace: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export interface LoggerConfig {
  /** Defaults to the process-wide level, see setLogLevel */
  level?: LogLevel
  /** Tag printed instead of the name, e.g. `controller:subs` */
  prefix?: string
}

export interface NamedLoggerOptions extends LoggerConfig {
  /** loglevel logger name; one logger per name */
  name: string
}
