/**
 * Logging package entry point.
 *
 * Thin layer over loglevel: every logger is a loglevel child logger whose
 * lines carry a `[name]` prefix. The default level comes from
 * SUBSTORE_LOG_LEVEL and can be changed at runtime with setLogLevel.
 */

import log from 'loglevel'
import { LOG_LEVELS, type LogLevel, type Logger, type NamedLoggerOptions } from './types'

export { LOG_LEVELS } from './types'
export type { LogLevel, Logger, LoggerConfig, NamedLoggerOptions } from './types'

const registry = new Map<string, log.Logger>()

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

let defaultLevel: LogLevel = resolveEnvLevel()

function resolveEnvLevel(): LogLevel {
  const fromEnv = typeof process !== 'undefined' ? process.env.SUBSTORE_LOG_LEVEL : undefined
  const normalized = fromEnv?.trim().toLowerCase()
  return isLogLevel(normalized) ? normalized : 'info'
}

/**
 * Create (or reuse) a named logger.
 */
export function createNamedLogger({ name, level, prefix }: NamedLoggerOptions): Logger {
  const existing = registry.get(name)
  if (existing) {
    if (level) existing.setLevel(level, false)
    return existing
  }

  const instance = log.getLogger(name)
  const tag = `[${prefix ?? name}]`
  const originalFactory = instance.methodFactory

  instance.methodFactory = (methodName, logLevel, loggerName) => {
    const raw = originalFactory(methodName, logLevel, loggerName)
    return (...args: unknown[]) => raw(tag, ...args)
  }
  // setLevel rebuilds the methods so the prefixing factory takes effect
  instance.setLevel(level ?? defaultLevel, false)
  registry.set(name, instance)
  return instance
}

/**
 * Change the level of every logger created so far and of later ones.
 */
export function setLogLevel(level: LogLevel): void {
  defaultLevel = level
  for (const instance of registry.values()) {
    instance.setLevel(level, false)
  }
}

export function getLogLevel(): LogLevel {
  return defaultLevel
}

/** Shared logger for modules without a name of their own */
export const logger: Logger = createNamedLogger({ name: 'substore' })
