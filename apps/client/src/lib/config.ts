import path from 'node:path'
import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from '@substore/logger'
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, ValidationError } from '@substore/api-client'

/** Trailing-edge window for filter recomputation */
export const DEBOUNCE_MS = 300
/** Seconds between auto-sync rounds */
export const AUTO_SYNC_INTERVAL_SECONDS = 1800
/** Seconds between flow refreshes of enabled subscriptions */
export const FLOW_REFRESH_INTERVAL_SECONDS = 300
/** Seconds a sync config waits between syncs unless it says otherwise */
export const DEFAULT_SYNC_INTERVAL_SECONDS = 3600

export interface SubStoreConfig {
  baseURL: string
  timeoutMs: number
  logLevel: LogLevel
  /** Directory for file-backed storage; null keeps everything in memory */
  dataDir: string | null
  exportDir: string
  debounceMs: number
  autoSyncIntervalSeconds: number
  flowRefreshIntervalSeconds: number
}

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must use http or https')

const envSchema = z.object({
  SUBSTORE_BASE_URL: httpUrl.default(DEFAULT_BASE_URL),
  SUBSTORE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  SUBSTORE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SUBSTORE_DATA_DIR: z.string().min(1).optional(),
  SUBSTORE_EXPORT_DIR: z.string().min(1).optional(),
})

/**
 * Read configuration from environment variables.
 *
 * Empty variables count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): SubStoreConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('SUBSTORE_') && value !== '')
  )
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    throw new ValidationError('Invalid configuration', issues)
  }

  const values = parsed.data
  return {
    baseURL: values.SUBSTORE_BASE_URL.replace(/\/+$/, ''),
    timeoutMs: values.SUBSTORE_TIMEOUT_MS,
    logLevel: values.SUBSTORE_LOG_LEVEL,
    dataDir: values.SUBSTORE_DATA_DIR ? path.resolve(cwd, values.SUBSTORE_DATA_DIR) : null,
    exportDir: path.resolve(cwd, values.SUBSTORE_EXPORT_DIR ?? 'exports'),
    debounceMs: DEBOUNCE_MS,
    autoSyncIntervalSeconds: AUTO_SYNC_INTERVAL_SECONDS,
    flowRefreshIntervalSeconds: FLOW_REFRESH_INTERVAL_SECONDS,
  }
}
