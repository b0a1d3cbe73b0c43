/**
 * Typed error taxonomy shared by the API client and the data layer.
 */

import axios from 'axios'
import { z } from 'zod'
import type { ApiErrorBody } from '@substore/types'

export type ErrorKind =
  | 'network'
  | 'data-parsing'
  | 'validation'
  | 'storage'
  | 'sync'
  | 'not-found'

export abstract class SubStoreError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export type NetworkFailureReason = 'timeout' | 'offline' | 'http' | 'rejected' | 'unknown'

/** Connectivity, timeout, non-2xx response, or a request the server refused */
export class NetworkError extends SubStoreError {
  readonly kind = 'network'
  readonly reason: NetworkFailureReason
  readonly status: number | null

  constructor(
    message: string,
    options: { reason?: NetworkFailureReason; status?: number | null; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.reason = options.reason ?? 'unknown'
    this.status = options.status ?? null
  }
}

/** Malformed response or a response without its payload */
export class DataParsingError extends SubStoreError {
  readonly kind = 'data-parsing'
  readonly paths: string[]

  constructor(message: string, options: { paths?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.paths = options.paths ?? []
  }
}

export interface ValidationIssue {
  path: string
  message: string
}

/** Client-side validation failure; never reaches the network */
export class ValidationError extends SubStoreError {
  readonly kind = 'validation'
  readonly issues: ValidationIssue[]

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message)
    this.issues = issues
  }
}

/** Local cache or export write failure */
export class StorageError extends SubStoreError {
  readonly kind = 'storage'
}

/** Remote-sync failure or missing sync configuration */
export class SyncError extends SubStoreError {
  readonly kind = 'sync'
}

/** Entity absent from both cache and backend */
export class NotFoundError extends SubStoreError {
  readonly kind = 'not-found'
  readonly entityId: string

  constructor(entityId: string, what = 'Entity') {
    super(`${what} ${entityId} not found`)
    this.entityId = entityId
  }
}

export function isSubStoreError(error: unknown): error is SubStoreError {
  return error instanceof SubStoreError
}

const errorBodySchema: z.ZodType<ApiErrorBody> = z.object({
  message: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  error: z.object({ code: z.string().optional(), message: z.string().optional() }).optional(),
})

function messageFromBody(data: unknown): string | null {
  if (typeof data === 'string') {
    return data.trim() || null
  }
  const parsed = errorBodySchema.safeParse(data)
  if (parsed.success) {
    return parsed.data.error?.message ?? parsed.data.message ?? null
  }
  return null
}

/**
 * Map any failure raised while talking to the backend to a NetworkError.
 * Errors that are already typed pass through unchanged.
 */
export function toNetworkError(error: unknown): SubStoreError {
  if (isSubStoreError(error)) {
    return error
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError('Request timed out', { reason: 'timeout', cause: error })
    }
    if (error.response) {
      const status = error.response.status
      const detail = messageFromBody(error.response.data) ?? error.message
      return new NetworkError(`Server error (${status}): ${detail}`, {
        reason: 'http',
        status,
        cause: error,
      })
    }
    return new NetworkError(`Network error: ${error.message}`, { reason: 'offline', cause: error })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new NetworkError(`Unknown error: ${message}`, { reason: 'unknown', cause: error })
}

/**
 * Human-readable message for a notification.
 */
export function getErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof ValidationError && error.issues.length > 0) {
    const details = error.issues.map((issue) =>
      issue.path ? `${issue.path}: ${issue.message}` : issue.message
    )
    return `${error.message} (${details.join('; ')})`
  }
  if (error instanceof Error) {
    return error.message || fallback
  }
  return fallback
}
