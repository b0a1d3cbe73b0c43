/**
 * API request/response type definitions.
 */

import type {
  Artifact,
  Share,
  SubStoreFile,
  Subscription,
  SubscriptionKind,
  SyncConfig,
} from './models'

/** Envelope every backend response is wrapped in */
export interface ApiEnvelope<T> {
  success: boolean
  data?: T | null
  message?: string
  code?: number | string
}

/** API error body */
export interface ApiErrorBody {
  message?: string
  code?: string | number
  error?: {
    code?: string
    message?: string
  }
}

/** Server-maintained fields never sent on create */
type ServerFields = 'id' | 'createdAt' | 'updatedAt'

/** Create subscription request */
export type CreateSubscriptionRequest = Omit<Subscription, ServerFields | 'flow'>

/** Create artifact request */
export type CreateArtifactRequest = Omit<Artifact, ServerFields | 'lastSync'>

/** Create file request; size is derived from content */
export type CreateFileRequest = Omit<SubStoreFile, ServerFields | 'size'>

/** Create share request; token and counters are server-assigned */
export type CreateShareRequest = Omit<Share, ServerFields | 'token' | 'accessCount'>

/** Push one entity to a sync provider */
export interface SyncPushRequest {
  provider: SyncConfig['provider']
  config: SyncConfig
}

/** Download request for a subscription's produced output */
export interface DownloadRequest {
  kind?: SubscriptionKind
  /** Target client format, e.g. Surge, Clash */
  target?: string
}

/** Update a file's content only */
export interface UpdateFileContentRequest {
  content: string
}

/** Validate artifact content request */
export interface ValidateContentRequest {
  content: string
  type: Artifact['type']
}
