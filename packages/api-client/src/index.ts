/**
 * API client package entry point.
 */

export { ApiClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './client'
export type { ApiClientConfig } from './client'
export { TokenStorage, tokenStorage, createMemoryStorage } from './tokenStorage'
export type { KeyValueStorage } from './tokenStorage'
export {
  SubStoreError,
  NetworkError,
  DataParsingError,
  ValidationError,
  StorageError,
  SyncError,
  NotFoundError,
  isSubStoreError,
  toNetworkError,
  getErrorMessage,
} from './errors'
export type { ErrorKind, NetworkFailureReason, ValidationIssue } from './errors'
export { generateShareToken, contentDigest } from './crypto'
export {
  unwrapEnvelope,
  readSuccess,
  flowInfoSchema,
  subscriptionSchema,
  subscriptionDraftSchema,
  artifactSchema,
  fileSchema,
  shareSchema,
  syncResultSchema,
  artifactTestResultSchema,
  validationResultSchema,
  appSettingsSchema,
} from './schemas'
export type { ResponseSchema } from './schemas'
export { ResourceService, SyncableResourceService } from './services/resource'
export type { SyncGroup } from './services/resource'
export { SubscriptionService, DownloadService } from './services/subscriptions'
export { ArtifactService } from './services/artifacts'
export { FileService } from './services/files'
export { ShareService } from './services/shares'
export { SettingsService } from './services/settings'
