/**
 * Domain model type definitions.
 *
 * These types mirror the documents the Sub-Store backend stores
 * and are shared by the API client and the client data layer.
 * Timestamps are ISO-8601 strings.
 */

/** Anything the backend addresses by identifier */
export interface Identifiable {
  id: string
}

/** Entities carrying the server's modification timestamps */
export interface Timestamped extends Identifiable {
  createdAt: string
  updatedAt: string
}

/** Where a subscription's node list comes from */
export type SubscriptionSource = 'remote' | 'local'

/** Single subscription or a collection built from several */
export type SubscriptionKind = 'single' | 'collection'

/** How remote and local content are combined */
export type MergeSources = '' | 'localFirst' | 'remoteFirst'

/** Bandwidth usage snapshot, in bytes */
export interface FlowInfo {
  total: number | null
  used: number | null
  remaining: number | null
  percentage: number | null
  resetDate: string | null
  isUnlimited: boolean
}

/** Proxy subscription (single) or collection */
export interface Subscription extends Timestamped {
  name: string
  displayName: string | null
  kind: SubscriptionKind
  source: SubscriptionSource
  url: string | null
  content: string | null
  icon: string | null
  tags: string[]
  mergeSources: MergeSources
  userAgent: string | null
  proxy: string | null
  remark: string | null
  priority: number
  isEnabled: boolean
  ignoreFailed: boolean
  /** Names of member subscriptions; only collections have members */
  members: string[]
  flow: FlowInfo | null
}

/** Rule/config payload kinds */
export enum ArtifactType {
  REWRITE = 'rewrite',
  REDIRECT = 'redirect',
  HEADER_REWRITE = 'header_rewrite',
  SCRIPT = 'script',
  MITM = 'mitm',
  CRON = 'cron',
  DNS = 'dns',
  GENERAL = 'general',
}

/** Named rule/config payload that can be tested and synced externally */
export interface Artifact extends Timestamped {
  name: string
  type: ArtifactType
  content: string
  platform: string | null
  source: string | null
  syncUrl: string | null
  tags: string[]
  isEnabled: boolean
  lastSync: string | null
}

export enum FileType {
  GENERAL = 'general',
  MIHOMO_PROFILE = 'mihomo-profile',
  JSON = 'json',
  YAML = 'yaml',
  JAVASCRIPT = 'javascript',
  TEXT = 'text',
}

/** File document managed by the backend */
export interface SubStoreFile extends Timestamped {
  name: string
  type: FileType
  content: string
  /** UTF-8 byte length of content */
  size: number
  language: string | null
  tags: string[]
  isReadOnly: boolean
}

export enum ShareType {
  SUBSCRIPTION = 'subscription',
  COLLECTION = 'collection',
  ARTIFACT = 'artifact',
  FILE = 'file',
}

/** Tokenized, optionally time-limited public link */
export interface Share extends Timestamped {
  name: string
  token: string
  type: ShareType
  targetId: string
  targetName: string
  expirationDate: string | null
  isEnabled: boolean
  accessCount: number
}

/** External stores entities can be mirrored to */
export enum SyncProvider {
  GITHUB_GIST = 'github_gist',
  GITLAB_SNIPPET = 'gitlab_snippet',
}

/** Credentials and target for mirroring one entity family */
export interface SyncConfig extends Identifiable {
  provider: SyncProvider
  token: string
  repositoryUrl: string | null
  isEnabled: boolean
  lastSync: string | null
  /** Seconds between automatic syncs */
  syncInterval: number
}

export enum ConflictType {
  CONTENT_DIFFERENCE = 'content_difference',
  DELETION_CONFLICT = 'deletion_conflict',
  CREATION_CONFLICT = 'creation_conflict',
}

export interface SyncConflict extends Identifiable {
  entityId: string
  conflictType: ConflictType
  localVersion: string
  remoteVersion: string
  description: string
}

export interface SyncResult {
  success: boolean
  syncedIds: string[]
  conflicts: SyncConflict[]
  message: string | null
  syncTime: string
}

export type ComplexityLevel = 'low' | 'medium' | 'high' | 'extreme'

export interface TestPerformance {
  /** Milliseconds */
  executionTime: number
  memoryUsage: number
  ruleCount: number
  complexity: ComplexityLevel
}

export interface ArtifactTestResult {
  success: boolean
  message: string
  errors: string[]
  warnings: string[]
  performance: TestPerformance | null
  testTime: string
}

export type IssueSeverity = 'error' | 'warning' | 'info'

export interface ContentIssue {
  line: number | null
  column: number | null
  message: string
  severity: IssueSeverity
  suggestion: string | null
}

export interface ValidationResult {
  isValid: boolean
  errors: ContentIssue[]
  warnings: ContentIssue[]
  suggestions: string[]
}

export type ThemeMode = 'light' | 'dark' | 'system'

export type SyncPlatform = 'none' | 'gist' | 'gitlab'

/** Server-side settings document */
export interface AppSettings {
  theme: {
    mode: ThemeMode
    accentColor: string
    useSystemAccentColor: boolean
  }
  sync: {
    platform: SyncPlatform
    gistToken: string
    githubUser: string
    autoSync: boolean
    /** Minutes */
    syncInterval: number
  }
  network: {
    baseURL: string
    timeout: number
    retryCount: number
    userAgent: string
  }
  appearance: {
    showFlowInfo: boolean
    showSubscriptionIcons: boolean
    compactMode: boolean
    animationsEnabled: boolean
  }
}
