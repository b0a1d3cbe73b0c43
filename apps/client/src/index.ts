/**
 * Client data layer entry point.
 *
 * `createSubStoreClient` wires every service, repository, store and
 * controller once; consumers share the returned instances.
 */

import {
  ApiClient,
  ArtifactService,
  DownloadService,
  FileService,
  SettingsService,
  ShareService,
  SubscriptionService,
  TokenStorage,
  artifactSchema,
  fileSchema,
  shareSchema,
  subscriptionSchema,
} from '@substore/api-client'
import { createNamedLogger, setLogLevel } from '@substore/logger'
import { LocalCache } from './lib/cache'
import { loadConfig, type SubStoreConfig } from './lib/config'
import { FileExporter, type EntityExporter } from './lib/exporter'
import { createFileStorage, createMemoryStorage, type KeyValueStorage } from './lib/storage'
import {
  ArtifactRepository,
  FileRepository,
  ShareRepository,
  SubscriptionRepository,
} from './repositories'
import { createCollectionStore } from './stores/collectionStore'
import { createNotificationStore, type NotificationStore } from './stores/notificationStore'
import { createPreferencesStore, type PreferencesStore } from './stores/preferencesStore'
import { ArtifactController, artifactAccessors } from './features/artifacts'
import { AutoSyncScheduler } from './features/autoSync'
import { FileController, fileAccessors } from './features/files'
import { ShareController, shareAccessors } from './features/shares'
import { SubscriptionController, subscriptionAccessors } from './features/subscriptions'

const log = createNamedLogger({ name: 'substore' })

export interface SubStoreClientOptions {
  /** Overrides on top of the environment configuration */
  config?: Partial<SubStoreConfig>
  /** Defaults to file storage under `config.dataDir`, else memory */
  storage?: KeyValueStorage
  apiClient?: ApiClient
  exporter?: EntityExporter
}

export interface SubStoreClient {
  config: SubStoreConfig
  api: ApiClient
  settings: SettingsService
  notifications: NotificationStore
  preferences: PreferencesStore
  subscriptions: SubscriptionController
  artifacts: ArtifactController
  files: FileController
  shares: ShareController
  autoSync: AutoSyncScheduler
  /** Hydrate preferences, load every family and start the schedulers */
  start(): Promise<void>
  /** Stop the schedulers and dispose every controller */
  dispose(): void
}

export function createSubStoreClient(options: SubStoreClientOptions = {}): SubStoreClient {
  const config: SubStoreConfig = { ...loadConfig(), ...options.config }
  setLogLevel(config.logLevel)

  const storage =
    options.storage ?? (config.dataDir ? createFileStorage(config.dataDir) : createMemoryStorage())
  const api =
    options.apiClient ??
    new ApiClient({
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      tokenStorage: new TokenStorage(storage),
    })
  const exporter = options.exporter ?? new FileExporter(config.exportDir)
  const notifications = createNotificationStore()
  const preferences = createPreferencesStore({ storage, defaultBaseURL: config.baseURL })

  const unsubscribeBaseURL = preferences.subscribe((state, previous) => {
    if (state.baseURL !== previous.baseURL) {
      api.setBaseURL(state.baseURL)
    }
  })

  const subscriptions = new SubscriptionController({
    store: createCollectionStore({ accessors: subscriptionAccessors, debounceMs: config.debounceMs }),
    repository: new SubscriptionRepository(
      new SubscriptionService(api),
      new DownloadService(api),
      new LocalCache(storage, 'subs', subscriptionSchema)
    ),
    notifications,
    exporter,
    preferences,
  })
  const artifacts = new ArtifactController({
    store: createCollectionStore({ accessors: artifactAccessors, debounceMs: config.debounceMs }),
    repository: new ArtifactRepository(
      new ArtifactService(api),
      new LocalCache(storage, 'artifacts', artifactSchema)
    ),
    notifications,
    exporter,
    preferences,
  })
  const files = new FileController({
    store: createCollectionStore({ accessors: fileAccessors, debounceMs: config.debounceMs }),
    repository: new FileRepository(new FileService(api), new LocalCache(storage, 'files', fileSchema)),
    notifications,
    exporter,
    preferences,
  })
  const shares = new ShareController({
    store: createCollectionStore({ accessors: shareAccessors, debounceMs: config.debounceMs }),
    repository: new ShareRepository(
      new ShareService(api),
      new LocalCache(storage, 'shares', shareSchema)
    ),
    notifications,
    exporter,
    baseURL: () => preferences.getState().baseURL,
  })

  const autoSync = new AutoSyncScheduler({
    targets: [subscriptions, artifacts, files],
    preferences,
    intervalSeconds: config.autoSyncIntervalSeconds,
  })

  const start = async () => {
    await preferences.persist.rehydrate()
    api.setBaseURL(preferences.getState().baseURL)
    log.info(`Connecting to ${api.getBaseURL()}`)

    await Promise.all([subscriptions.load(), artifacts.load(), files.load(), shares.load()])
    autoSync.start()
    subscriptions.startFlowRefresh(config.flowRefreshIntervalSeconds)
  }

  const dispose = () => {
    autoSync.stop()
    unsubscribeBaseURL()
    subscriptions.dispose()
    artifacts.dispose()
    files.dispose()
    shares.dispose()
    notifications.getState().clearAll()
  }

  return {
    config,
    api,
    settings: new SettingsService(api),
    notifications,
    preferences,
    subscriptions,
    artifacts,
    files,
    shares,
    autoSync,
    start,
    dispose,
  }
}

export { loadConfig } from './lib/config'
export type { SubStoreConfig } from './lib/config'
export { createFileStorage, createMemoryStorage } from './lib/storage'
export type { KeyValueStorage } from './lib/storage'
export { LocalCache } from './lib/cache'
export { FileExporter } from './lib/exporter'
export type { EntityExporter } from './lib/exporter'
export { applyFilters, collectTags, emptyFilters } from './lib/filters'
export type { EntityFilters, FilterAccessors } from './lib/filters'
export { mergeFetched, versionMarker } from './lib/merge'
export type { MergeResult } from './lib/merge'
export { computeFlowStats, describeFlow, formatBytes, usagePercentage } from './lib/flow'
export type { FlowStats } from './lib/flow'
export * from './lib/validation'
export * from './repositories'
export * from './stores/collectionStore'
export * from './stores/notificationStore'
export * from './stores/preferencesStore'
export * from './features'
