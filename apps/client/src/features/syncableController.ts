import { createStore, type StoreApi } from 'zustand/vanilla'
import type { SyncConfig, SyncConflict, SyncProvider, SyncResult } from '@substore/types'
import { SyncError } from '@substore/api-client'
import { mergeFetched, type MergeResult } from '@/lib/merge'
import type { SyncableRepository } from '@/repositories'
import type { PreferencesStore, SyncFamily } from '@/stores/preferencesStore'
import type { BatchOperation } from './batch'
import {
  CollectionController,
  type ControllerDeps,
  type ControllerNames,
  type ManagedEntity,
} from './collectionController'

export interface SyncState {
  isSyncing: boolean
  /** Latest push result per entity id */
  results: Record<string, SyncResult>
  /** Conflicts recorded by the latest fetch */
  conflicts: SyncConflict[]
  lastSyncTime: string | null
}

export interface SyncableControllerDeps<T extends ManagedEntity, K extends string, R>
  extends ControllerDeps<T, K, R> {
  preferences: PreferencesStore
}

/**
 * Controller for families mirrored to sync providers.
 */
export abstract class SyncableController<
  T extends ManagedEntity,
  Draft,
  K extends string,
  R extends SyncableRepository<T, Draft> = SyncableRepository<T, Draft>,
> extends CollectionController<T, Draft, K, R> {
  readonly syncStore: StoreApi<SyncState>
  readonly syncFamily: SyncFamily
  protected readonly preferences: PreferencesStore

  constructor(
    deps: SyncableControllerDeps<T, K, R>,
    names: ControllerNames & { syncFamily: SyncFamily }
  ) {
    super(deps, names)
    this.preferences = deps.preferences
    this.syncFamily = names.syncFamily
    this.syncStore = createStore<SyncState>()(() => ({
      isSyncing: false,
      results: {},
      conflicts: [],
      lastSyncTime: null,
    }))
  }

  /** Enabled sync configs for this family */
  enabledConfigs(): SyncConfig[] {
    return this.preferences.getState().syncConfigs[this.syncFamily].filter((config) => config.isEnabled)
  }

  protected requireConfig(provider: SyncProvider): SyncConfig {
    const config = this.enabledConfigs().find((candidate) => candidate.provider === provider)
    if (!config) {
      throw new SyncError(`No enabled ${provider} sync configuration for ${this.family}`)
    }
    return config
  }

  /**
   * Fetch this family from a sync target and merge it into the collection.
   * Newer local entities win and are reported as conflicts.
   */
  async fetchFromSync(config: SyncConfig): Promise<MergeResult<T> | null> {
    this.syncStore.setState({ isSyncing: true })
    try {
      const fetched = await this.repository.fetchFromSync(config)
      if (this.disposed) return null

      const merged = mergeFetched(this.store.getState().entities, fetched)
      for (const conflict of merged.conflicts) {
        this.log.warn(`Sync conflict on ${conflict.entityId}: ${conflict.description}`)
      }
      this.store.getState().setEntities(merged.entities)
      await this.repository.storeLocal(merged.entities)
      this.syncStore.setState({
        conflicts: merged.conflicts,
        lastSyncTime: new Date().toISOString(),
      })
      if (merged.conflicts.length > 0) {
        this.notifications
          .getState()
          .warning(`Kept ${merged.conflicts.length} local ${this.family} newer than the synced copy`)
      }
      return merged
    } catch (error) {
      this.fail(`Failed to fetch ${this.family} from ${config.provider}`, error)
      return null
    } finally {
      this.syncStore.setState({ isSyncing: false })
    }
  }

  /**
   * Push one entity to the enabled config of a provider.
   */
  async syncToProvider(entity: T, provider: SyncProvider): Promise<SyncResult | null> {
    try {
      return await this.syncEntity(entity, this.requireConfig(provider))
    } catch (error) {
      this.fail(`Failed to sync ${entity.name}`, error)
      return null
    }
  }

  /**
   * Push every entity to one config.
   * Resolves to true when every call succeeded; an empty collection counts.
   */
  async syncWithConfig(config: SyncConfig): Promise<boolean> {
    const entities = this.store.getState().entities
    const outcomes = await Promise.allSettled(
      entities.map((entity) => this.syncEntity(entity, config))
    )
    let allSucceeded = true
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        allSucceeded = false
        this.log.warn(`Failed to sync ${entities[index].name} to ${config.provider}`, outcome.reason)
      }
    })
    return allSucceeded
  }

  /**
   * Push every entity to every enabled config.
   */
  async syncAll(): Promise<boolean> {
    const configs = this.enabledConfigs()
    if (configs.length === 0) {
      this.fail(`Failed to sync ${this.family}`, new SyncError('No enabled sync configuration'))
      return false
    }

    this.syncStore.setState({ isSyncing: true })
    let allSucceeded = true
    try {
      for (const config of configs) {
        if (await this.syncWithConfig(config)) {
          this.preferences.getState().markSynced(this.syncFamily, config.id, new Date().toISOString())
        } else {
          allSucceeded = false
        }
      }
    } finally {
      this.syncStore.setState({ isSyncing: false })
    }

    if (this.disposed) return allSucceeded
    if (allSucceeded) {
      this.notifications.getState().success(`Synced ${this.family}`)
    } else {
      this.notifications.getState().warning(`Some ${this.family} failed to sync`)
    }
    return allSucceeded
  }

  /**
   * @throws SyncError when the provider reports an unsuccessful sync
   */
  protected async syncEntity(entity: T, config: SyncConfig): Promise<SyncResult> {
    const result = await this.repository.sync(entity, config)
    if (!this.disposed) {
      this.syncStore.setState((state) => ({
        results: { ...state.results, [entity.id]: result },
        lastSyncTime: result.syncTime,
      }))
    }
    if (!result.success) {
      throw new SyncError(result.message ?? `Sync of ${entity.name} was unsuccessful`)
    }
    return result
  }

  protected beforeBatch(operation: BatchOperation): void {
    if (operation.type === 'sync') {
      this.requireConfig(operation.provider)
    }
  }

  protected async performBatch(operation: BatchOperation, entity: T): Promise<void> {
    if (operation.type === 'sync') {
      await this.syncEntity(entity, this.requireConfig(operation.provider))
      return
    }
    await super.performBatch(operation, entity)
  }
}
