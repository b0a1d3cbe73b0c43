import type { Timestamped } from '@substore/types'
import { NetworkError, ValidationError, getErrorMessage } from '@substore/api-client'
import { createNamedLogger, type Logger } from '@substore/logger'
import type { EntityExporter } from '@/lib/exporter'
import type { EntityRepository } from '@/repositories'
import type { CollectionState, CollectionStore } from '@/stores/collectionStore'
import type { NotificationStore } from '@/stores/notificationStore'
import {
  dispatchBatch,
  resolveIds,
  type BatchOperation,
  type BatchOperationType,
  type BatchReport,
} from './batch'

/** Fields every managed family shares */
export interface ManagedEntity extends Timestamped {
  name: string
}

export interface ControllerDeps<T extends ManagedEntity, K extends string, R> {
  store: CollectionStore<T, K>
  repository: R
  notifications: NotificationStore
  exporter: EntityExporter
}

export interface ControllerNames {
  /** Plural, used for export file names and messages, e.g. "artifacts" */
  family: string
  /** Singular, e.g. "artifact" */
  noun: string
}

const BATCH_VERBS: Record<BatchOperationType, string> = {
  enable: 'enable',
  disable: 'disable',
  delete: 'delete',
  test: 'test',
  sync: 'sync',
  export: 'export',
  updateFlow: 'update flow for',
  addTag: 'tag',
  removeTag: 'untag',
}

/**
 * Owns one family's store and mediates every change to it.
 *
 * All mutations go through the repository first and reach the store only
 * when they succeed and the controller has not been disposed.
 */
export abstract class CollectionController<
  T extends ManagedEntity,
  Draft,
  K extends string,
  R extends EntityRepository<T, Draft> = EntityRepository<T, Draft>,
> {
  readonly store: CollectionStore<T, K>
  readonly family: string
  readonly noun: string
  protected readonly repository: R
  protected readonly notifications: NotificationStore
  protected readonly exporter: EntityExporter
  protected readonly log: Logger
  private readonly abortController = new AbortController()

  /** Batch operations this family accepts */
  protected abstract readonly batchOperations: readonly BatchOperationType[]

  constructor(deps: ControllerDeps<T, K, R>, names: ControllerNames) {
    this.store = deps.store
    this.repository = deps.repository
    this.notifications = deps.notifications
    this.exporter = deps.exporter
    this.family = names.family
    this.noun = names.noun
    this.log = createNamedLogger({ name: `controller:${names.family}` })
  }

  /** Aborted once the controller is disposed */
  get signal(): AbortSignal {
    return this.abortController.signal
  }

  protected get disposed(): boolean {
    return this.abortController.signal.aborted
  }

  /** @throws ValidationError */
  protected abstract validate(value: Draft | T): void

  /**
   * Hook applied to an entity before it is saved.
   */
  protected prepare(entity: T): T {
    return entity
  }

  /**
   * Copy of `entity` with its enabled flag set; families without one refuse.
   */
  protected withEnabled(entity: T, _enabled: boolean): T {
    throw new ValidationError(`${this.family} cannot be enabled or disabled (${entity.id})`)
  }

  protected async deleteRemote(id: string, _entity: T | undefined): Promise<boolean> {
    return this.repository.delete(id)
  }

  /**
   * Apply a store change unless the controller was disposed meanwhile.
   */
  protected apply(change: (state: CollectionState<T, K>) => void): void {
    if (!this.disposed) {
      change(this.store.getState())
    }
  }

  protected find(id: string): T | undefined {
    return this.store.getState().entities.find((entity) => entity.id === id)
  }

  /**
   * Record a failed operation: store error, log line and one notification.
   */
  protected fail(context: string, error: unknown): void {
    const message = `${context}: ${getErrorMessage(error)}`
    this.log.error(message)
    if (this.disposed) return
    this.store.setState({ error: message })
    this.notifications.getState().error(message)
  }

  async load(): Promise<void> {
    if (this.disposed) return
    this.store.setState({ isLoading: true, error: null })
    try {
      const result = await this.repository.getAllWithStatus()
      if (this.disposed) return
      this.store.getState().setEntities(result.data)
      this.store.setState({
        isLoading: false,
        isStale: result.isStale,
        error: result.error ? result.error.message : null,
        lastLoadedAt: new Date().toISOString(),
      })
      if (result.isStale) {
        this.notifications
          .getState()
          .warning(`Showing cached ${this.family}: ${result.error?.message ?? 'backend unavailable'}`)
      }
    } catch (error) {
      if (this.disposed) return
      this.store.setState({ isLoading: false })
      this.fail(`Failed to load ${this.family}`, error)
    }
  }

  async refresh(): Promise<void> {
    await this.load()
  }

  /**
   * Validate, create and append. Resolves to null on failure.
   */
  async create(draft: Draft): Promise<T | null> {
    try {
      this.validate(draft)
      const created = await this.repository.create(draft)
      this.apply((state) => state.upsertEntity(created))
      return created
    } catch (error) {
      this.fail(`Failed to create ${this.noun}`, error)
      return null
    }
  }

  /**
   * Validate, update and replace by id. Resolves to null on failure.
   */
  async update(entity: T): Promise<T | null> {
    try {
      const prepared = this.prepare(entity)
      this.validate(prepared)
      const updated = await this.repository.update(prepared)
      this.apply((state) => state.replaceEntity(updated))
      return updated
    } catch (error) {
      this.fail(`Failed to update ${entity.name}`, error)
      return null
    }
  }

  async remove(id: string): Promise<boolean> {
    const entity = this.find(id)
    try {
      await this.deleteOrThrow(id, entity)
      this.apply((state) => state.removeEntity(id))
      return true
    } catch (error) {
      this.fail(`Failed to delete ${entity?.name ?? id}`, error)
      return false
    }
  }

  async setEnabled(id: string, enabled: boolean): Promise<T | null> {
    const entity = this.find(id)
    if (!entity) {
      this.fail(`Failed to update ${this.noun}`, new ValidationError(`Unknown ${this.noun} ${id}`))
      return null
    }
    try {
      return await this.update(this.withEnabled(entity, enabled))
    } catch (error) {
      this.fail(`Failed to update ${entity.name}`, error)
      return null
    }
  }

  /**
   * Apply one operation to many entities; defaults to the current selection.
   *
   * @throws ValidationError when the family does not support the operation
   */
  async runBatch(operation: BatchOperation, ids?: Iterable<string>): Promise<BatchReport> {
    if (!this.batchOperations.includes(operation.type)) {
      throw new ValidationError(`${this.family} do not support the ${operation.type} operation`)
    }

    const state = this.store.getState()
    const targetIds = [...(ids ?? state.selectedIds)]
    try {
      if (operation.type === 'export') {
        return await this.batchExport(targetIds)
      }

      try {
        this.beforeBatch(operation)
      } catch (error) {
        const { found, skipped } = resolveIds(targetIds, state.entities)
        this.fail(`Failed to ${BATCH_VERBS[operation.type]} ${this.family}`, error)
        return {
          operation: operation.type,
          succeeded: [],
          failed: found.map((entity) => ({ id: entity.id, error })),
          skipped,
          exportPath: null,
        }
      }

      const report = await dispatchBatch({
        operation: operation.type,
        ids: targetIds,
        entities: state.entities,
        perform: (entity) => this.performBatch(operation, entity),
        onFailure: (entity, error) =>
          this.fail(`Failed to ${BATCH_VERBS[operation.type]} ${entity.name}`, error),
      })
      if (report.failed.length === 0 && report.succeeded.length > 0 && !this.disposed) {
        this.notifications
          .getState()
          .success(`${BATCH_VERBS[operation.type]}: ${report.succeeded.length} ${this.family}`)
      }
      return report
    } finally {
      this.apply((current) => current.clearSelection())
    }
  }

  /**
   * Checks that apply to the whole batch; throwing fails every entity at once.
   */
  protected beforeBatch(_operation: BatchOperation): void {}

  /**
   * Single-entity step of a batch. Families extend this for their own operations.
   */
  protected async performBatch(operation: BatchOperation, entity: T): Promise<void> {
    switch (operation.type) {
      case 'enable':
      case 'disable': {
        const updated = await this.repository.update(
          this.withEnabled(entity, operation.type === 'enable')
        )
        this.apply((state) => state.replaceEntity(updated))
        return
      }
      case 'delete':
        await this.deleteOrThrow(entity.id, entity)
        this.apply((state) => state.removeEntity(entity.id))
        return
      default:
        throw new ValidationError(`${this.family} do not support the ${operation.type} operation`)
    }
  }

  private async deleteOrThrow(id: string, entity: T | undefined): Promise<void> {
    const deleted = await this.deleteRemote(id, entity)
    if (!deleted) {
      throw new NetworkError(`The server refused to delete ${entity?.name ?? id}`, {
        reason: 'rejected',
      })
    }
  }

  private async batchExport(ids: string[]): Promise<BatchReport> {
    const { found, skipped } = resolveIds(ids, this.store.getState().entities)
    const exportPath = await this.writeExport(found)
    return {
      operation: 'export',
      succeeded: exportPath ? found.map((entity) => entity.id) : [],
      failed: [],
      skipped,
      exportPath,
    }
  }

  private async writeExport(entities: T[]): Promise<string | null> {
    try {
      const path = await this.exporter.write(this.family, entities)
      this.log.info(`Exported ${entities.length} ${this.family} to ${path}`)
      return path
    } catch (error) {
      this.fail(`Failed to export ${this.family}`, error)
      return null
    }
  }

  /**
   * Write the chosen entities (all by default) to one JSON document.
   * Resolves to the file path, or null when writing failed.
   */
  async exportEntities(ids?: Iterable<string>): Promise<string | null> {
    const entities = this.store.getState().entities
    const chosen = ids ? resolveIds(ids, entities).found : [...entities]
    return this.writeExport(chosen)
  }

  /**
   * Abort in-flight work and stop the pending recompute.
   */
  dispose(): void {
    if (this.disposed) return
    this.abortController.abort()
    this.store.getState().teardown()
  }
}
