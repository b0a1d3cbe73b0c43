import type { Identifiable, SyncConfig, SyncResult } from '@substore/types'
import { NetworkError, NotFoundError } from '@substore/api-client'
import { createNamedLogger, type Logger } from '@substore/logger'
import type { LocalCache } from '@/lib/cache'

/** The backend calls a repository needs; the api-client services fit it */
export interface EntityBackend<T, Draft> {
  list(): Promise<T[]>
  get(id: string): Promise<T>
  create(draft: Draft): Promise<T>
  update(entity: T): Promise<T>
  delete(id: string): Promise<boolean>
}

export interface SyncableBackend<T, Draft> extends EntityBackend<T, Draft> {
  sync(entity: T, config: SyncConfig): Promise<SyncResult>
  fetchFromSync(config: SyncConfig): Promise<T[]>
}

/** A list read, and whether it came from the cache after a network failure */
export interface ReadResult<T> {
  data: T[]
  isStale: boolean
  error?: NetworkError
}

/**
 * Network-first repository over one entity family.
 *
 * Reads fall back to the local cache when the backend is unreachable;
 * writes always go to the backend and cache its canonical result.
 */
export class EntityRepository<T extends Identifiable, Draft> {
  protected readonly log: Logger

  constructor(
    protected readonly backend: EntityBackend<T, Draft>,
    protected readonly cache: LocalCache<T>,
    /** Entity label used in messages, e.g. "Artifact" */
    readonly label: string
  ) {
    this.log = createNamedLogger({ name: `repository:${cache.namespace}` })
  }

  /**
   * All entities; the cached copy when the network is unavailable.
   */
  async getAll(): Promise<T[]> {
    const result = await this.getAllWithStatus()
    return result.data
  }

  /**
   * All entities, flagging results served from the cache.
   */
  async getAllWithStatus(): Promise<ReadResult<T>> {
    try {
      const entities = await this.backend.list()
      await this.writeCache(() => this.cache.writeAll(entities))
      return { data: entities, isStale: false }
    } catch (error) {
      if (!(error instanceof NetworkError)) {
        throw error
      }
      this.log.warn(`Failed to fetch ${this.cache.namespace}, serving cache: ${error.message}`)
      const cached = await this.cache.readAll()
      return { data: cached, isStale: true, error }
    }
  }

  /**
   * Cached entity, else the backend's copy.
   *
   * @throws NotFoundError when the backend does not know the id either
   */
  async getById(id: string): Promise<T> {
    const cached = await this.cache.get(id)
    if (cached) {
      return cached
    }

    let entity: T
    try {
      entity = await this.backend.get(id)
    } catch (error) {
      if (error instanceof NetworkError && (error.status === 404 || error.reason === 'rejected')) {
        throw new NotFoundError(id, this.label)
      }
      throw error
    }
    await this.writeCache(() => this.cache.put(entity))
    return entity
  }

  async create(draft: Draft): Promise<T> {
    const created = await this.backend.create(draft)
    await this.writeCache(() => this.cache.put(created))
    this.log.info(`Created ${this.label.toLowerCase()} ${created.id}`)
    return created
  }

  async update(entity: T): Promise<T> {
    const updated = await this.backend.update(entity)
    await this.writeCache(() => this.cache.put(updated))
    return updated
  }

  /**
   * Resolves to the backend's success flag.
   */
  async delete(id: string): Promise<boolean> {
    const deleted = await this.backend.delete(id)
    if (deleted) {
      await this.writeCache(() => this.cache.remove(id))
    }
    return deleted
  }

  /**
   * Replace the cached collection, e.g. after merging synced entities.
   */
  async storeLocal(entities: T[]): Promise<void> {
    await this.writeCache(() => this.cache.writeAll(entities))
  }

  /**
   * Cache writes after a successful backend call never fail the call.
   */
  protected async writeCache(write: () => Promise<void>): Promise<void> {
    try {
      await write()
    } catch (error) {
      this.log.warn(`Failed to update ${this.cache.namespace} cache`, error)
    }
  }
}

/**
 * Repository for families that can be mirrored to a sync provider.
 */
export class SyncableRepository<T extends Identifiable, Draft> extends EntityRepository<T, Draft> {
  constructor(
    protected readonly backend: SyncableBackend<T, Draft>,
    cache: LocalCache<T>,
    label: string
  ) {
    super(backend, cache, label)
  }

  async sync(entity: T, config: SyncConfig): Promise<SyncResult> {
    return this.backend.sync(entity, config)
  }

  /**
   * Entities held by the sync target. The caller merges them.
   */
  async fetchFromSync(config: SyncConfig): Promise<T[]> {
    const fetched = await this.backend.fetchFromSync(config)
    this.log.info(`Fetched ${fetched.length} ${this.cache.namespace} from ${config.provider}`)
    return fetched
  }
}
