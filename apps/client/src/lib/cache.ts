import { z } from 'zod'
import type { Identifiable } from '@substore/types'
import { StorageError, type ResponseSchema } from '@substore/api-client'
import { createNamedLogger } from '@substore/logger'
import type { KeyValueStorage } from './storage'

export type CacheNamespace = 'subs' | 'artifacts' | 'files' | 'shares'

const log = createNamedLogger({ name: 'cache' })

// Namespaces already claimed per storage
const claimed = new WeakMap<KeyValueStorage, Set<CacheNamespace>>()

/**
 * Device-local copy of one entity family.
 *
 * The cache is a fallback, never the source of truth: repositories
 * overwrite it after every successful network read.
 */
export class LocalCache<T extends Identifiable> {
  private readonly key: string
  /** Tail of the operation chain; every access runs after the previous one settles */
  private queue: Promise<void> = Promise.resolve()

  constructor(
    private readonly storage: KeyValueStorage,
    readonly namespace: CacheNamespace,
    private readonly schema: ResponseSchema<T>
  ) {
    const namespaces = claimed.get(storage) ?? new Set<CacheNamespace>()
    if (namespaces.has(namespace)) {
      throw new StorageError(`Cache namespace "${namespace}" is already in use`)
    }
    namespaces.add(namespace)
    claimed.set(storage, namespaces)
    this.key = `substore.cache.${namespace}`
  }

  /**
   * Every cached entity, in stored order. Unreadable documents read as empty.
   */
  async readAll(): Promise<T[]> {
    return this.enqueue(() => this.read())
  }

  async writeAll(entities: T[]): Promise<void> {
    return this.enqueue(() => this.write(entities))
  }

  async get(id: string): Promise<T | null> {
    const entities = await this.readAll()
    return entities.find((entity) => entity.id === id) ?? null
  }

  /**
   * Insert or replace by id, keeping the position of an existing entry.
   */
  async put(entity: T): Promise<void> {
    return this.enqueue(async () => {
      const entities = await this.read()
      const index = entities.findIndex((item) => item.id === entity.id)
      if (index === -1) {
        entities.push(entity)
      } else {
        entities[index] = entity
      }
      await this.write(entities)
    })
  }

  /**
   * Replace a cached entity with `change(entity)` in one step; unknown ids are left alone.
   */
  async patch(id: string, change: (entity: T) => T): Promise<void> {
    return this.enqueue(async () => {
      const entities = await this.read()
      const index = entities.findIndex((item) => item.id === id)
      if (index !== -1) {
        entities[index] = change(entities[index])
        await this.write(entities)
      }
    })
  }

  async remove(id: string): Promise<void> {
    return this.enqueue(async () => {
      const entities = await this.read()
      const remaining = entities.filter((entity) => entity.id !== id)
      if (remaining.length !== entities.length) {
        await this.write(remaining)
      }
    })
  }

  async clear(): Promise<void> {
    await this.writeAll([])
  }

  /**
   * Run `task` once every earlier operation has settled. The task's own
   * outcome goes to the caller; the chain moves on either way.
   */
  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.queue.then(task)
    this.queue = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async read(): Promise<T[]> {
    let raw: string | null
    try {
      raw = await this.storage.getItem(this.key)
    } catch (error) {
      log.warn(`Cannot read ${this.namespace} cache`, error)
      return []
    }
    if (raw === null) {
      return []
    }

    let document: unknown
    try {
      document = JSON.parse(raw)
    } catch (error) {
      log.warn(`Discarding corrupt ${this.namespace} cache`, error)
      return []
    }
    const parsed = z.array(this.schema).safeParse(document)
    if (!parsed.success) {
      log.warn(`Discarding invalid ${this.namespace} cache`, parsed.error.issues.length)
      return []
    }
    return parsed.data
  }

  private async write(entities: T[]): Promise<void> {
    try {
      await this.storage.setItem(this.key, JSON.stringify(entities))
    } catch (error) {
      if (error instanceof StorageError) {
        throw error
      }
      throw new StorageError(`Failed to write ${this.namespace} cache`, { cause: error })
    }
  }
}
