import type { SyncConfig, SyncPushRequest, SyncResult } from '@substore/types'
import { z } from 'zod'
import { ApiClient } from '../client'
import { readSuccess, syncResultSchema, unwrapEnvelope, type ResponseSchema } from '../schemas'

/** Resource groups the sync endpoint understands */
export type SyncGroup = 'subs' | 'artifacts' | 'files'

/**
 * CRUD over one backend resource group, e.g. `/api/artifacts`.
 *
 * Family services extend this with their own endpoints.
 */
export abstract class ResourceService<T extends { id: string }, Draft> {
  constructor(
    protected client: ApiClient,
    protected readonly basePath: string,
    protected readonly schema: ResponseSchema<T>,
    protected readonly what: string
  ) {}

  /**
   * List every entity in the group.
   */
  async list(): Promise<T[]> {
    const payload = await this.client.get<unknown>(this.basePath)
    return unwrapEnvelope(z.array(this.schema), payload, `${this.what} list`)
  }

  /**
   * Get one entity.
   */
  async get(id: string): Promise<T> {
    const payload = await this.client.get<unknown>(`${this.basePath}/${encodeURIComponent(id)}`)
    return unwrapEnvelope(this.schema, payload, this.what)
  }

  /**
   * Create an entity; the server assigns id and timestamps.
   */
  async create(draft: Draft): Promise<T> {
    const payload = await this.client.post<unknown>(this.basePath, draft)
    return unwrapEnvelope(this.schema, payload, this.what)
  }

  /**
   * Replace an entity.
   */
  async update(entity: T): Promise<T> {
    const payload = await this.client.put<unknown>(
      `${this.basePath}/${encodeURIComponent(entity.id)}`,
      entity
    )
    return unwrapEnvelope(this.schema, payload, this.what)
  }

  /**
   * Delete an entity. Resolves to the backend's success flag.
   */
  async delete(id: string): Promise<boolean> {
    const payload = await this.client.delete<unknown>(`${this.basePath}/${encodeURIComponent(id)}`)
    return readSuccess(payload, `${this.what} delete`)
  }
}

/**
 * Resource group whose entities can be mirrored to a sync provider.
 */
export abstract class SyncableResourceService<
  T extends { id: string },
  Draft,
> extends ResourceService<T, Draft> {
  protected abstract readonly syncGroup: SyncGroup

  /**
   * Push one entity to the provider named in the config.
   */
  async sync(entity: T, config: SyncConfig): Promise<SyncResult> {
    const body: SyncPushRequest = { provider: config.provider, config }
    const payload = await this.client.post<unknown>(
      `${this.basePath}/${encodeURIComponent(entity.id)}/sync`,
      body
    )
    return unwrapEnvelope(syncResultSchema, payload, `${this.what} sync`)
  }

  /**
   * Fetch this group's entities from a sync target through the backend.
   */
  async fetchFromSync(config: SyncConfig): Promise<T[]> {
    const payload = await this.client.post<unknown>(`/api/sync/${this.syncGroup}`, config)
    return unwrapEnvelope(z.array(this.schema), payload, `${this.what} sync fetch`)
  }
}
