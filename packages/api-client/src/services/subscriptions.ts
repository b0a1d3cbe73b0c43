import type {
  CreateSubscriptionRequest,
  DownloadRequest,
  FlowInfo,
  Subscription,
  SubscriptionKind,
} from '@substore/types'
import { z } from 'zod'
import { ApiClient } from '../client'
import { NetworkError } from '../errors'
import { flowInfoSchema, readSuccess, subscriptionSchema, unwrapEnvelope } from '../schemas'
import { SyncableResourceService } from './resource'

const SUBS_PATH = '/api/subs'
const COLLECTIONS_PATH = '/api/collections'

function pathFor(kind: SubscriptionKind): string {
  return kind === 'collection' ? COLLECTIONS_PATH : SUBS_PATH
}

/**
 * Subscriptions and collections API service.
 *
 * Both live behind separate endpoints but form one entity family here;
 * requests are routed by `kind`.
 */
export class SubscriptionService extends SyncableResourceService<
  Subscription,
  CreateSubscriptionRequest
> {
  protected readonly syncGroup = 'subs'

  constructor(client: ApiClient) {
    super(client, SUBS_PATH, subscriptionSchema, 'subscription')
  }

  /**
   * List single subscriptions followed by collections.
   */
  async list(): Promise<Subscription[]> {
    const [subs, collections] = await Promise.all([
      this.listKind('single'),
      this.listKind('collection'),
    ])
    return [...subs, ...collections]
  }

  /**
   * List one kind only.
   */
  async listKind(kind: SubscriptionKind): Promise<Subscription[]> {
    const payload = await this.client.get<unknown>(pathFor(kind))
    const items = unwrapEnvelope(z.array(subscriptionSchema), payload, `${kind} subscription list`)
    return items.map((item) => ({ ...item, kind }))
  }

  /**
   * Get a subscription. Without a kind, collections are tried after a 404.
   */
  async get(id: string, kind?: SubscriptionKind): Promise<Subscription> {
    if (kind) {
      return this.getKind(id, kind)
    }
    try {
      return await this.getKind(id, 'single')
    } catch (error) {
      if (error instanceof NetworkError && error.status === 404) {
        return this.getKind(id, 'collection')
      }
      throw error
    }
  }

  private async getKind(id: string, kind: SubscriptionKind): Promise<Subscription> {
    const payload = await this.client.get<unknown>(`${pathFor(kind)}/${encodeURIComponent(id)}`)
    return { ...unwrapEnvelope(subscriptionSchema, payload, this.what), kind }
  }

  async create(draft: CreateSubscriptionRequest): Promise<Subscription> {
    const payload = await this.client.post<unknown>(pathFor(draft.kind), draft)
    return { ...unwrapEnvelope(subscriptionSchema, payload, this.what), kind: draft.kind }
  }

  async update(subscription: Subscription): Promise<Subscription> {
    const payload = await this.client.put<unknown>(
      `${pathFor(subscription.kind)}/${encodeURIComponent(subscription.id)}`,
      subscription
    )
    return {
      ...unwrapEnvelope(subscriptionSchema, payload, this.what),
      kind: subscription.kind,
    }
  }

  async delete(id: string, kind: SubscriptionKind = 'single'): Promise<boolean> {
    const payload = await this.client.delete<unknown>(`${pathFor(kind)}/${encodeURIComponent(id)}`)
    return readSuccess(payload, `${this.what} delete`)
  }

  /**
   * Get the current flow usage of a single subscription.
   */
  async getFlow(id: string): Promise<FlowInfo> {
    const payload = await this.client.get<unknown>(`${SUBS_PATH}/${encodeURIComponent(id)}/flow`)
    return unwrapEnvelope(flowInfoSchema, payload, 'flow')
  }
}

/**
 * Download API service.
 *
 * Produces a subscription's output for a target client; used to test
 * that a subscription resolves.
 */
export class DownloadService {
  constructor(private client: ApiClient) {}

  /**
   * Download the produced text of a subscription or collection.
   */
  async download(name: string, options: DownloadRequest = {}): Promise<string> {
    const segments = ['/api/download']
    if (options.kind === 'collection') {
      segments.push('collection')
    }
    segments.push(encodeURIComponent(name))
    const query = options.target ? `?target=${encodeURIComponent(options.target)}` : ''
    return this.client.get<string>(`${segments.join('/')}${query}`, { responseType: 'text' })
  }
}
