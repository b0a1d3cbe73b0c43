import type {
  CreateSubscriptionRequest,
  FlowInfo,
  Subscription,
  SubscriptionKind,
} from '@substore/types'
import type { DownloadService, SubscriptionService } from '@substore/api-client'
import type { LocalCache } from '@/lib/cache'
import { SyncableRepository } from './entityRepository'

export interface SubscriptionTestResult {
  subscriptionId: string
  /** Non-empty lines in the produced output */
  nodeCount: number
  testedAt: string
}

export class SubscriptionRepository extends SyncableRepository<
  Subscription,
  CreateSubscriptionRequest
> {
  constructor(
    private readonly service: SubscriptionService,
    private readonly downloads: DownloadService,
    cache: LocalCache<Subscription>
  ) {
    super(service, cache, 'Subscription')
  }

  /**
   * Delete by id; the kind picks the endpoint and defaults to the cached one.
   */
  async delete(id: string, kind?: SubscriptionKind): Promise<boolean> {
    const resolvedKind = kind ?? (await this.cache.get(id))?.kind ?? 'single'
    const deleted = await this.service.delete(id, resolvedKind)
    if (deleted) {
      await this.writeCache(() => this.cache.remove(id))
    }
    return deleted
  }

  /**
   * Current flow usage; also stored on the cached subscription.
   */
  async getFlowInfo(id: string): Promise<FlowInfo> {
    const flow = await this.service.getFlow(id)
    await this.writeCache(() => this.cache.patch(id, (cached) => ({ ...cached, flow })))
    return flow
  }

  /**
   * Download the subscription's output to check it resolves.
   */
  async testConnection(subscription: Subscription, target?: string): Promise<SubscriptionTestResult> {
    const output = await this.downloads.download(subscription.name, {
      kind: subscription.kind,
      target,
    })
    const nodeCount = output.split(/\r?\n/).filter((line) => line.trim() !== '').length
    return { subscriptionId: subscription.id, nodeCount, testedAt: new Date().toISOString() }
  }
}
