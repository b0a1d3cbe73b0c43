import { createStore, type StoreApi } from 'zustand/vanilla'
import type { CreateSubscriptionRequest, Subscription, SubscriptionKind } from '@substore/types'
import { DataParsingError, subscriptionDraftSchema } from '@substore/api-client'
import { z } from 'zod'
import { joinedTags, type FilterAccessors } from '@/lib/filters'
import { computeFlowStats, type FlowStats } from '@/lib/flow'
import { PeriodicTask } from '@/lib/periodic'
import { validateSubscription } from '@/lib/validation'
import type { SubscriptionRepository, SubscriptionTestResult } from '@/repositories'
import type { BatchOperation, BatchOperationType } from './batch'
import { SyncableController, type SyncableControllerDeps } from './syncableController'

export const subscriptionAccessors: FilterAccessors<Subscription, SubscriptionKind> = {
  typeOf: (sub) => sub.kind,
  tagsOf: (sub) => sub.tags,
  isEnabled: (sub) => sub.isEnabled,
  hasFlowInfo: (sub) => sub.flow !== null,
  searchFields: (sub) => [sub.name, sub.url, sub.content, joinedTags(sub.tags)],
}

export interface SubscriptionTestState {
  results: Record<string, SubscriptionTestResult>
  testing: string[]
}

export interface ImportReport {
  created: Subscription[]
  failed: number
}

export type SubscriptionControllerDeps = SyncableControllerDeps<
  Subscription,
  SubscriptionKind,
  SubscriptionRepository
>

export class SubscriptionController extends SyncableController<
  Subscription,
  CreateSubscriptionRequest,
  SubscriptionKind,
  SubscriptionRepository
> {
  protected readonly batchOperations: readonly BatchOperationType[] = [
    'enable',
    'disable',
    'delete',
    'test',
    'sync',
    'export',
    'updateFlow',
    'addTag',
    'removeTag',
  ]

  readonly testStore: StoreApi<SubscriptionTestState> = createStore<SubscriptionTestState>()(
    () => ({ results: {}, testing: [] })
  )

  private flowRefresh: PeriodicTask | null = null

  constructor(deps: SubscriptionControllerDeps) {
    super(deps, { family: 'subscriptions', noun: 'subscription', syncFamily: 'subs' })
  }

  protected validate(value: CreateSubscriptionRequest | Subscription): void {
    validateSubscription(value)
  }

  protected withEnabled(sub: Subscription, enabled: boolean): Subscription {
    return { ...sub, isEnabled: enabled }
  }

  protected async deleteRemote(id: string, sub: Subscription | undefined): Promise<boolean> {
    return this.repository.delete(id, sub?.kind)
  }

  async toggleEnabled(id: string): Promise<Subscription | null> {
    const sub = this.find(id)
    return this.setEnabled(id, !(sub?.isEnabled ?? false))
  }

  /**
   * Move the entity at `from` to `to` and renumber priorities in list order.
   * Only entities whose priority changed are saved.
   */
  async move(from: number, to: number): Promise<boolean> {
    const entities = [...this.store.getState().entities]
    if (from < 0 || from >= entities.length || to < 0 || to >= entities.length) {
      return false
    }
    const [moved] = entities.splice(from, 1)
    entities.splice(to, 0, moved)

    const reordered = entities.map((sub, index) => ({ ...sub, priority: index }))
    const changed = reordered.filter((sub, index) => sub.priority !== entities[index].priority)
    this.apply((state) => state.setEntities(reordered))

    const outcomes = await Promise.allSettled(changed.map((sub) => this.repository.update(sub)))
    let failed = 0
    outcomes.forEach((outcome) => {
      if (outcome.status === 'fulfilled') {
        const saved = outcome.value
        this.apply((state) => state.replaceEntity(saved))
      } else {
        failed += 1
        this.log.warn('Failed to save subscription order', outcome.reason)
      }
    })
    if (failed > 0) {
      this.fail('Failed to save order', new Error(`${failed} of ${changed.length} subscriptions not saved`))
      return false
    }
    return true
  }

  /**
   * Download a subscription's output to check it resolves.
   */
  async test(sub: Subscription, target?: string): Promise<SubscriptionTestResult | null> {
    this.testStore.setState((state) => ({ testing: [...state.testing, sub.id] }))
    try {
      return await this.runTest(sub, target)
    } catch (error) {
      this.fail(`Failed to test ${sub.name}`, error)
      return null
    } finally {
      this.testStore.setState((state) => ({ testing: state.testing.filter((id) => id !== sub.id) }))
    }
  }

  private async runTest(sub: Subscription, target?: string): Promise<SubscriptionTestResult> {
    const result = await this.repository.testConnection(sub, target)
    if (!this.disposed) {
      this.testStore.setState((state) => ({ results: { ...state.results, [sub.id]: result } }))
    }
    return result
  }

  /**
   * Refresh flow usage of enabled subscriptions (optionally only `ids`).
   * Failures are logged; resolves to the number refreshed.
   */
  async refreshFlow(ids?: Iterable<string>): Promise<number> {
    const wanted = ids ? new Set(ids) : null
    const targets = this.store
      .getState()
      .entities.filter((sub) => sub.isEnabled && (!wanted || wanted.has(sub.id)))

    const outcomes = await Promise.allSettled(targets.map((sub) => this.updateFlow(sub)))
    let refreshed = 0
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        refreshed += 1
      } else {
        this.log.warn(`Failed to update flow info for ${targets[index].name}`, outcome.reason)
      }
    })
    return refreshed
  }

  private async updateFlow(sub: Subscription): Promise<void> {
    const flow = await this.repository.getFlowInfo(sub.id)
    this.apply((state) => {
      const current = state.entities.find((item) => item.id === sub.id)
      if (current) {
        state.replaceEntity({ ...current, flow })
      }
    })
  }

  startFlowRefresh(intervalSeconds: number): void {
    this.flowRefresh ??= new PeriodicTask('flow refresh', intervalSeconds * 1000, () =>
      this.refreshFlow()
    )
    this.flowRefresh.start()
  }

  stopFlowRefresh(): void {
    this.flowRefresh?.stop()
  }

  /**
   * Create every subscription listed in a JSON document, in order.
   */
  async importFromFile(filePath: string): Promise<ImportReport | null> {
    let drafts: CreateSubscriptionRequest[]
    try {
      const document = await this.exporter.read(filePath)
      const parsed = z.array(subscriptionDraftSchema).safeParse(document)
      if (!parsed.success) {
        throw new DataParsingError(`${filePath} does not list subscriptions`, {
          paths: parsed.error.issues.map((issue) => issue.path.join('.')),
        })
      }
      drafts = parsed.data
    } catch (error) {
      this.fail('Failed to import subscriptions', error)
      return null
    }

    const report: ImportReport = { created: [], failed: 0 }
    for (const draft of drafts) {
      if (this.disposed) break
      const created = await this.create(draft)
      if (created) {
        report.created.push(created)
      } else {
        report.failed += 1
      }
    }
    this.log.info(`Imported ${report.created.length} subscriptions, ${report.failed} failed`)
    if (report.created.length > 0 && !this.disposed) {
      this.notifications.getState().success(`Imported ${report.created.length} subscriptions`)
    }
    return report
  }

  async exportAll(): Promise<string | null> {
    return this.exportEntities()
  }

  computeFlowStats(): FlowStats {
    return computeFlowStats(this.store.getState().entities)
  }

  protected async performBatch(operation: BatchOperation, sub: Subscription): Promise<void> {
    switch (operation.type) {
      case 'test':
        await this.runTest(sub)
        return
      case 'updateFlow':
        await this.updateFlow(sub)
        return
      case 'addTag': {
        if (sub.tags.includes(operation.tag)) return
        const updated = await this.repository.update({ ...sub, tags: [...sub.tags, operation.tag] })
        this.apply((state) => state.replaceEntity(updated))
        return
      }
      case 'removeTag': {
        if (!sub.tags.includes(operation.tag)) return
        const updated = await this.repository.update({
          ...sub,
          tags: sub.tags.filter((tag) => tag !== operation.tag),
        })
        this.apply((state) => state.replaceEntity(updated))
        return
      }
      default:
        await super.performBatch(operation, sub)
    }
  }

  dispose(): void {
    this.stopFlowRefresh()
    super.dispose()
  }
}
