import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { z } from 'zod'
import type { CreateSubscriptionRequest } from '@substore/types'
import { subscriptionSchema } from '@substore/api-client'
import { createHarness } from '../helpers/harness'
import { createMockSubscription } from '../helpers/mockData'

const draft: CreateSubscriptionRequest = {
  name: 'New Sub',
  displayName: null,
  kind: 'single',
  source: 'remote',
  url: 'https://example.com/new',
  content: null,
  icon: null,
  tags: [],
  mergeSources: '',
  userAgent: null,
  proxy: null,
  remark: null,
  priority: 0,
  isEnabled: true,
  ignoreFailed: false,
  members: [],
}

describe('SubscriptionController', () => {
  let harness: ReturnType<typeof createHarness>

  beforeEach(() => {
    harness = createHarness()
  })

  afterEach(() => {
    harness.client.dispose()
  })

  function seed(...subs: ReturnType<typeof createMockSubscription>[]) {
    harness.backend.seed('/api/subs', subs)
    return harness.client.subscriptions.load()
  }

  async function cachedSubs() {
    const raw = await harness.storage.getItem('substore.cache.subs')
    return z.array(subscriptionSchema).parse(JSON.parse(raw ?? '[]'))
  }

  function entityIds(): string[] {
    return harness.client.subscriptions.store.getState().entities.map((sub) => sub.id)
  }

  describe('load', () => {
    it('should load and search subscriptions', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1', name: 'HK VMess' }),
        createMockSubscription({ id: 'sub-2', name: 'JP Trojan' }),
        createMockSubscription({ id: 'sub-3', name: 'vmess-backup' })
      )
      const store = harness.client.subscriptions.store

      store.getState().setSearchText('vmess')
      store.getState().recompute()

      expect(store.getState().filteredEntities.map((sub) => sub.id)).toEqual(['sub-1', 'sub-3'])
      expect(store.getState().isLoading).toBe(false)
      expect(store.getState().lastLoadedAt).not.toBeNull()
    })

    it('should show cached data with a warning when offline', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }))
      harness.backend.offline = true

      await harness.client.subscriptions.load()

      const state = harness.client.subscriptions.store.getState()
      expect(entityIds()).toEqual(['sub-1'])
      expect(state.isStale).toBe(true)
      expect(state.error).toBe('Network error: connect ECONNREFUSED')
      expect(harness.messages()).toEqual([
        ['warning', 'Showing cached subscriptions: Network error: connect ECONNREFUSED'],
      ])
    })
  })

  describe('create', () => {
    it('should create and append', async () => {
      const created = await harness.client.subscriptions.create(draft)

      expect(created?.id).toBe('sub-new-1')
      expect(harness.client.subscriptions.store.getState().entities).toEqual([created])
      expect(harness.backend.calls).toEqual(['POST /api/subs'])
    })

    it('should not reach the network with an invalid draft', async () => {
      const created = await harness.client.subscriptions.create({ ...draft, url: null })

      expect(created).toBeNull()
      expect(harness.backend.calls).toEqual([])
      expect(harness.client.subscriptions.store.getState().error).toBe(
        'Failed to create subscription: Invalid subscription (url: URL is required)'
      )
      expect(harness.messages()).toEqual([
        ['danger', 'Failed to create subscription: Invalid subscription (url: URL is required)'],
      ])
    })

    it('should leave the store alone when the work finishes after dispose', async () => {
      const pending = harness.client.subscriptions.create(draft)
      harness.client.subscriptions.dispose()

      expect(await pending).not.toBeNull()
      expect(harness.client.subscriptions.store.getState().entities).toEqual([])
      expect(harness.messages()).toEqual([])
    })
  })

  describe('update and remove', () => {
    it('should toggle enabled through an update', async () => {
      await seed(createMockSubscription({ id: 'sub-1', isEnabled: true }))

      const updated = await harness.client.subscriptions.toggleEnabled('sub-1')

      expect(updated?.isEnabled).toBe(false)
      expect(harness.client.subscriptions.store.getState().entities[0].isEnabled).toBe(false)
    })

    it('should report a refused delete', async () => {
      await seed(createMockSubscription({ id: 'sub-1', name: 'Sub 1' }))
      harness.backend.seed('/api/subs', [])

      expect(await harness.client.subscriptions.remove('sub-1')).toBe(false)
      expect(entityIds()).toEqual(['sub-1'])
      expect(harness.messages()).toEqual([
        ['danger', 'Failed to delete Sub 1: The server refused to delete Sub 1'],
      ])
    })

    it('should reassign priorities in list order and save only changes', async () => {
      await seed(
        createMockSubscription({ id: 'a', priority: 0 }),
        createMockSubscription({ id: 'b', priority: 1 }),
        createMockSubscription({ id: 'c', priority: 2 }),
        createMockSubscription({ id: 'd', priority: 3 })
      )

      expect(await harness.client.subscriptions.move(0, 1)).toBe(true)

      const entities = harness.client.subscriptions.store.getState().entities
      expect(entities.map((sub) => [sub.id, sub.priority])).toEqual([
        ['b', 0],
        ['a', 1],
        ['c', 2],
        ['d', 3],
      ])
      expect(harness.backend.calls.filter((call) => call.startsWith('PUT'))).toEqual([
        'PUT /api/subs/b',
        'PUT /api/subs/a',
      ])
    })

    it('should ignore moves out of range', async () => {
      await seed(createMockSubscription({ id: 'a' }))

      expect(await harness.client.subscriptions.move(0, 3)).toBe(false)
    })
  })

  describe('runBatch', () => {
    it('should keep going after a failed delete and clear the selection', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1', name: 'Sub 1' }),
        createMockSubscription({ id: 'sub-2', name: 'Sub 2' }),
        createMockSubscription({ id: 'sub-3', name: 'Sub 3' })
      )
      const store = harness.client.subscriptions.store
      store.getState().toggleSelection('sub-1')
      store.getState().toggleSelection('sub-2')
      store.getState().toggleSelection('sub-3')
      harness.backend.failOn('DELETE /api/subs/sub-2')

      const report = await harness.client.subscriptions.runBatch({ type: 'delete' })

      expect(report.succeeded).toEqual(['sub-1', 'sub-3'])
      expect(report.failed.map((failure) => failure.id)).toEqual(['sub-2'])
      expect(entityIds()).toEqual(['sub-2'])
      expect(store.getState().selectedIds.size).toBe(0)
      expect(harness.messages()).toEqual([
        ['danger', 'Failed to delete Sub 2: Server error (500): boom'],
      ])
    })

    it('should attribute outcomes to their ids when calls settle out of order', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1', name: 'Sub 1' }),
        createMockSubscription({ id: 'sub-2', name: 'Sub 2' }),
        createMockSubscription({ id: 'sub-3', name: 'Sub 3' })
      )
      const store = harness.client.subscriptions.store
      const enabledFlags = () => store.getState().entities.map((sub) => [sub.id, sub.isEnabled])
      const release = harness.backend.hold('PUT /api/subs/sub-1')
      harness.backend.failOn('PUT /api/subs/sub-2')

      const pending = harness.client.subscriptions.runBatch({ type: 'disable' }, [
        'sub-1',
        'sub-2',
        'sub-3',
      ])
      await vi.waitFor(() => expect(store.getState().entities[2].isEnabled).toBe(false))
      expect(enabledFlags()).toEqual([
        ['sub-1', true],
        ['sub-2', true],
        ['sub-3', false],
      ])

      release()
      const report = await pending

      expect(report.succeeded).toEqual(['sub-1', 'sub-3'])
      expect(report.failed.map((failure) => failure.id)).toEqual(['sub-2'])
      expect(enabledFlags()).toEqual([
        ['sub-1', false],
        ['sub-2', true],
        ['sub-3', false],
      ])
      expect(harness.messages()).toEqual([
        ['danger', 'Failed to disable Sub 2: Server error (500): boom'],
      ])
    })

    it('should keep every batch change in the cache', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1', isEnabled: false }),
        createMockSubscription({ id: 'sub-2', isEnabled: false }),
        createMockSubscription({ id: 'sub-3', isEnabled: false })
      )

      await harness.client.subscriptions.runBatch({ type: 'enable' }, ['sub-1', 'sub-2', 'sub-3'])
      expect((await cachedSubs()).map((sub) => [sub.id, sub.isEnabled])).toEqual([
        ['sub-1', true],
        ['sub-2', true],
        ['sub-3', true],
      ])

      await harness.client.subscriptions.runBatch({ type: 'delete' }, ['sub-1', 'sub-3'])
      expect((await cachedSubs()).map((sub) => sub.id)).toEqual(['sub-2'])
    })

    it('should skip unknown ids', async () => {
      await seed(createMockSubscription({ id: 'sub-1', isEnabled: true }))

      const report = await harness.client.subscriptions.runBatch({ type: 'disable' }, [
        'sub-1',
        'missing',
      ])

      expect(report.succeeded).toEqual(['sub-1'])
      expect(report.skipped).toEqual(['missing'])
      expect(harness.messages()).toEqual([['success', 'disable: 1 subscriptions']])
    })

    it('should add a tag only where it is missing', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1', tags: ['hk'] }),
        createMockSubscription({ id: 'sub-2', tags: [] })
      )

      const report = await harness.client.subscriptions.runBatch({ type: 'addTag', tag: 'hk' }, [
        'sub-1',
        'sub-2',
      ])

      expect(report.succeeded).toEqual(['sub-1', 'sub-2'])
      expect(harness.backend.calls.filter((call) => call.startsWith('PUT'))).toEqual([
        'PUT /api/subs/sub-2',
      ])
      expect(harness.client.subscriptions.store.getState().entities.map((sub) => sub.tags)).toEqual([
        ['hk'],
        ['hk'],
      ])
      expect(harness.client.subscriptions.store.getState().availableTags).toEqual(['hk'])
    })

    it('should remove a tag', async () => {
      await seed(createMockSubscription({ id: 'sub-1', tags: ['hk', 'old'] }))

      await harness.client.subscriptions.runBatch({ type: 'removeTag', tag: 'old' }, ['sub-1'])

      expect(harness.client.subscriptions.store.getState().entities[0].tags).toEqual(['hk'])
    })

    it('should export the chosen subscriptions to one document', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))

      const report = await harness.client.subscriptions.runBatch({ type: 'export' }, ['sub-2'])

      expect(report.exportPath).toBe('/exports/subscriptions_export_1.json')
      expect(report.succeeded).toEqual(['sub-2'])
      expect(harness.exporter.written.get('/exports/subscriptions_export_1.json')).toEqual([
        createMockSubscription({ id: 'sub-2' }),
      ])
    })

    it('should raise a single notification when the export fails', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))
      harness.exporter.failWrites = true

      const report = await harness.client.subscriptions.runBatch({ type: 'export' }, ['sub-1', 'sub-2'])

      expect(report.succeeded).toEqual([])
      expect(report.exportPath).toBeNull()
      expect(harness.messages()).toEqual([['danger', 'Failed to export subscriptions: disk full']])
    })

    it('should refresh flow of the chosen subscriptions', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }))

      const report = await harness.client.subscriptions.runBatch({ type: 'updateFlow' }, ['sub-1'])

      expect(report.succeeded).toEqual(['sub-1'])
      expect(harness.client.subscriptions.store.getState().entities[0].flow?.used).toBe(1024)
    })
  })

  describe('flow', () => {
    it('should refresh enabled subscriptions only', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1' }),
        createMockSubscription({ id: 'sub-2', isEnabled: false })
      )

      expect(await harness.client.subscriptions.refreshFlow()).toBe(1)
      expect(harness.backend.calls).toContain('GET /api/subs/sub-1/flow')
      expect(harness.backend.calls).not.toContain('GET /api/subs/sub-2/flow')

      const stats = harness.client.subscriptions.computeFlowStats()
      expect(stats).toMatchObject({ total: 2, enabled: 1, withFlow: 1, totalUsed: 1024, totalLimit: 2048 })
    })

    it('should store every refreshed flow in the cache', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1' }),
        createMockSubscription({ id: 'sub-2' }),
        createMockSubscription({ id: 'sub-3' })
      )

      expect(await harness.client.subscriptions.refreshFlow()).toBe(3)

      expect((await cachedSubs()).map((sub) => [sub.id, sub.flow?.total])).toEqual([
        ['sub-1', 2048],
        ['sub-2', 2048],
        ['sub-3', 2048],
      ])
    })

    it('should count failed refreshes out', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))
      harness.backend.failOn('GET /api/subs/sub-2/flow')

      expect(await harness.client.subscriptions.refreshFlow()).toBe(1)
      expect(harness.messages()).toEqual([])
    })
  })

  describe('test', () => {
    it('should download the output and keep the result', async () => {
      const sub = createMockSubscription({ id: 'sub-1', name: 'Sub 1' })
      harness.backend.downloads.set('Sub 1', 'vmess://a\nvmess://b\nvmess://c')

      const result = await harness.client.subscriptions.test(sub)

      expect(result?.nodeCount).toBe(3)
      expect(harness.client.subscriptions.testStore.getState()).toMatchObject({
        results: { 'sub-1': { nodeCount: 3 } },
        testing: [],
      })
    })

    it('should notify when the download fails', async () => {
      const result = await harness.client.subscriptions.test(
        createMockSubscription({ name: 'Missing' })
      )

      expect(result).toBeNull()
      expect(harness.messages()).toEqual([
        ['danger', 'Failed to test Missing: Server error (404): Not found'],
      ])
    })
  })

  describe('import and export', () => {
    it('should create every subscription in an import document', async () => {
      harness.exporter.written.set('/imports/subs.json', [
        { name: 'Imported A', url: 'https://a.example.com/sub' },
        { name: 'Imported B', source: 'local', content: 'vmess://x' },
      ])

      const report = await harness.client.subscriptions.importFromFile('/imports/subs.json')

      expect(report?.created.map((sub) => sub.name)).toEqual(['Imported A', 'Imported B'])
      expect(report?.failed).toBe(0)
      expect(entityIds()).toEqual(['sub-new-1', 'sub-new-2'])
      expect(harness.messages()).toEqual([['success', 'Imported 2 subscriptions']])
    })

    it('should refuse documents that do not list subscriptions', async () => {
      harness.exporter.written.set('/imports/bad.json', [{ url: 'https://a.example.com/sub' }])

      expect(await harness.client.subscriptions.importFromFile('/imports/bad.json')).toBeNull()
      expect(harness.messages()).toEqual([
        ['danger', 'Failed to import subscriptions: /imports/bad.json does not list subscriptions'],
      ])
    })

    it('should export every subscription', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))

      const path = await harness.client.subscriptions.exportAll()

      expect(path).toBe('/exports/subscriptions_export_1.json')
      expect(harness.exporter.written.get('/exports/subscriptions_export_1.json')).toHaveLength(2)
    })
  })
})
