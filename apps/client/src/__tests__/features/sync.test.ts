import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ConflictType, SyncProvider } from '@substore/types'
import { createHarness, gistTarget } from '../helpers/harness'
import { createMockSubscription } from '../helpers/mockData'

describe('syncable controllers', () => {
  let harness: ReturnType<typeof createHarness>

  beforeEach(() => {
    harness = createHarness()
  })

  afterEach(() => {
    harness.client.dispose()
  })

  async function seed(...subs: ReturnType<typeof createMockSubscription>[]) {
    harness.backend.seed('/api/subs', subs)
    await harness.client.subscriptions.load()
  }

  describe('fetchFromSync', () => {
    it('should append new entities and keep newer local ones', async () => {
      await seed(
        createMockSubscription({ id: 'sub-1', name: 'Local', updatedAt: '2024-05-05T00:00:00.000Z' })
      )
      harness.backend.seedSync('subs', [
        createMockSubscription({ id: 'sub-1', name: 'Remote', updatedAt: '2024-05-03T00:00:00.000Z' }),
        createMockSubscription({ id: 'sub-9', name: 'Synced' }),
      ])
      const config = harness.client.preferences.getState().addSyncConfig('subs', gistTarget)

      const result = await harness.client.subscriptions.fetchFromSync(config)

      expect(result?.appended).toEqual(['sub-9'])
      const entities = harness.client.subscriptions.store.getState().entities
      expect(entities.map((sub) => [sub.id, sub.name])).toEqual([
        ['sub-1', 'Local'],
        ['sub-9', 'Synced'],
      ])
      const { conflicts } = harness.client.subscriptions.syncStore.getState()
      expect(conflicts).toHaveLength(1)
      expect(conflicts[0]).toMatchObject({ entityId: 'sub-1', conflictType: ConflictType.CONTENT_DIFFERENCE })
      expect(harness.messages()).toEqual([
        ['warning', 'Kept 1 local subscriptions newer than the synced copy'],
      ])
    })

    it('should cache the merged collection', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }))
      harness.backend.seedSync('subs', [createMockSubscription({ id: 'sub-9' })])
      const config = harness.client.preferences.getState().addSyncConfig('subs', gistTarget)
      await harness.client.subscriptions.fetchFromSync(config)

      harness.backend.offline = true
      await harness.client.subscriptions.load()

      expect(harness.client.subscriptions.store.getState().entities.map((sub) => sub.id)).toEqual([
        'sub-1',
        'sub-9',
      ])
    })
  })

  describe('syncToProvider', () => {
    it('should require an enabled config for the provider', async () => {
      harness.client.preferences.getState().addSyncConfig('subs', gistTarget)

      const result = await harness.client.subscriptions.syncToProvider(
        createMockSubscription({ name: 'Sub 1' }),
        SyncProvider.GITLAB_SNIPPET
      )

      expect(result).toBeNull()
      expect(harness.messages()).toEqual([
        [
          'danger',
          'Failed to sync Sub 1: No enabled gitlab_snippet sync configuration for subscriptions',
        ],
      ])
    })

    it('should record the result of a push', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }))
      harness.client.preferences.getState().addSyncConfig('subs', gistTarget)

      const result = await harness.client.subscriptions.syncToProvider(
        createMockSubscription({ id: 'sub-1' }),
        SyncProvider.GITHUB_GIST
      )

      const state = harness.client.subscriptions.syncStore.getState()
      expect(result?.success).toBe(true)
      expect(state.results['sub-1']).toEqual(result)
      expect(state.lastSyncTime).toBe(result?.syncTime)
      expect(state.isSyncing).toBe(false)
    })

    it('should fail on an unsuccessful result', async () => {
      await seed(createMockSubscription({ id: 'sub-1', name: 'Sub 1' }))
      harness.client.preferences.getState().addSyncConfig('subs', gistTarget)
      harness.backend.rejectSync('sub-1')

      const result = await harness.client.subscriptions.syncToProvider(
        createMockSubscription({ id: 'sub-1', name: 'Sub 1' }),
        SyncProvider.GITHUB_GIST
      )

      expect(result).toBeNull()
      expect(harness.messages()).toEqual([['danger', 'Failed to sync Sub 1: Provider refused sub-1']])
    })
  })

  describe('syncAll', () => {
    it('should fail without an enabled config', async () => {
      harness.client.preferences.getState().addSyncConfig('subs', { ...gistTarget, isEnabled: false })

      expect(await harness.client.subscriptions.syncAll()).toBe(false)
      expect(harness.messages()).toEqual([
        ['danger', 'Failed to sync subscriptions: No enabled sync configuration'],
      ])
    })

    it('should push every entity and mark the config synced', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))
      const config = harness.client.preferences.getState().addSyncConfig('subs', gistTarget)

      expect(await harness.client.subscriptions.syncAll()).toBe(true)

      expect(harness.backend.calls.filter((call) => call.endsWith('/sync'))).toEqual([
        'POST /api/subs/sub-1/sync',
        'POST /api/subs/sub-2/sync',
      ])
      const [stored] = harness.client.preferences.getState().syncConfigs.subs
      expect(stored.id).toBe(config.id)
      expect(stored.lastSync).not.toBeNull()
      expect(harness.messages()).toEqual([['success', 'Synced subscriptions']])
    })

    it('should leave lastSync alone when any push fails', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))
      harness.client.preferences.getState().addSyncConfig('subs', gistTarget)
      harness.backend.rejectSync('sub-2')

      expect(await harness.client.subscriptions.syncAll()).toBe(false)

      expect(harness.client.preferences.getState().syncConfigs.subs[0].lastSync).toBeNull()
      expect(harness.client.subscriptions.syncStore.getState().results['sub-2'].success).toBe(false)
      expect(harness.messages()).toEqual([['warning', 'Some subscriptions failed to sync']])
    })
  })

  describe('batch sync', () => {
    it('should fail the whole batch once without a config', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))

      const report = await harness.client.subscriptions.runBatch(
        { type: 'sync', provider: SyncProvider.GITHUB_GIST },
        ['sub-1', 'sub-2']
      )

      expect(report.failed.map((failure) => failure.id)).toEqual(['sub-1', 'sub-2'])
      expect(harness.backend.calls.filter((call) => call.endsWith('/sync'))).toEqual([])
      expect(harness.messages()).toEqual([
        [
          'danger',
          'Failed to sync subscriptions: No enabled github_gist sync configuration for subscriptions',
        ],
      ])
    })

    it('should push the chosen entities', async () => {
      await seed(createMockSubscription({ id: 'sub-1' }), createMockSubscription({ id: 'sub-2' }))
      harness.client.preferences.getState().addSyncConfig('subs', gistTarget)

      const report = await harness.client.subscriptions.runBatch(
        { type: 'sync', provider: SyncProvider.GITHUB_GIST },
        ['sub-2']
      )

      expect(report.succeeded).toEqual(['sub-2'])
      expect(harness.messages()).toEqual([['success', 'sync: 1 subscriptions']])
    })
  })
})
