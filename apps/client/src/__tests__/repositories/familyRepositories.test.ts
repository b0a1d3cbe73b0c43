import { describe, it, expect, beforeEach } from 'vitest'
import {
  ArtifactService,
  DownloadService,
  FileService,
  ShareService,
  SubscriptionService,
  artifactSchema,
  createMemoryStorage,
  fileSchema,
  shareSchema,
  subscriptionSchema,
} from '@substore/api-client'
import { ArtifactType } from '@substore/types'
import { LocalCache } from '@/lib/cache'
import {
  ArtifactRepository,
  FileRepository,
  ShareRepository,
  SubscriptionRepository,
} from '@/repositories'
import { FakeBackend } from '../helpers/fakeBackend'
import {
  createMockArtifact,
  createMockFile,
  createMockShare,
  createMockSubscription,
} from '../helpers/mockData'

describe('SubscriptionRepository', () => {
  let backend: FakeBackend
  let cache: LocalCache<ReturnType<typeof createMockSubscription>>
  let repository: SubscriptionRepository

  beforeEach(() => {
    backend = new FakeBackend()
    const api = backend.client()
    cache = new LocalCache(createMemoryStorage(), 'subs', subscriptionSchema)
    repository = new SubscriptionRepository(new SubscriptionService(api), new DownloadService(api), cache)
  })

  it('should delete through the endpoint of the cached kind', async () => {
    const collection = createMockSubscription({ id: 'col-1', kind: 'collection', url: null })
    backend.seed('/api/collections', [collection])
    await cache.writeAll([collection])

    expect(await repository.delete('col-1')).toBe(true)
    expect(backend.calls).toEqual(['DELETE /api/collections/col-1'])
  })

  it('should store refreshed flow on the cached subscription', async () => {
    const sub = createMockSubscription()
    backend.seed('/api/subs', [sub])
    await cache.writeAll([sub])

    const flow = await repository.getFlowInfo('sub-1')

    expect(flow).toEqual({
      total: 2048,
      used: 1024,
      remaining: null,
      percentage: null,
      resetDate: null,
      isUnlimited: false,
    })
    expect((await cache.get('sub-1'))?.flow).toEqual(flow)
  })

  it('should count the nodes of the downloaded output', async () => {
    backend.downloads.set('HK Nodes', 'vmess://a\n\n  \ntrojan://b\n')
    const sub = createMockSubscription({ name: 'HK Nodes' })

    const result = await repository.testConnection(sub, 'ClashMeta')

    expect(result).toMatchObject({ subscriptionId: 'sub-1', nodeCount: 2 })
    expect(backend.calls).toEqual(['GET /api/download/HK%20Nodes?target=ClashMeta'])
  })
})

describe('ArtifactRepository', () => {
  it('should test and validate through the backend', async () => {
    const backend = new FakeBackend()
    const artifact = createMockArtifact()
    backend.seed('/api/artifacts', [artifact])
    const repository = new ArtifactRepository(
      new ArtifactService(backend.client()),
      new LocalCache(createMemoryStorage(), 'artifacts', artifactSchema)
    )

    expect(await repository.testArtifact(artifact)).toMatchObject({ success: true, message: 'Passed' })
    expect(await repository.validateContent('host = 1.1.1.1', ArtifactType.DNS)).toEqual({
      isValid: true,
      errors: [],
      warnings: [],
      suggestions: [],
    })
  })
})

describe('FileRepository', () => {
  it('should read content and cache updated files', async () => {
    const backend = new FakeBackend()
    backend.seed('/api/files', [createMockFile()])
    const cache = new LocalCache(createMemoryStorage(), 'files', fileSchema)
    const repository = new FileRepository(new FileService(backend.client()), cache)

    expect(await repository.getContent('file-1')).toBe('port: 7890\n')

    const updated = await repository.updateContent('file-1', 'port: 7891\nmode: rule\n')
    expect(updated.size).toBe(22)
    expect(await cache.get('file-1')).toEqual(updated)
  })
})

describe('ShareRepository', () => {
  it('should resolve and validate tokens', async () => {
    const backend = new FakeBackend()
    backend.seed('/api/share', [createMockShare({ token: 'tok123', name: 'Family' })])
    const repository = new ShareRepository(
      new ShareService(backend.client()),
      new LocalCache(createMemoryStorage(), 'shares', shareSchema)
    )

    expect(await repository.getSharedContent('tok123')).toBe('shared Family')
    expect(await repository.validateToken('tok123')).toBe(true)
    expect(await repository.validateToken('expired')).toBe(false)
  })
})
