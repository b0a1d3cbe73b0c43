export { EntityRepository, SyncableRepository } from './entityRepository'
export type { EntityBackend, ReadResult, SyncableBackend } from './entityRepository'
export { SubscriptionRepository } from './subscriptionRepository'
export type { SubscriptionTestResult } from './subscriptionRepository'
export { ArtifactRepository } from './artifactRepository'
export { FileRepository } from './fileRepository'
export { ShareRepository } from './shareRepository'
