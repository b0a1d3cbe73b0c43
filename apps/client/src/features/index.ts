export * from './batch'
export * from './collectionController'
export * from './syncableController'
export * from './subscriptions'
export * from './artifacts'
export * from './files'
export * from './shares'
export * from './autoSync'
