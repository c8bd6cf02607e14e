export { ClusterMetadata, type ClusterMetadataListener, type PartitionLeaders } from './cluster.ts'
export * from './options.ts'
export { PendingUpdate } from './pending-update.ts'
export type * from './types.ts'
