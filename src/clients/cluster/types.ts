export type NullableString = string | null

export interface BrokerMetadata {
  readonly nodeId: number
  readonly host: string
  readonly port: number
  readonly rack: NullableString
}

// The following interfaces are a structural subset of the Metadata (v12) and FindCoordinator (v6) responses
export interface MetadataResponsePartition {
  errorCode?: number
  partitionIndex: number
  leaderId: number
  leaderEpoch?: number
  replicaNodes?: number[]
  isrNodes?: number[]
  offlineReplicas?: number[]
}

export interface MetadataResponseTopic {
  errorCode: number
  name: NullableString
  topicId?: string
  isInternal?: boolean
  partitions: MetadataResponsePartition[]
}

export interface MetadataResponseBroker {
  nodeId: number
  host: string
  port: number
  rack?: NullableString
}

export interface MetadataResponse {
  brokers: MetadataResponseBroker[]
  topics: MetadataResponseTopic[]
  clusterId?: NullableString
  controllerId?: number
}

export interface GroupCoordinator {
  nodeId: number
  host: string
  port: number
  errorCode: number
  errorMessage?: NullableString
}

export interface ClusterMetadataOptions {
  retryBackoff?: number
  metadataMaxAge?: number
  now?: () => number
}

export type PendingUpdateState = 'pending' | 'fulfilled' | 'rejected'

export type ListenerToken = symbol
