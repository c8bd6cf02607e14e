import { channel } from 'node:diagnostics_channel'
import { type ClusterMetadata } from './clients/cluster/cluster.ts'

export type DiagnosticInstanceType = 'cluster'

export interface CreationEvent<Instance> {
  type: DiagnosticInstanceType
  instance: Instance
}

export interface ClusterUpdateEvent {
  cluster: ClusterMetadata
  version: number
}

export interface ClusterFailureEvent {
  cluster: ClusterMetadata
  error: Error
}

export const channelsNamespace = 'kafka-metadata' as const

export function notifyCreation<Instance> (type: DiagnosticInstanceType, instance: Instance): void {
  instancesChannel.publish({ type, instance } satisfies CreationEvent<Instance>)
}

// Generic channel for objects creation
export const instancesChannel = channel(`${channelsNamespace}:instances`)

// Cluster metadata channels
export const clusterUpdatesChannel = channel(`${channelsNamespace}:cluster:updates`)
export const clusterFailuresChannel = channel(`${channelsNamespace}:cluster:failures`)
