import { type ChannelListener, subscribe, unsubscribe } from 'node:diagnostics_channel'
import { type TestContext } from 'node:test'
import {
  ClusterMetadata,
  type ClusterMetadataOptions,
  type MetadataResponse,
  type MetadataResponsePartition,
  type MetadataResponseTopic
} from '../src/index.ts'

export const startTime = 1_000_000

export interface Clock {
  now: number
  tick (ms: number): void
}

export function createClock (now: number = startTime): Clock {
  const clock: Clock = {
    now,
    tick (ms: number) {
      clock.now += ms
    }
  }

  return clock
}

export function createCluster (overrideOptions: ClusterMetadataOptions = {}) {
  const clock = createClock()
  const cluster = new ClusterMetadata({ now: () => clock.now, ...overrideOptions })

  return { cluster, clock }
}

export function createPartition (partitionIndex: number, leaderId: number): MetadataResponsePartition {
  return {
    errorCode: 0,
    partitionIndex,
    leaderId,
    leaderEpoch: 0,
    replicaNodes: [leaderId],
    isrNodes: [leaderId],
    offlineReplicas: []
  }
}

export function createTopic (
  name: string | null,
  partitions: [partitionIndex: number, leaderId: number][] = [],
  errorCode: number = 0
): MetadataResponseTopic {
  return {
    errorCode,
    name,
    isInternal: false,
    partitions: partitions.map(([partitionIndex, leaderId]) => createPartition(partitionIndex, leaderId))
  }
}

export function createResponse (
  topics: MetadataResponseTopic[],
  brokers: [nodeId: number, host: string, port: number][] = [
    [1, 'h1', 9092],
    [2, 'h2', 9092]
  ]
): MetadataResponse {
  return {
    brokers: brokers.map(([nodeId, host, port]) => ({ nodeId, host, port, rack: null })),
    clusterId: 'test-cluster',
    controllerId: 1,
    topics
  }
}

export function captureChannel (t: TestContext, name: string): unknown[] {
  const messages: unknown[] = []
  const listener: ChannelListener = message => {
    messages.push(message)
  }

  subscribe(name, listener)
  t.after(() => {
    unsubscribe(name, listener)
  })

  return messages
}
