import {
  type ClusterFailureEvent,
  clusterFailuresChannel,
  type ClusterUpdateEvent,
  clusterUpdatesChannel,
  notifyCreation
} from '../../diagnostic.ts'
import { getProtocolError, MultipleErrors, ProtocolError, TopicErrorKinds, topicErrorKindForCode, UserError } from '../../errors.ts'
import { logger, loggers } from '../../logging.ts'
import { createPromisifiedCallback, kCallbackPromise, type CallbackWithPromise } from '../callbacks.ts'
import { resolveClusterMetadataOptions } from './options.ts'
import { PendingUpdate } from './pending-update.ts'
import {
  type BrokerMetadata,
  type ClusterMetadataOptions,
  type GroupCoordinator,
  type ListenerToken,
  type MetadataResponse
} from './types.ts'

export type ClusterMetadataListener = (cluster: ClusterMetadata) => void

// Partition index to leader node id, undefined when no leader is currently elected
export type PartitionLeaders = ReadonlyMap<number, number | undefined>

/*
  Client-local view of the cluster: brokers, partition leaders and group coordinators.

  It performs no I/O. Whoever refreshes the metadata polls ttl(), then reports the outcome
  via updateMetadata() or failedUpdate(). Callers needing fresh metadata share a single
  PendingUpdate obtained from requestUpdate().
*/
export class ClusterMetadata {
  #retryBackoff: number
  #metadataMaxAge: number
  #now: () => number

  #brokers: Map<number, BrokerMetadata>
  #partitions: Map<string, PartitionLeaders>
  #groups: Map<string, number>

  #version: number
  #lastRefresh: number
  #lastSuccessfulRefresh: number
  #needUpdate: boolean
  #pendingUpdate: PendingUpdate<ClusterMetadata> | undefined

  #listeners: Map<ListenerToken, ClusterMetadataListener>
  #notifying: boolean
  #deferred: (() => void)[]

  constructor (options: ClusterMetadataOptions = {}) {
    const { retryBackoff, metadataMaxAge, now } = resolveClusterMetadataOptions(options)
    this.#retryBackoff = retryBackoff
    this.#metadataMaxAge = metadataMaxAge
    this.#now = now

    this.#brokers = new Map()
    this.#partitions = new Map()
    this.#groups = new Map()

    this.#version = 0
    this.#lastRefresh = 0
    this.#lastSuccessfulRefresh = 0
    this.#needUpdate = false

    this.#listeners = new Map()
    this.#notifying = false
    this.#deferred = []

    notifyCreation('cluster', this)
  }

  get version (): number {
    return this.#version
  }

  get needUpdate (): boolean {
    return this.#needUpdate
  }

  get lastRefresh (): number {
    return this.#lastRefresh
  }

  get lastSuccessfulRefresh (): number {
    return this.#lastSuccessfulRefresh
  }

  brokers (): Set<BrokerMetadata> {
    return new Set(this.#brokers.values())
  }

  brokerMetadata (nodeId: number): BrokerMetadata | undefined {
    return this.#brokers.get(nodeId)
  }

  topics (): Set<string> {
    return new Set(this.#partitions.keys())
  }

  partitionsForTopic (topic: string): Set<number> | undefined {
    const leaders = this.#partitions.get(topic)
    return leaders ? new Set(leaders.keys()) : undefined
  }

  leaderForPartition (topic: string, partition: number): number | undefined {
    return this.#partitions.get(topic)?.get(partition)
  }

  coordinatorForGroup (group: string): number | undefined {
    return this.#groups.get(group)
  }

  addGroupCoordinator (group: string, coordinator: GroupCoordinator): boolean {
    if (coordinator.errorCode !== 0) {
      logger.error(
        { group, errorCode: coordinator.errorCode },
        'Unable to find the coordinator for group %s: %s.',
        group,
        coordinator.errorMessage ?? getProtocolError(coordinator.errorCode).id
      )
      return false
    }

    this.#groups.set(group, coordinator.nodeId)
    loggers.cluster?.debug({ group, nodeId: coordinator.nodeId }, 'Updated group coordinator.')
    return true
  }

  // Milliseconds until the metadata should be refreshed
  ttl (): number {
    const now = this.#now()
    const ageDeadline = this.#needUpdate ? 0 : this.#lastSuccessfulRefresh + this.#metadataMaxAge - now
    const retryDeadline = this.#lastRefresh + this.#retryBackoff - now

    return Math.max(ageDeadline, retryDeadline, 0)
  }

  // Flags the metadata as stale. This only affects ttl(), the refresh itself is performed elsewhere.
  requestUpdate (): PendingUpdate<ClusterMetadata> {
    this.#needUpdate = true

    if (!this.#pendingUpdate || this.#pendingUpdate.resolved) {
      this.#pendingUpdate = new PendingUpdate<ClusterMetadata>()
    }

    return this.#pendingUpdate
  }

  waitForUpdate (callback: CallbackWithPromise<ClusterMetadata>): void
  waitForUpdate (): Promise<ClusterMetadata>
  waitForUpdate (callback?: CallbackWithPromise<ClusterMetadata>): void | Promise<ClusterMetadata> {
    if (!callback) {
      callback = createPromisifiedCallback<ClusterMetadata>()
    }

    this.requestUpdate().onResolved(callback)

    return callback[kCallbackPromise]
  }

  failedUpdate (error: Error): void {
    if (this.#notifying) {
      this.#deferred.push(() => this.failedUpdate(error))
      return
    }

    const pendingUpdate = this.#takePendingUpdate()
    this.#lastRefresh = this.#now()

    loggers.cluster?.debug({ err: error }, 'Cluster metadata refresh failed.')

    if (clusterFailuresChannel.hasSubscribers) {
      clusterFailuresChannel.publish({ cluster: this, error } satisfies ClusterFailureEvent)
    }

    this.#notify(pendingUpdate ? () => pendingUpdate.reject(error) : undefined, false)
  }

  updateMetadata (response: MetadataResponse): void {
    if (this.#notifying) {
      this.#deferred.push(() => this.updateMetadata(response))
      return
    }

    // A request for a single topic which failed is unambiguous: the waiting callers must fail
    if (response.topics.length === 1 && response.topics[0].errorCode !== 0) {
      const { errorCode, name } = response.topics[0]
      this.failedUpdate(new ProtocolError(errorCode, { topic: name }))
      return
    }

    if (response.brokers.length) {
      const brokers = new Map<number, BrokerMetadata>()

      for (const { nodeId, host, port, rack } of response.brokers) {
        brokers.set(nodeId, Object.freeze({ nodeId, host, port, rack: rack ?? null }))
      }

      this.#brokers = brokers
    } else {
      logger.warn('No broker metadata found in the metadata response.')
    }

    // Topics which are missing or failed are dropped, except LEADER_NOT_AVAILABLE which is only omitted until the next refresh
    const partitions = new Map<string, PartitionLeaders>()

    for (const { errorCode, name, partitions: rawPartitions } of response.topics) {
      if (name === null) {
        logger.warn({ errorCode }, 'Ignoring topic without a name in the metadata response.')
        continue
      }

      switch (topicErrorKindForCode(errorCode)) {
        case TopicErrorKinds.NONE: {
          const leaders = new Map<number, number | undefined>()

          for (const { partitionIndex, leaderId } of rawPartitions) {
            leaders.set(partitionIndex, leaderId >= 0 ? leaderId : undefined)
          }

          partitions.set(name, leaders)
          break
        }
        case TopicErrorKinds.LEADER_NOT_AVAILABLE:
          logger.error({ topic: name }, 'Topic %s is not available during auto-create initialization.', name)
          break
        case TopicErrorKinds.UNKNOWN_TOPIC_OR_PARTITION:
          logger.error({ topic: name }, 'Topic %s not found in cluster metadata.', name)
          break
        case TopicErrorKinds.TOPIC_AUTHORIZATION_FAILED:
          logger.error({ topic: name }, 'Topic %s is not authorized for this client.', name)
          break
        case TopicErrorKinds.INVALID_TOPIC:
          logger.error({ topic: name }, '"%s" is not a valid topic name.', name)
          break
        default:
          logger.error(
            { topic: name, errorCode },
            'Error fetching metadata for topic %s: %s.',
            name,
            getProtocolError(errorCode).id
          )
      }
    }

    this.#partitions = partitions

    const pendingUpdate = this.#takePendingUpdate()
    const now = this.#now()
    this.#needUpdate = false
    this.#version++
    this.#lastRefresh = now
    this.#lastSuccessfulRefresh = now

    loggers.cluster?.debug({ version: this.#version }, 'Updated cluster metadata to %s.', this.toString())

    if (clusterUpdatesChannel.hasSubscribers) {
      clusterUpdatesChannel.publish({ cluster: this, version: this.#version } satisfies ClusterUpdateEvent)
    }

    this.#notify(pendingUpdate ? () => pendingUpdate.resolve(this) : undefined, true)
  }

  addListener (listener: ClusterMetadataListener): ListenerToken {
    const token = Symbol('kafka.metadata.cluster.listener')
    this.#listeners.set(token, listener)
    return token
  }

  // When given a function, every registration of that function is removed
  removeListener (listener: ListenerToken | ClusterMetadataListener): void {
    if (typeof listener === 'symbol') {
      if (!this.#listeners.delete(listener)) {
        throw new UserError('Cluster metadata listener not found.', { listener })
      }

      return
    }

    let removed = false

    for (const [token, registered] of this.#listeners) {
      if (registered === listener) {
        this.#listeners.delete(token)
        removed = true
      }
    }

    if (!removed) {
      throw new UserError('Cluster metadata listener not found.', { listener })
    }
  }

  toString (): string {
    return `ClusterMetadata(brokers: ${this.#brokers.size}, topics: ${this.#partitions.size}, groups: ${this.#groups.size})`
  }

  #takePendingUpdate (): PendingUpdate<ClusterMetadata> | undefined {
    const pendingUpdate = this.#pendingUpdate
    this.#pendingUpdate = undefined

    return pendingUpdate && !pendingUpdate.resolved ? pendingUpdate : undefined
  }

  // Waiters and listeners run in a single round: updates they trigger are queued until every one of them has been invoked
  #notify (settle: (() => void) | undefined, notifyListeners: boolean): void {
    const version = this.#version
    const errors: Error[] = []

    this.#notifying = true

    try {
      if (settle) {
        try {
          settle()
        } catch (error) {
          collectErrors(errors, error)
        }
      }

      if (notifyListeners) {
        for (const listener of Array.from(this.#listeners.values())) {
          try {
            listener(this)
          } catch (error) {
            loggers['cluster:listeners']?.debug({ err: error }, 'Cluster metadata listener failed.')
            collectErrors(errors, error)
          }
        }
      }
    } finally {
      this.#notifying = false
    }

    for (let operation = this.#deferred.shift(); operation; operation = this.#deferred.shift()) {
      operation()
    }

    if (errors.length) {
      throw new MultipleErrors(`${errors.length} cluster metadata subscriber(s) failed.`, errors, { version })
    }
  }
}

function collectErrors (errors: Error[], error: unknown): void {
  if (!(error instanceof Error)) {
    errors.push(new Error(String(error)))
  } else if (MultipleErrors.isMultipleErrors(error)) {
    errors.push(...error.errors)
  } else {
    errors.push(error)
  }
}
