export interface ProtocolErrorDefinition {
  id: string
  code: number
  canRetry: boolean
  message: string
}

// See: https://kafka.apache.org/protocol.html#protocol_error_codes
export const protocolErrors: Record<string, ProtocolErrorDefinition> = {
  UNKNOWN_SERVER_ERROR: {
    id: 'UNKNOWN_SERVER_ERROR',
    code: -1,
    canRetry: false,
    message: 'The server experienced an unexpected error when processing the request.'
  },
  NONE: { id: 'NONE', code: 0, canRetry: false, message: 'No error.' },
  OFFSET_OUT_OF_RANGE: {
    id: 'OFFSET_OUT_OF_RANGE',
    code: 1,
    canRetry: false,
    message: 'The requested offset is not within the range of offsets maintained by the server.'
  },
  CORRUPT_MESSAGE: {
    id: 'CORRUPT_MESSAGE',
    code: 2,
    canRetry: true,
    message:
      'This message has failed its CRC checksum, exceeds the valid size, has a null key for a compacted topic, or is otherwise corrupt.'
  },
  UNKNOWN_TOPIC_OR_PARTITION: {
    id: 'UNKNOWN_TOPIC_OR_PARTITION',
    code: 3,
    canRetry: true,
    message: 'This server does not host this topic-partition.'
  },
  INVALID_FETCH_SIZE: {
    id: 'INVALID_FETCH_SIZE',
    code: 4,
    canRetry: false,
    message: 'The requested fetch size is invalid.'
  },
  LEADER_NOT_AVAILABLE: {
    id: 'LEADER_NOT_AVAILABLE',
    code: 5,
    canRetry: true,
    message:
      'There is no leader for this topic-partition as we are in the middle of a leadership election.'
  },
  NOT_LEADER_OR_FOLLOWER: {
    id: 'NOT_LEADER_OR_FOLLOWER',
    code: 6,
    canRetry: true,
    message:
      'For requests intended only for the leader, this error indicates that the broker is not the current leader. For requests intended for any replica, this error indicates that the broker is not a replica of the topic partition.'
  },
  REQUEST_TIMED_OUT: {
    id: 'REQUEST_TIMED_OUT',
    code: 7,
    canRetry: true,
    message: 'The request timed out.'
  },
  BROKER_NOT_AVAILABLE: {
    id: 'BROKER_NOT_AVAILABLE',
    code: 8,
    canRetry: false,
    message: 'The broker is not available.'
  },
  REPLICA_NOT_AVAILABLE: {
    id: 'REPLICA_NOT_AVAILABLE',
    code: 9,
    canRetry: true,
    message: 'The replica is not available for the requested topic-partition.'
  },
  MESSAGE_TOO_LARGE: {
    id: 'MESSAGE_TOO_LARGE',
    code: 10,
    canRetry: false,
    message: 'The request included a message larger than the max message size the server will accept.'
  },
  NETWORK_EXCEPTION: {
    id: 'NETWORK_EXCEPTION',
    code: 13,
    canRetry: true,
    message: 'The server disconnected before a response was received.'
  },
  COORDINATOR_LOAD_IN_PROGRESS: {
    id: 'COORDINATOR_LOAD_IN_PROGRESS',
    code: 14,
    canRetry: true,
    message: "The coordinator is loading and hence can't process requests."
  },
  COORDINATOR_NOT_AVAILABLE: {
    id: 'COORDINATOR_NOT_AVAILABLE',
    code: 15,
    canRetry: true,
    message: 'The coordinator is not available.'
  },
  NOT_COORDINATOR: {
    id: 'NOT_COORDINATOR',
    code: 16,
    canRetry: true,
    message: 'This is not the correct coordinator.'
  },
  INVALID_TOPIC_EXCEPTION: {
    id: 'INVALID_TOPIC_EXCEPTION',
    code: 17,
    canRetry: false,
    message: 'The request attempted to perform an operation on an invalid topic.'
  },
  TOPIC_AUTHORIZATION_FAILED: {
    id: 'TOPIC_AUTHORIZATION_FAILED',
    code: 29,
    canRetry: false,
    message: 'Topic authorization failed.'
  },
  GROUP_AUTHORIZATION_FAILED: {
    id: 'GROUP_AUTHORIZATION_FAILED',
    code: 30,
    canRetry: false,
    message: 'Group authorization failed.'
  },
  CLUSTER_AUTHORIZATION_FAILED: {
    id: 'CLUSTER_AUTHORIZATION_FAILED',
    code: 31,
    canRetry: false,
    message: 'Cluster authorization failed.'
  },
  UNSUPPORTED_VERSION: {
    id: 'UNSUPPORTED_VERSION',
    code: 35,
    canRetry: false,
    message: 'The version of API is not supported.'
  },
  INVALID_PARTITIONS: {
    id: 'INVALID_PARTITIONS',
    code: 37,
    canRetry: false,
    message: 'Number of partitions is below 1.'
  },
  NOT_CONTROLLER: {
    id: 'NOT_CONTROLLER',
    code: 41,
    canRetry: true,
    message: 'This is not the correct controller for this cluster.'
  },
  KAFKA_STORAGE_ERROR: {
    id: 'KAFKA_STORAGE_ERROR',
    code: 56,
    canRetry: true,
    message: 'Disk error when trying to access log file on the disk.'
  },
  FENCED_LEADER_EPOCH: {
    id: 'FENCED_LEADER_EPOCH',
    code: 74,
    canRetry: true,
    message: 'The leader epoch in the request is older than the epoch on the broker.'
  },
  UNKNOWN_LEADER_EPOCH: {
    id: 'UNKNOWN_LEADER_EPOCH',
    code: 75,
    canRetry: true,
    message: 'The leader epoch in the request is newer than the epoch on the broker.'
  },
  UNKNOWN_TOPIC_ID: {
    id: 'UNKNOWN_TOPIC_ID',
    code: 100,
    canRetry: true,
    message: 'This server does not host this topic ID.'
  }
}

export const protocolErrorsCodesById: Record<number, string> = Object.fromEntries(
  Object.values(protocolErrors).map(({ id, code }) => [code, id])
)

// Codes missing from the table are reported as UNKNOWN_SERVER_ERROR, keeping the code received on the wire
export function getProtocolError (code: number): ProtocolErrorDefinition {
  const id = protocolErrorsCodesById[code]

  if (id) {
    return protocolErrors[id]
  }

  return { ...protocolErrors.UNKNOWN_SERVER_ERROR, code }
}

export const TopicErrorKinds = {
  NONE: 'NONE',
  LEADER_NOT_AVAILABLE: 'LEADER_NOT_AVAILABLE',
  UNKNOWN_TOPIC_OR_PARTITION: 'UNKNOWN_TOPIC_OR_PARTITION',
  TOPIC_AUTHORIZATION_FAILED: 'TOPIC_AUTHORIZATION_FAILED',
  INVALID_TOPIC: 'INVALID_TOPIC',
  OTHER: 'OTHER'
} as const
export type TopicErrorKind = keyof typeof TopicErrorKinds

const topicErrorKindsByCode: Record<number, TopicErrorKind> = {
  [protocolErrors.NONE.code]: TopicErrorKinds.NONE,
  [protocolErrors.LEADER_NOT_AVAILABLE.code]: TopicErrorKinds.LEADER_NOT_AVAILABLE,
  [protocolErrors.UNKNOWN_TOPIC_OR_PARTITION.code]: TopicErrorKinds.UNKNOWN_TOPIC_OR_PARTITION,
  [protocolErrors.TOPIC_AUTHORIZATION_FAILED.code]: TopicErrorKinds.TOPIC_AUTHORIZATION_FAILED,
  [protocolErrors.INVALID_TOPIC_EXCEPTION.code]: TopicErrorKinds.INVALID_TOPIC
}

export function topicErrorKindForCode (code: number): TopicErrorKind {
  return topicErrorKindsByCode[code] ?? TopicErrorKinds.OTHER
}
