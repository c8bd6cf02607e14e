import { getProtocolError, protocolErrors } from './protocol/errors.ts'

const kMultipleErrors = Symbol('kafka.metadata.multipleErrors')

export const ERROR_PREFIX = 'KMC_'

export const errorCodes = ['KMC_MULTIPLE', 'KMC_PROTOCOL', 'KMC_USER'] as const

export type ErrorCode = (typeof errorCodes)[number]

export type ErrorProperties = { cause?: Error } & Record<string, unknown>

export class GenericError extends Error {
  code: string;
  [index: string]: unknown

  constructor (code: ErrorCode, message: string, { cause, ...rest }: ErrorProperties = {}) {
    super(message, cause ? { cause } : {})
    this.code = code

    Reflect.defineProperty(this, 'message', { enumerable: true })
    Reflect.defineProperty(this, 'code', { enumerable: true })

    if ('stack' in this) {
      Reflect.defineProperty(this, 'stack', { enumerable: true })
    }

    for (const [key, value] of Object.entries(rest)) {
      Reflect.defineProperty(this, key, { value, enumerable: true })
    }
  }
}

export class MultipleErrors extends AggregateError {
  code: string;
  [index: string]: unknown;
  [kMultipleErrors]: true

  static code: ErrorCode = 'KMC_MULTIPLE'

  static isMultipleErrors (error: Error): error is MultipleErrors {
    return (error as Partial<MultipleErrors>)[kMultipleErrors] === true
  }

  constructor (message: string, errors: Error[], { cause, ...rest }: ErrorProperties = {}) {
    super(errors, message, cause ? { cause } : {})
    this.code = MultipleErrors.code
    this[kMultipleErrors] = true

    Reflect.defineProperty(this, 'message', { enumerable: true })
    Reflect.defineProperty(this, 'code', { enumerable: true })

    if ('stack' in this) {
      Reflect.defineProperty(this, 'stack', { enumerable: true })
    }

    for (const [key, value] of Object.entries(rest)) {
      Reflect.defineProperty(this, key, { value, enumerable: true })
    }

    Reflect.defineProperty(this, kMultipleErrors, { value: true, enumerable: false })
  }
}

export * from './protocol/errors.ts'

export class ProtocolError extends GenericError {
  static code: ErrorCode = 'KMC_PROTOCOL'

  constructor (codeOrId: string | number, properties: ErrorProperties = {}) {
    const { id, code, message, canRetry } =
      typeof codeOrId === 'number' ? getProtocolError(codeOrId) : protocolErrors[codeOrId]

    super(ProtocolError.code, message, {
      apiId: id,
      apiCode: code,
      canRetry,
      hasStaleMetadata: ['UNKNOWN_TOPIC_OR_PARTITION', 'LEADER_NOT_AVAILABLE', 'NOT_LEADER_OR_FOLLOWER'].includes(id),
      ...properties
    })
  }
}

export class UserError extends GenericError {
  static code: ErrorCode = 'KMC_USER'

  constructor (message: string, properties: ErrorProperties = {}) {
    super(UserError.code, message, { canRetry: false, ...properties })
  }
}
