import { UserError } from '../../errors.ts'
import { ajv, formatValidationErrors } from '../../utils.ts'
import { type ClusterMetadataOptions } from './types.ts'

export const clusterMetadataOptionsSchema = {
  type: 'object',
  properties: {
    retryBackoff: { type: 'number', minimum: 0 },
    metadataMaxAge: { type: 'number', minimum: 0 },
    now: { function: true }
  },
  additionalProperties: false
}

export const clusterMetadataOptionsValidator = ajv.compile(clusterMetadataOptionsSchema)

export const defaultClusterMetadataOptions: Required<ClusterMetadataOptions> = {
  retryBackoff: 100,
  metadataMaxAge: 300_000, // 5 minutes
  now: Date.now
}

export function resolveClusterMetadataOptions (options: ClusterMetadataOptions): Required<ClusterMetadataOptions> {
  if (!clusterMetadataOptionsValidator(options)) {
    throw new UserError(formatValidationErrors(clusterMetadataOptionsValidator, '/options'))
  }

  return {
    retryBackoff: options.retryBackoff ?? defaultClusterMetadataOptions.retryBackoff,
    metadataMaxAge: options.metadataMaxAge ?? defaultClusterMetadataOptions.metadataMaxAge,
    now: options.now ?? defaultClusterMetadataOptions.now
  }
}
