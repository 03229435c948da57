import { PRIMARY_KEY_PROVIDERS } from '../../constants.js'
import type { LayerMetadata } from '../../schemas/field-metadata.js'

/**
 * What the rewriter needs to know about the layer, derived once per run.
 */
export interface RewriteContext {
  /** Boolean field names in layer order */
  readonly boolFieldNames: readonly string[]
  /** Set only for an integer64 primary key of a file or database layer */
  readonly primaryKeyFieldName?: string
}

export type PrimaryKeySkipReason =
  | 'provider_not_supported'
  | 'no_primary_key'
  | 'index_out_of_range'
  | 'not_integer64'

export interface RewriteContextResolution {
  readonly context: RewriteContext
  /** Why primary key rewriting is off, when it is */
  readonly primaryKeySkipReason?: PrimaryKeySkipReason
}

export function resolveRewriteContext(metadata: LayerMetadata): RewriteContextResolution {
  const boolFieldNames = metadata.fields
    .filter((field) => field.type === 'boolean')
    .map((field) => field.name)

  if (!PRIMARY_KEY_PROVIDERS.includes(metadata.providerKind)) {
    return { context: { boolFieldNames }, primaryKeySkipReason: 'provider_not_supported' }
  }

  const index = metadata.primaryKeyFieldIndex
  if (index === undefined) {
    return { context: { boolFieldNames }, primaryKeySkipReason: 'no_primary_key' }
  }

  const pkField = index >= 0 ? metadata.fields[index] : undefined
  if (!pkField) {
    return { context: { boolFieldNames }, primaryKeySkipReason: 'index_out_of_range' }
  }

  if (pkField.type !== 'integer64') {
    return { context: { boolFieldNames }, primaryKeySkipReason: 'not_integer64' }
  }

  return { context: { boolFieldNames, primaryKeyFieldName: pkField.name } }
}

export function createRewriteContext(metadata: LayerMetadata): RewriteContext {
  return resolveRewriteContext(metadata).context
}
