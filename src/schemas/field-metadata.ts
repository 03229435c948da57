import { z } from 'zod'
import { MAX_FIELDS } from '../constants.js'

/**
 * Field types the rewriter distinguishes. Everything that is neither a
 * boolean nor a 64-bit integer is `other`.
 */
export const FIELD_TYPES = ['boolean', 'integer64', 'other'] as const

export const FieldTypeSchema = z.enum(FIELD_TYPES)

export const FieldDescriptorSchema = z
  .object({
    name: z.string().min(1, 'Field name must not be empty'),
    type: FieldTypeSchema
  })
  .strict()

/**
 * Layer metadata supplied by the data source.
 *
 * `primaryKeyFieldIndex` is deliberately not range-checked here: an index that
 * points nowhere disables primary key rewriting instead of failing the request.
 */
export const LayerMetadataSchema = z.object({
  fields: z.array(FieldDescriptorSchema).max(MAX_FIELDS),
  providerKind: z.string(),
  primaryKeyFieldIndex: z.number().int().optional()
})

export type FieldType = z.infer<typeof FieldTypeSchema>
export type FieldDescriptor = z.infer<typeof FieldDescriptorSchema>
export type LayerMetadata = z.infer<typeof LayerMetadataSchema>
