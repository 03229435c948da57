import { z } from 'zod'
import { MAX_FIELDS, MAX_STYLE_LENGTH } from '../constants.js'
import { ResponseFormatSchema } from './common.js'
import { FieldDescriptorSchema } from './field-metadata.js'

// =============================================================================
// Input
// =============================================================================

export const RewriteStyleSchema = z
  .object({
    style: z
      .string()
      .min(1, 'Style document must not be empty')
      .max(MAX_STYLE_LENGTH, `Style document must be at most ${MAX_STYLE_LENGTH} characters`)
      .describe('Complete QML style document text'),

    fields: z
      .array(FieldDescriptorSchema)
      .max(MAX_FIELDS)
      .describe('Layer fields in layer order: [{name, type: "boolean"|"integer64"|"other"}]'),

    provider_kind: z
      .string()
      .min(1)
      .describe('Layer data provider key. Only "ogr" enables primary key rewriting'),

    primary_key_field_index: z
      .number()
      .int()
      .optional()
      .describe('Zero-based index into fields of the primary key, if the layer has one'),

    include_style: z
      .boolean()
      .default(true)
      .describe('Return the rewritten style text. Set false for a change report only'),

    response_format: ResponseFormatSchema
  })
  .strict()

export type RewriteStyleInput = z.infer<typeof RewriteStyleSchema>

// =============================================================================
// Output
// =============================================================================

export const StyleChangeSchema = z.object({
  target: z.enum(['category', 'rule', 'label', 'property']),
  attribute: z.string(),
  before: z.string(),
  after: z.string()
})

export const RewriteStyleOutputSchema = z.object({
  changed: z.boolean(),
  change_count: z.number().int(),
  changes: z.array(StyleChangeSchema),
  primary_key_field: z.string().optional(),
  boolean_fields: z.array(z.string()),
  style: z.string().optional()
})

export type RewriteStyleOutput = z.infer<typeof RewriteStyleOutputSchema>
