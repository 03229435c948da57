/**
 * Tool factory type definitions.
 */

import type { z } from 'zod'
import type {
  ToolAnnotations,
  ToolCategory,
  ToolContext,
  ToolDocumentation
} from '../../registry/types.js'

/**
 * Constraint: all tool input schemas must be Zod object types.
 */
export type ToolInputSchema = z.ZodObject<z.ZodRawShape>

export interface ToolMetadata {
  /** Tool name (qml_verb_noun) */
  readonly name: string
  readonly title: string
  /** Short description for MCP tool listing */
  readonly description: string
  readonly category: ToolCategory
  readonly annotations: ToolAnnotations
  readonly docs: ToolDocumentation
}

/**
 * Configuration for a tool that executes once and returns a result.
 */
export interface StandardToolConfig<TInput extends ToolInputSchema, TOutput>
  extends ToolMetadata {
  readonly inputSchema: TInput
  readonly outputSchema?: z.ZodType
  /** Execute the tool business logic */
  readonly execute: (ctx: ToolContext, params: z.infer<TInput>) => Promise<TOutput>
  /** Custom markdown rendering; the generic formatter is used otherwise */
  readonly toMarkdown?: (result: TOutput) => string
}
