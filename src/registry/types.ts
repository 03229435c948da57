import type { ToolAnnotations as MCPToolAnnotations } from '@modelcontextprotocol/sdk/types.js'
import type { z } from 'zod'
import type { MCPToolResponse } from '../types.js'
import type { Logger } from '../utils/logger.js'

/**
 * Context passed to tool handlers with all dependencies.
 */
export interface ToolContext {
  /** Logger handed to the services a tool runs */
  readonly logger: Logger
}

/**
 * MCP tool behavior hints.
 * Uses required booleans instead of optional to force explicit declaration.
 */
export interface ToolAnnotations extends Omit<MCPToolAnnotations, 'title'> {
  readonly readOnlyHint: boolean
  readonly destructiveHint: boolean
  readonly idempotentHint: boolean
  readonly openWorldHint: boolean
}

/**
 * Structured documentation for qml_help.
 */
export interface ToolDocumentation {
  /** Brief description (~500 bytes) */
  readonly overview: string
  readonly examples: ReadonlyArray<{
    readonly desc: string
    readonly input: Record<string, unknown>
  }>
  readonly errors: ReadonlyArray<{
    readonly error: string
    readonly solution: string
  }>
}

/**
 * Handlers receive raw parameters and validate them against their own schema.
 */
export type ToolHandler = (context: ToolContext, params: unknown) => Promise<MCPToolResponse>

export type ToolCategory = 'styles' | 'utility'

/**
 * Complete tool definition with all metadata.
 * Single source of truth for the MCP manifest and help.
 */
export interface ToolDefinition<TSchema extends z.ZodType = z.ZodType> {
  /** Tool name (qml_verb_noun) */
  readonly name: string
  readonly title: string
  /** Short description for MCP tool listing */
  readonly description: string
  readonly category: ToolCategory
  readonly inputSchema: TSchema
  readonly outputSchema?: z.ZodType
  readonly annotations: ToolAnnotations
  readonly handler: ToolHandler
  readonly docs: ToolDocumentation
}

/**
 * Pure transformations with no side effects outside the process.
 */
export const READ_ONLY_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false
} as const
