import { z } from 'zod'
import { parseJsonString, ResponseFormatSchema } from './common.js'
import { TOOL_NAMES, type ToolName } from './tool-names.js'

export { TOOL_NAMES, type ToolName }

export const HELP_SECTIONS = ['overview', 'examples', 'errors', 'schema'] as const
export type HelpSection = (typeof HELP_SECTIONS)[number]

/**
 * Accepts a JSON array string, a comma-separated list or a single name.
 */
function parseToolNames(val: unknown): unknown {
  if (typeof val === 'string') {
    const parsed = parseJsonString(val)
    if (parsed !== val) {
      return parsed
    }
    return val.split(',').map((s) => s.trim())
  }
  return val
}

/**
 * - qml_help() → list all tools with summaries
 * - qml_help({tools: "qml_rewrite_style"}) → docs and schema for one tool
 * - qml_help({tools: "qml_rewrite_style", only: ["schema"]}) → schema only
 */
export const HelpSchema = z.object({
  tools: z
    .preprocess(parseToolNames, z.array(z.enum(TOOL_NAMES)).min(1).max(TOOL_NAMES.length))
    .optional()
    .describe('Tool names for detailed help. Omit to list all tools.'),

  only: z
    .preprocess(parseJsonString, z.array(z.enum(HELP_SECTIONS)))
    .optional()
    .describe('Filter to specific sections. Default: all sections.'),

  response_format: ResponseFormatSchema
})

export type HelpInput = z.infer<typeof HelpSchema>

export interface ToolExample {
  readonly description: string
  readonly input: Record<string, unknown>
}

export interface ToolError {
  readonly error: string
  readonly solution: string
}

export interface ToolHelp {
  readonly name: string
  readonly overview?: string
  readonly examples?: readonly ToolExample[]
  readonly errors?: readonly ToolError[]
  readonly schema?: Record<string, unknown>
}

export interface DiscoveryResponse {
  readonly tools: ReadonlyArray<{
    readonly name: string
    readonly summary: string
    readonly category: string
  }>
  readonly tip: string
}

export interface HelpResponse {
  readonly discovery?: DiscoveryResponse
  readonly tools?: Readonly<Record<string, ToolHelp>>
}
