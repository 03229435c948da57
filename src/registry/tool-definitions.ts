/**
 * Tool definitions aggregator.
 *
 * Each tool file is the single source of truth for its tools' metadata and
 * documentation; this module only collects them.
 */

import { HELP_TOOL } from '../tools/help.js'
import { STYLE_TOOLS } from '../tools/rewrite-style.js'
import type { ToolDefinition } from './types.js'

export type { ToolCategory, ToolContext, ToolDefinition } from './types.js'

export const ALL_TOOLS: ReadonlyArray<ToolDefinition> = [...STYLE_TOOLS, HELP_TOOL] as const

export const TOOLS_BY_NAME: Readonly<Record<string, ToolDefinition>> = Object.fromEntries(
  ALL_TOOLS.map((tool) => [tool.name, tool])
)
