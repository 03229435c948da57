import { z } from 'zod'
import { READ_ONLY_ANNOTATIONS, type ToolDefinition } from '../registry/types.js'
import {
  type DiscoveryResponse,
  HELP_SECTIONS,
  type HelpResponse,
  HelpSchema,
  type HelpSection,
  type ToolHelp
} from '../schemas/help.js'
import { defineStandardTool } from './factory/index.js'

type ToolRegistry = {
  ALL_TOOLS: ReadonlyArray<ToolDefinition>
  TOOLS_BY_NAME: Readonly<Record<string, ToolDefinition>>
}

let toolDefsPromise: Promise<ToolRegistry> | null = null

/**
 * tool-definitions.ts imports HELP_TOOL, so the registry is loaded lazily.
 */
async function getToolRegistry(): Promise<ToolRegistry> {
  if (!toolDefsPromise) {
    toolDefsPromise = import('../registry/tool-definitions.js')
  }
  return toolDefsPromise
}

function generateToolSchema(tool: ToolDefinition): Record<string, unknown> {
  return z.toJSONSchema(tool.inputSchema, {
    io: 'input',
    target: 'draft-7',
    unrepresentable: 'any'
  }) as Record<string, unknown>
}

function truncateAtWordBoundary(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text
  }
  const truncated = text.slice(0, maxLength)
  const lastSpace = truncated.lastIndexOf(' ')
  if (lastSpace > maxLength * 0.6) {
    return `${truncated.slice(0, lastSpace)}...`
  }
  return `${truncated}...`
}

async function buildDiscoveryResponse(): Promise<DiscoveryResponse> {
  const { ALL_TOOLS } = await getToolRegistry()
  return {
    tools: ALL_TOOLS.map((t) => ({
      name: t.name,
      summary: truncateAtWordBoundary(t.docs.overview, 120),
      category: t.category
    })),
    tip: 'Use qml_help({tools: ["qml_rewrite_style"]}) for full tool docs and schemas'
  }
}

async function buildToolHelpResponse(
  toolNames: readonly string[],
  sections: readonly HelpSection[]
): Promise<HelpResponse> {
  const { TOOLS_BY_NAME } = await getToolRegistry()
  const tools: Record<string, ToolHelp> = {}

  for (const name of toolNames) {
    const tool = TOOLS_BY_NAME[name]
    if (!tool) continue

    tools[name] = {
      name,
      ...(sections.includes('overview') && { overview: tool.docs.overview }),
      ...(sections.includes('examples') && {
        examples: tool.docs.examples.map((ex) => ({ description: ex.desc, input: ex.input }))
      }),
      ...(sections.includes('errors') && {
        errors: tool.docs.errors.map((err) => ({ error: err.error, solution: err.solution }))
      }),
      ...(sections.includes('schema') && { schema: generateToolSchema(tool) })
    }
  }

  return { tools }
}

export const HELP_TOOL = defineStandardTool({
  name: 'qml_help',
  title: 'Get Tool Help',
  description:
    'Get documentation and schemas for the style tools.\n' +
    'Omit params to list all tools. Ex: {tools:["qml_rewrite_style"]} → docs + schema',
  category: 'utility',
  inputSchema: HelpSchema,
  annotations: READ_ONLY_ANNOTATIONS,

  async execute(_ctx, params): Promise<HelpResponse> {
    if (!params.tools) {
      return { discovery: await buildDiscoveryResponse() }
    }
    return buildToolHelpResponse(params.tools, params.only ?? HELP_SECTIONS)
  },

  docs: {
    overview:
      'Discover available tools and get documentation with JSON schemas. ' +
      'Call without params to list all tools. Use the tools param for docs + schema.',
    examples: [
      { desc: 'Discover all tools', input: {} },
      { desc: 'Schema only', input: { tools: ['qml_rewrite_style'], only: ['schema'] } }
    ],
    errors: [{ error: 'Invalid option for tools', solution: 'Use a listed tool name (case-sensitive)' }]
  }
})
