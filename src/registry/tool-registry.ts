import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { z } from 'zod'
import type { ToolCategory, ToolContext, ToolDefinition } from './types.js'

interface McpToolOptions {
  readonly title: string
  readonly description: string
  readonly inputSchema: z.ZodRawShape
  readonly outputSchema?: z.ZodRawShape
  readonly annotations?: {
    readonly readOnlyHint?: boolean
    readonly destructiveHint?: boolean
    readonly idempotentHint?: boolean
    readonly openWorldHint?: boolean
  }
}

export interface ToolRegistrationResult {
  readonly toolName: string
  readonly success: boolean
  readonly error?: Error
  readonly registeredAt: Date
}

export interface BatchRegistrationSummary {
  readonly total: number
  readonly successful: number
  readonly failed: number
  readonly results: ReadonlyArray<ToolRegistrationResult>
  readonly categories: ReadonlyMap<ToolCategory, number>
  readonly duration: number
}

export interface RegistrationStrategy {
  beforeBatch?: (toolCount: number) => void
  afterTool?: (result: ToolRegistrationResult) => void
  afterBatch?: (summary: BatchRegistrationSummary) => void
  onError?: (error: Error, toolName: string) => boolean
}

function shouldLogToolCalls(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.QML_STYLE_DEBUG_MODE === 'true' || env.QML_STYLE_LOG_TOOL_CALLS === 'true'
}

export function registerTool(
  server: McpServer,
  context: ToolContext,
  definition: ToolDefinition
): ToolRegistrationResult {
  try {
    const mcpOptions: McpToolOptions = {
      title: definition.title,
      description: definition.description,
      inputSchema: definition.inputSchema as unknown as z.ZodRawShape,
      ...(definition.outputSchema && {
        outputSchema: definition.outputSchema as unknown as z.ZodRawShape
      }),
      annotations: definition.annotations
    }

    const wrappedHandler = async (params: unknown) => {
      const logCalls = shouldLogToolCalls()
      const startTime = Date.now()

      if (logCalls) {
        context.logger.info('Tool invoked', { tool: definition.name })
      }

      try {
        const result = await definition.handler(context, params)

        if (logCalls) {
          context.logger.info('Tool completed', {
            tool: definition.name,
            duration: Date.now() - startTime,
            success: result.isError !== true
          })
        }

        return result
      } catch (error) {
        context.logger.error(
          'Tool failed',
          {
            tool: definition.name,
            duration: Date.now() - startTime,
            error: error instanceof Error ? error.message : String(error)
          },
          error instanceof Error ? error : undefined
        )

        throw error
      }
    }

    server.registerTool(definition.name, mcpOptions, wrappedHandler)

    return {
      toolName: definition.name,
      success: true,
      registeredAt: new Date()
    }
  } catch (error) {
    return {
      toolName: definition.name,
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
      registeredAt: new Date()
    }
  }
}

export function registerToolsBatch(
  server: McpServer,
  context: ToolContext,
  tools: ReadonlyArray<ToolDefinition>,
  strategy?: RegistrationStrategy
): BatchRegistrationSummary {
  const startTime = Date.now()
  const results: ToolRegistrationResult[] = []
  const categoryCounts = new Map<ToolCategory, number>()

  strategy?.beforeBatch?.(tools.length)

  for (const tool of tools) {
    const result = registerTool(server, context, tool)
    results.push(result)

    if (result.success) {
      categoryCounts.set(tool.category, (categoryCounts.get(tool.category) ?? 0) + 1)
    }

    strategy?.afterTool?.(result)

    if (!result.success && result.error) {
      const shouldContinue = strategy?.onError?.(result.error, tool.name)
      if (shouldContinue === false) {
        break
      }
    }
  }

  const summary: BatchRegistrationSummary = {
    total: tools.length,
    successful: results.filter((r) => r.success).length,
    failed: results.filter((r) => !r.success).length,
    results,
    categories: categoryCounts,
    duration: Date.now() - startTime
  }

  strategy?.afterBatch?.(summary)

  return summary
}

/**
 * Reports registration progress through the tool context logger.
 */
export function createLoggingStrategy(context: ToolContext): RegistrationStrategy {
  return {
    beforeBatch: (toolCount: number) => {
      context.logger.debug('Registering tools', { count: toolCount })
    },

    afterTool: (result: ToolRegistrationResult) => {
      if (result.success) {
        context.logger.debug('Tool registered', { tool: result.toolName })
      } else {
        context.logger.error('Tool registration failed', { tool: result.toolName }, result.error)
      }
    },

    afterBatch: (summary: BatchRegistrationSummary) => {
      context.logger.info('Tool registration finished', {
        total: summary.total,
        successful: summary.successful,
        failed: summary.failed,
        durationMs: summary.duration,
        categories: Object.fromEntries(summary.categories)
      })
    }
  }
}

export function validateToolNames(tools: ReadonlyArray<ToolDefinition>): {
  valid: boolean
  duplicates: string[]
} {
  const names = new Set<string>()
  const duplicates: string[] = []

  for (const tool of tools) {
    if (names.has(tool.name)) {
      duplicates.push(tool.name)
    } else {
      names.add(tool.name)
    }
  }

  return {
    valid: duplicates.length === 0,
    duplicates
  }
}

export function getToolStatsByCategory(
  tools: ReadonlyArray<ToolDefinition>
): Map<ToolCategory, number> {
  const stats = new Map<ToolCategory, number>()

  for (const tool of tools) {
    stats.set(tool.category, (stats.get(tool.category) ?? 0) + 1)
  }

  return stats
}
