/**
 * Tool factory for declarative tool definition.
 *
 * Converts a configuration object into a ToolDefinition whose handler
 * validates input, runs the tool and turns failures into MCP error responses.
 */

import type { z } from 'zod'
import { isStyleError, ValidationError } from '../../errors/index.js'
import type { ToolContext, ToolDefinition, ToolHandler } from '../../registry/types.js'
import { formatErrorResponse, formatToolResponse, truncateText } from '../../services/formatter.js'
import { CHARACTER_LIMIT } from '../../constants.js'
import type { MCPToolResponse, ResponseFormat } from '../../types.js'
import type { StandardToolConfig, ToolInputSchema } from './types.js'

function getResponseFormat(params: unknown): ResponseFormat {
  if (typeof params === 'object' && params !== null && 'response_format' in params) {
    const format = params.response_format
    if (format === 'json' || format === 'markdown') {
      return format
    }
  }
  return 'json'
}

function validateInput<TInput extends ToolInputSchema>(
  schema: TInput,
  params: unknown,
  toolName: string
): z.infer<TInput> {
  const result = schema.safeParse(params ?? {})
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, toolName)
  }
  return result.data
}

export function handleToolError(error: unknown): MCPToolResponse {
  if (isStyleError(error)) {
    return formatErrorResponse(error.toUserMessage(), {
      suggestions: error.getSuggestions()
    })
  }
  if (error instanceof Error) {
    return formatErrorResponse(error.message)
  }
  return formatErrorResponse(String(error))
}

/**
 * Create a standard tool definition.
 *
 * @example
 * ```ts
 * const REWRITE_TOOL = defineStandardTool({
 *   name: 'qml_rewrite_style',
 *   inputSchema: RewriteStyleSchema,
 *   // ... metadata
 *   async execute(ctx, params) {
 *     return rewrite(params, ctx.logger)
 *   }
 * })
 * ```
 */
export function defineStandardTool<TInput extends ToolInputSchema, TOutput>(
  config: StandardToolConfig<TInput, TOutput>
): ToolDefinition<TInput> {
  const handler: ToolHandler = async (context: ToolContext, rawParams: unknown) => {
    const startTime = Date.now()

    try {
      const params = validateInput(config.inputSchema, rawParams, config.name)

      const result = await config.execute(context, params)
      const format = getResponseFormat(params)

      if (format === 'markdown' && config.toMarkdown) {
        const response = formatToolResponse(result, 'json')
        return {
          ...response,
          content: [{ type: 'text', text: truncateText(config.toMarkdown(result), CHARACTER_LIMIT) }]
        }
      }
      return formatToolResponse(result, format)
    } catch (error) {
      return handleToolError(error)
    } finally {
      context.logger.debug('Tool executed', {
        tool: config.name,
        durationMs: Date.now() - startTime
      })
    }
  }

  return {
    name: config.name,
    title: config.title,
    description: config.description,
    category: config.category,
    inputSchema: config.inputSchema,
    outputSchema: config.outputSchema,
    annotations: config.annotations,
    handler,
    docs: config.docs
  }
}
