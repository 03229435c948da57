/**
 * Server factory for creating QML style MCP server instances.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { ALL_TOOLS } from './registry/tool-definitions.js'
import {
  type BatchRegistrationSummary,
  createLoggingStrategy,
  registerToolsBatch,
  validateToolNames
} from './registry/tool-registry.js'
import type { ToolContext, ToolDefinition } from './registry/types.js'
import type { Logger } from './utils/logger.js'
import { sharedLogger } from './utils/shared-logger.js'

/**
 * Server instructions for LLMs using this MCP server.
 */
const SERVER_INSTRUCTIONS = `## QML Style Server

Prepares QGIS QML styles for a map server that has no boolean field type and
identifies features by @id instead of the source primary key.

### Workflow
- Read the layer style (QML text) and the layer field list on the client side
- Call qml_rewrite_style with the style, fields in layer order, the provider key
  and the primary key field index
- Upload the returned style when changed is true; otherwise keep the original

### Rules
- Boolean categories become integer categories with values 1 / 0
- Boolean fields in label expressions become if("F", true, false)
- Primary key references become @id, only for provider "ogr" with an integer64 key
- Text inside single quotes is never rewritten
- Running the tool on its own output changes nothing`

export interface ServerConfig {
  /** Server name for MCP protocol */
  readonly name: string
  readonly version: string
}

/**
 * Optional dependencies that can be injected for testing.
 */
export interface ServerDependencies {
  logger?: Logger
  tools?: ReadonlyArray<ToolDefinition>
}

export interface ServerInstance {
  readonly server: McpServer
  /** The tool context for dependency injection */
  readonly context: ToolContext
  readonly registration: BatchRegistrationSummary
  /** Cleanup function to call on shutdown */
  readonly cleanup: () => Promise<void>
}

/**
 * Creates the MCP server and registers every tool.
 *
 * @example
 * ```typescript
 * const { server, cleanup } = createStyleMcpServer({ name: 'qml-style-mcp-server', version: '1.0.0' })
 * await server.connect(new StdioServerTransport())
 * // On shutdown:
 * await cleanup()
 * ```
 */
export function createStyleMcpServer(
  config: ServerConfig,
  deps?: ServerDependencies
): ServerInstance {
  const tools = deps?.tools ?? ALL_TOOLS
  const validation = validateToolNames(tools)
  if (!validation.valid) {
    throw new Error(
      'Tool registration failed: Duplicate tool names detected:\n' +
        validation.duplicates.map((name) => `  - ${name}`).join('\n')
    )
  }

  const server = new McpServer(
    {
      name: config.name,
      version: config.version
    },
    {
      instructions: SERVER_INSTRUCTIONS
    }
  )

  const context: ToolContext = { logger: deps?.logger ?? sharedLogger }
  const registration = registerToolsBatch(server, context, tools, createLoggingStrategy(context))

  return {
    server,
    context,
    registration,
    cleanup: async () => {
      await server.close()
    }
  }
}
