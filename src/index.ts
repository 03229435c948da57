#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import packageJson from '../package.json' with { type: 'json' }
import { getToolStatsByCategory } from './registry/tool-registry.js'
import { ALL_TOOLS } from './registry/tool-definitions.js'
import { createStyleMcpServer, type ServerConfig, type ServerInstance } from './server.js'
import { sharedLogger } from './utils/shared-logger.js'

const config: ServerConfig = {
  name: 'qml-style-mcp-server',
  version: packageJson.version
}

let serverInstance: ServerInstance | null = null

async function main(): Promise<void> {
  serverInstance = createStyleMcpServer(config)

  const { registration } = serverInstance
  if (registration.failed > 0) {
    const failedTools = registration.results
      .filter((r) => !r.success)
      .map((r) => `${r.toolName}: ${r.error?.message}`)
    throw new Error(`Some tools failed to register:\n  ${failedTools.join('\n  ')}`)
  }

  await serverInstance.server.connect(new StdioServerTransport())

  sharedLogger.info('Server ready', {
    name: config.name,
    version: config.version,
    transport: 'stdio',
    tools: Object.fromEntries(getToolStatsByCategory(ALL_TOOLS))
  })
}

function setupSignalHandlers(): void {
  const shutdown = async (signal: string) => {
    sharedLogger.info('Shutting down', { signal })

    if (serverInstance) {
      await serverInstance.cleanup()
    }

    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

setupSignalHandlers()

main().catch((error: unknown) => {
  sharedLogger.error(
    'Fatal error',
    {},
    error instanceof Error ? error : new Error(String(error))
  )
  process.exit(1)
})
