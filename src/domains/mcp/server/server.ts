import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js'
import type { ToolRegistry } from '../core/registry.js'
import type { MCPServerConfig } from '../core/types.js'
import { logger } from '@/shared/logger/index.js'

export class MCPServer {
  private readonly server: Server

  constructor(
    private readonly registry: ToolRegistry,
    config: MCPServerConfig
  ) {
    this.server = new Server(
      { name: config.name, version: config.version },
      { capabilities: { tools: {} } }
    )

    this.setupTools()
  }

  private setupTools(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.registry.getTools(),
    }))

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params
      logger.debug('Tool call received', { component: 'MCPServer', toolName: name })
      return this.registry.call(name, args)
    })
  }

  /**
   * Connects to the given transport, stdio by default
   */
  async start(transport: Transport = new StdioServerTransport()): Promise<void> {
    logger.info('🔗 Starting MCP server...', { component: 'MCPServer', tools: this.registry.getToolNames() })
    await this.server.connect(transport)
    logger.info('🎯 MCP Server started and ready for connections', { component: 'MCPServer' })
  }

  async shutdown(): Promise<void> {
    logger.info('🔄 Shutting down MCP Server...', { component: 'MCPServer' })
    await this.server.close()
    logger.info('✅ MCP Server shutdown completed successfully', { component: 'MCPServer' })
  }
}
