/**
 * Docs RAG Application
 * Composition root: config -> RAG service -> MCP tools -> MCP server
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import { ConfigFactory, type ServerConfig } from '@/shared/config/config-factory.js'
import { logger } from '@/shared/logger/index.js'
import { RAGService, type RAGServiceDependencies } from '@/domains/rag/index.js'
import { createToolRegistry, MCPServer, type ToolFactory, type ToolRegistry } from '@/domains/mcp/index.js'

export interface ApplicationOptions {
  /** Extra tools registered after the built-in ones during initialize() */
  extraTools?: ToolFactory[]
}

export class DocsRagApplication {
  readonly ragService: RAGService
  private registry: ToolRegistry | null = null
  private mcpServer: MCPServer | null = null
  private readonly extraTools: ToolFactory[]

  constructor(
    readonly config: ServerConfig,
    dependencies: RAGServiceDependencies = {},
    options: ApplicationOptions = {}
  ) {
    this.ragService = new RAGService(dependencies)
    this.extraTools = options.extraTools ?? []
  }

  async initialize(): Promise<void> {
    if (this.registry) return

    ConfigFactory.validateConfig(this.config)
    logger.setLevel(this.config.logLevel)
    await this.ragService.initialize(this.config)
    this.registry = createToolRegistry(this.ragService, this.config.search, this.extraTools)

    logger.info('✅ Application initialized', {
      component: 'Application',
      tools: this.registry.getToolNames(),
      documentsDir: this.config.documentsDir,
    })
  }

  getToolRegistry(): ToolRegistry {
    if (!this.registry) {
      throw new Error('Application not initialized. Call initialize() first.')
    }
    return this.registry
  }

  /**
   * Serves the tools over MCP; stdio unless a transport is given
   */
  async serve(transport?: Transport): Promise<void> {
    await this.initialize()
    const server = new MCPServer(this.getToolRegistry(), {
      name: this.config.mcp.name,
      version: this.config.mcp.version,
    })
    await server.start(transport)
    this.mcpServer = server
  }

  async shutdown(): Promise<void> {
    const server = this.mcpServer
    this.mcpServer = null
    try {
      if (server) await server.shutdown()
    } finally {
      this.registry = null
      await this.ragService.shutdown()
    }
  }
}
