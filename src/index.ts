/**
 * docs-rag-server public API
 */

export { DocsRagApplication } from './app/application.js'
export * from './domains/rag/index.js'
export {
  ToolRegistry,
  MCPServer,
  BaseToolHandler,
  SearchHandler,
  InformationHandler,
  IndexHandler,
  DocumentHandler,
  createToolRegistry,
} from './domains/mcp/index.js'
export type { ToolHandler, MCPServerConfig } from './domains/mcp/index.js'
export { ConfigFactory } from './shared/config/config-factory.js'
export type {
  ServerConfig,
  ChunkingConfig,
  EmbeddingConfig,
  SearchConfig,
  SimilarityMetric,
} from './shared/config/config-factory.js'
export * from './shared/errors/index.js'
export { logger } from './shared/logger/index.js'
