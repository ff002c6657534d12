/**
 * MCP Domain - tool registry, handlers and server
 */

import type { RAGService } from '@/domains/rag/index.js'
import type { SearchConfig } from '@/shared/config/config-factory.js'
import type { ToolFactory } from './core/interfaces.js'
import { ToolRegistry } from './core/registry.js'
import { SearchHandler } from './handlers/search.js'
import { InformationHandler } from './handlers/information.js'
import { IndexHandler } from './handlers/index-documents.js'
import { DocumentHandler } from './handlers/document.js'

export { ToolRegistry } from './core/registry.js'
export { MCPServer } from './server/server.js'
export type { ToolFactory, ToolHandler } from './core/interfaces.js'
export type { MCPServerConfig } from './core/types.js'
export { BaseToolHandler } from './handlers/base.js'
export { SearchHandler, InformationHandler, IndexHandler, DocumentHandler }

/**
 * Registry with the built-in tools, followed by whatever the factories add.
 * A name clash with an already registered tool throws.
 */
export function createToolRegistry(
  ragService: RAGService,
  search: SearchConfig,
  extraTools: readonly ToolFactory[] = []
): ToolRegistry {
  const registry = new ToolRegistry()
    .register(new SearchHandler(ragService, search))
    .register(new InformationHandler(ragService))
    .register(new IndexHandler(ragService))
    .register(new DocumentHandler(ragService))

  for (const factory of extraTools) {
    for (const handler of factory(ragService)) {
      registry.register(handler)
    }
  }
  return registry
}
