import type { RAGService } from '@/domains/rag/index.js'
import type { CallToolResult, Tool } from './types.js'

/**
 * One MCP tool: its advertised definition plus the handler for raw call arguments
 */
export interface ToolHandler {
  readonly definition: Tool
  handle(args: unknown): Promise<CallToolResult>
}

/**
 * Builds extra tools at startup; they are registered after the built-in ones
 */
export type ToolFactory = (ragService: RAGService) => ToolHandler[]
