import type { ToolHandler } from './interfaces.js'
import type { CallToolResult, Tool } from './types.js'
import { errorResponse } from './types.js'
import { logger } from '@/shared/logger/index.js'

/**
 * Tool name -> handler, filled once at startup
 */
export class ToolRegistry {
  private readonly handlers = new Map<string, ToolHandler>()

  register(handler: ToolHandler): this {
    const name = handler.definition.name
    if (this.handlers.has(name)) {
      throw new Error(`Tool '${name}' is already registered`)
    }
    this.handlers.set(name, handler)
    logger.debug('Tool registered', { component: 'ToolRegistry', toolName: name })
    return this
  }

  has(name: string): boolean {
    return this.handlers.has(name)
  }

  getTools(): Tool[] {
    return Array.from(this.handlers.values(), (handler) => handler.definition)
  }

  getToolNames(): string[] {
    return Array.from(this.handlers.keys())
  }

  async call(name: string, args: unknown): Promise<CallToolResult> {
    const handler = this.handlers.get(name)
    if (!handler) {
      logger.warn('Unknown tool requested', {
        component: 'ToolRegistry',
        toolName: name,
        availableTools: this.getToolNames(),
      })
      return errorResponse({
        error: 'UnknownTool',
        message: `Tool '${name}' is not available`,
        availableTools: this.getToolNames(),
        suggestion: 'Use list_tools to see all available tools',
      })
    }

    return handler.handle(args)
  }
}
