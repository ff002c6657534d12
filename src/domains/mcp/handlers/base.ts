import { z } from 'zod'
import type { ToolHandler } from '../core/interfaces.js'
import type { CallToolResult, Tool } from '../core/types.js'
import { errorResponse } from '../core/types.js'
import { ErrorCode, ErrorUtils, StructuredError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

const SUGGESTIONS: Partial<Record<ErrorCode, { error: string; suggestion: string }>> = {
  [ErrorCode.VALIDATION_ERROR]: {
    error: 'InvalidArguments',
    suggestion: 'Check the tool input schema with list_tools and retry with valid arguments.',
  },
  [ErrorCode.CONFIG_MISMATCH]: {
    error: 'ConfigMismatch',
    suggestion: 'The index was built with a different embedding model. Re-index with `docs-rag index --full`.',
  },
  [ErrorCode.INITIALIZATION_ERROR]: {
    error: 'ServiceNotReady',
    suggestion: 'The server is still starting up. Wait a few seconds and try again.',
  },
  [ErrorCode.CIRCUIT_OPEN]: {
    error: 'EmbeddingUnavailable',
    suggestion: 'The embedding server keeps failing. Check that Ollama is running and the model is pulled.',
  },
  [ErrorCode.EMBEDDING_ERROR]: {
    error: 'EmbeddingFailed',
    suggestion: 'Check that the embedding server is reachable and the configured model exists.',
  },
  [ErrorCode.TIMEOUT_ERROR]: {
    error: 'Timeout',
    suggestion: 'The embedding server did not answer in time. Retry, or raise EMBEDDING_TIMEOUT_MS.',
  },
}

/**
 * Validates raw arguments with a zod schema and turns thrown errors into MCP error responses
 */
export abstract class BaseToolHandler<TArgs> implements ToolHandler {
  abstract readonly definition: Tool
  protected abstract readonly schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>

  protected abstract execute(args: TArgs): Promise<CallToolResult>

  async handle(args: unknown): Promise<CallToolResult> {
    const parsed = this.schema.safeParse(args ?? {})
    if (!parsed.success) {
      return errorResponse({
        error: 'InvalidArguments',
        message: parsed.error.issues
          .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; '),
        suggestion: SUGGESTIONS[ErrorCode.VALIDATION_ERROR]?.suggestion,
      })
    }

    try {
      return await this.execute(parsed.data)
    } catch (error) {
      return this.failure(error)
    }
  }

  protected failure(error: unknown): CallToolResult {
    const code = ErrorUtils.codeOf(error)
    const known = SUGGESTIONS[code]
    if (!known) {
      logger.error(`Tool ${this.definition.name} failed`, error, { component: 'MCP', toolName: this.definition.name })
    }

    return errorResponse({
      error: known?.error ?? 'ToolExecutionFailed',
      message: ErrorUtils.message(error),
      code: error instanceof StructuredError ? error.code : undefined,
      toolName: this.definition.name,
      suggestion: known?.suggestion,
    })
  }
}
