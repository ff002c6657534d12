import { z } from 'zod'
import type { RAGService } from '@/domains/rag/index.js'
import type { CallToolResult, Tool } from '../core/types.js'
import { errorResponse, jsonResponse } from '../core/types.js'
import { BaseToolHandler } from './base.js'

const removeSchema = z.object({
  document_id: z.string().trim().min(1, 'document_id is required'),
})

type RemoveArgs = z.infer<typeof removeSchema>

export class DocumentHandler extends BaseToolHandler<RemoveArgs> {
  protected readonly schema = removeSchema
  readonly definition: Tool = {
    name: 'remove_document',
    description: 'Remove a document and all of its chunks from the search index. The source file is not touched.',
    inputSchema: {
      type: 'object',
      properties: {
        document_id: {
          type: 'string',
          description: 'Document id: the path relative to the documents directory, e.g. "guides/setup.md".',
        },
      },
      required: ['document_id'],
    },
  }

  constructor(private readonly ragService: RAGService) {
    super()
  }

  protected async execute(args: RemoveArgs): Promise<CallToolResult> {
    const removed = await this.ragService.removeDocument(args.document_id)
    if (!removed) {
      return errorResponse({
        error: 'DocumentNotFound',
        message: `Document '${args.document_id}' is not in the index`,
        suggestion: 'Use get_document_count to inspect the index, or check the id is relative to the documents directory.',
      })
    }

    return jsonResponse({
      removed: true,
      document_id: args.document_id,
      message: `Removed '${args.document_id}' from the index`,
    })
  }
}
