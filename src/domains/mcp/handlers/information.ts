import { z } from 'zod'
import type { RAGService } from '@/domains/rag/index.js'
import type { CallToolResult, Tool } from '../core/types.js'
import { jsonResponse } from '../core/types.js'
import { BaseToolHandler } from './base.js'

const documentCountSchema = z.object({}).strip()

type DocumentCountArgs = z.infer<typeof documentCountSchema>

export class InformationHandler extends BaseToolHandler<DocumentCountArgs> {
  protected readonly schema = documentCountSchema
  readonly definition: Tool = {
    name: 'get_document_count',
    description: 'Number of documents and chunks in the search index, and the embedding model that built it.',
    inputSchema: { type: 'object', properties: {} },
  }

  constructor(private readonly ragService: RAGService) {
    super()
  }

  protected async execute(): Promise<CallToolResult> {
    const info = await this.ragService.getRagInfo()
    return jsonResponse({
      count: info.documentCount,
      chunk_count: info.chunkCount,
      embedding_model: info.embeddingModel,
      indexed_models: info.indexedModels,
      message: `Documents in index: ${info.documentCount}`,
    })
  }
}
