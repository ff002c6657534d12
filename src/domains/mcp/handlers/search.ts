import { z } from 'zod'
import type { RAGService } from '@/domains/rag/index.js'
import type { RetrievalHit } from '@/domains/rag/core/models.js'
import type { SearchConfig } from '@/shared/config/config-factory.js'
import type { CallToolResult, Tool } from '../core/types.js'
import { errorResponse, jsonResponse } from '../core/types.js'
import { BaseToolHandler } from './base.js'

function createSearchSchema(config: SearchConfig) {
  return z.object({
    query: z.string().trim().min(1, 'Query parameter is required'),
    limit: z.number().int().min(1).max(config.maxTopK).default(config.defaultTopK),
    threshold: z.number().optional(),
    with_context: z.boolean().default(true),
    context_size: z.number().int().min(0).max(10).default(1),
    full_document: z.boolean().default(false),
  })
}

export type SearchArgs = z.infer<ReturnType<typeof createSearchSchema>>

function formatHit(hit: RetrievalHit, rank: number) {
  return {
    rank,
    document_id: hit.chunk.documentId,
    chunk_index: hit.chunk.index,
    score: hit.score,
    content: hit.chunk.text,
    start_offset: hit.chunk.startOffset,
    end_offset: hit.chunk.endOffset,
    context: hit.context?.map((chunk) => ({
      chunk_index: chunk.index,
      content: chunk.text,
      is_match: chunk.index === hit.chunk.index,
    })),
    full_document: hit.fullDocument,
  }
}

export class SearchHandler extends BaseToolHandler<SearchArgs> {
  protected readonly schema: ReturnType<typeof createSearchSchema>
  readonly definition: Tool

  constructor(
    private readonly ragService: RAGService,
    config: SearchConfig
  ) {
    super()
    this.schema = createSearchSchema(config)
    this.definition = {
      name: 'search',
      description:
        'Semantic search over the indexed documents. Use this when users ask about document content or need specific information. Returns the best matching chunks ranked by similarity, optionally with neighbouring chunks or the whole document.',
      inputSchema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'Natural language search query. Specific, descriptive queries give better results.',
          },
          limit: {
            type: 'number',
            description: `Maximum number of results to return (1-${config.maxTopK}).`,
            default: config.defaultTopK,
            minimum: 1,
            maximum: config.maxTopK,
          },
          threshold: {
            type: 'number',
            description: 'Minimum similarity score. Results scoring below it are dropped.',
          },
          with_context: {
            type: 'boolean',
            description: 'Include the chunks before and after each match.',
            default: true,
          },
          context_size: {
            type: 'number',
            description: 'How many chunks on each side of a match to include when with_context is true.',
            default: 1,
            minimum: 0,
            maximum: 10,
          },
          full_document: {
            type: 'boolean',
            description: 'Include the full text of each matching document.',
            default: false,
          },
        },
        required: ['query'],
      },
    }
  }

  protected async execute(args: SearchArgs): Promise<CallToolResult> {
    const documentCount = await this.ragService.getDocumentCount()
    if (documentCount === 0) {
      return errorResponse({
        error: 'EmptyIndex',
        message: 'No documents are indexed yet',
        suggestion: 'Index the documents first with `docs-rag index` or the index_documents tool.',
      })
    }

    const results = await this.ragService.search({
      text: args.query,
      topK: args.limit,
      threshold: args.threshold,
      withContext: args.with_context,
      contextSize: args.context_size,
      fullDocument: args.full_document,
    })

    return jsonResponse({
      query: args.query,
      results_count: results.length,
      results: results.map((hit, index) => formatHit(hit, index + 1)),
      message:
        results.length === 0
          ? `No results matched '${args.query}'`
          : `Found ${results.length} result(s) for '${args.query}'`,
    })
  }
}
