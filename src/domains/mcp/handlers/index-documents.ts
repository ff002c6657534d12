import { z } from 'zod'
import type { RAGService } from '@/domains/rag/index.js'
import type { CallToolResult, Tool } from '../core/types.js'
import { jsonResponse } from '../core/types.js'
import { BaseToolHandler } from './base.js'

const indexSchema = z.object({
  source_dir: z.string().trim().min(1).optional(),
  full: z.boolean().default(false),
})

type IndexArgs = z.infer<typeof indexSchema>

export class IndexHandler extends BaseToolHandler<IndexArgs> {
  protected readonly schema = indexSchema
  readonly definition: Tool = {
    name: 'index_documents',
    description:
      'Index the documents directory. Unchanged documents are skipped unless full is true. Returns counts of indexed, skipped and failed documents.',
    inputSchema: {
      type: 'object',
      properties: {
        source_dir: {
          type: 'string',
          description: 'Directory to index. Defaults to the configured documents directory.',
        },
        full: {
          type: 'boolean',
          description: 'Re-index every document even when its content is unchanged.',
          default: false,
        },
      },
    },
  }

  constructor(private readonly ragService: RAGService) {
    super()
  }

  protected async execute(args: IndexArgs): Promise<CallToolResult> {
    const summary = await this.ragService.index({ sourceRoot: args.source_dir, incremental: !args.full })

    return jsonResponse({
      documents_indexed: summary.documentsIndexed,
      documents_skipped: summary.documentsSkipped,
      documents_failed: summary.documentsFailed,
      chunks_written: summary.chunksWritten,
      chunks_deleted: summary.chunksDeleted,
      failures: summary.failures.map((failure) => ({
        document_id: failure.documentId,
        code: failure.code,
        message: failure.message,
      })),
      missing: summary.missing,
      aborted: summary.aborted,
      duration_ms: summary.durationMs,
      message: `Indexed ${summary.documentsIndexed} document(s), skipped ${summary.documentsSkipped}, failed ${summary.documentsFailed}`,
    })
  }
}
