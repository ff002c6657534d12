import type { Embedder, VectorStore } from '@/domains/rag/core/interfaces.js'
import type { Document, EmbeddedChunk, IndexFailure, IndexOptions, IndexSummary } from '@/domains/rag/core/models.js'
import { chunkId } from '@/domains/rag/core/models.js'
import type { ChunkingService } from '@/domains/rag/services/chunking.js'
import type { DocumentLoader, LoadOutcome } from '@/domains/rag/services/document/loader.js'
import { CancellationError, ErrorUtils } from '@/shared/errors/index.js'
import { logger, startTiming } from '@/shared/logger/index.js'
import { runWithConcurrency } from '@/shared/utils/concurrency.js'
import { throwIfAborted } from '@/shared/utils/resilience.js'

export interface IndexerDependencies {
  loader: DocumentLoader
  chunker: ChunkingService
  embedder: Embedder
  store: VectorStore
  concurrency?: number
}

type DocumentResult = { skipped: true } | { skipped: false; chunksWritten: number; chunksDeleted: number }

/**
 * Indexer
 * Drives every source document through chunking, embedding and an atomic store commit.
 * Unchanged documents are skipped; one document's failure never stops the run.
 */
export class Indexer {
  private readonly loader: DocumentLoader
  private readonly chunker: ChunkingService
  private readonly embedder: Embedder
  private readonly store: VectorStore
  private readonly defaultConcurrency: number

  constructor(deps: IndexerDependencies) {
    this.loader = deps.loader
    this.chunker = deps.chunker
    this.embedder = deps.embedder
    this.store = deps.store
    this.defaultConcurrency = deps.concurrency ?? 2
  }

  async index(options: IndexOptions): Promise<IndexSummary> {
    const { sourceRoot, incremental = true, signal } = options
    const concurrency = options.concurrency ?? this.defaultConcurrency
    const endTiming = startTiming('index', { component: 'Indexer', sourceRoot })
    const startedAt = Date.now()

    const summary: IndexSummary = {
      documentsIndexed: 0,
      documentsSkipped: 0,
      documentsFailed: 0,
      chunksWritten: 0,
      chunksDeleted: 0,
      failures: [],
      missing: [],
      aborted: false,
      durationMs: 0,
    }
    const seen = new Set<string>()

    const recordFailure = (failure: IndexFailure) => {
      summary.documentsFailed++
      summary.failures.push(failure)
    }

    logger.info('🚀 Starting index run', {
      component: 'Indexer',
      sourceRoot,
      incremental,
      concurrency,
      embeddingModel: this.embedder.modelId,
    })

    const processOutcome = async (outcome: LoadOutcome): Promise<void> => {
      // pulled from the loader after an abort; left for the next run
      if (signal?.aborted) return

      if (!outcome.ok) {
        seen.add(outcome.error.documentId)
        recordFailure({
          documentId: outcome.error.documentId,
          code: outcome.error.code,
          message: outcome.error.message,
        })
        return
      }

      const document = outcome.document
      seen.add(document.id)

      try {
        const result = await this.indexDocument(document, incremental, signal)
        if (result.skipped) {
          summary.documentsSkipped++
          return
        }
        summary.documentsIndexed++
        summary.chunksWritten += result.chunksWritten
        summary.chunksDeleted += result.chunksDeleted
      } catch (error) {
        if (error instanceof CancellationError && signal?.aborted) {
          logger.debug('Document abandoned after abort', { component: 'Indexer', documentId: document.id })
          return
        }
        logger.error(`❌ Failed to index ${document.id}`, error, { component: 'Indexer', documentId: document.id })
        recordFailure({
          documentId: document.id,
          code: ErrorUtils.codeOf(error),
          message: ErrorUtils.message(error),
        })
      }
    }

    try {
      await runWithConcurrency(this.loader.load(sourceRoot, signal), concurrency, processOutcome, signal)

      summary.aborted = signal?.aborted ?? false
      // an interrupted scan cannot tell which documents are gone
      if (!summary.aborted) {
        const records = await this.store.listDocuments()
        summary.missing = records.map((record) => record.id).filter((id) => !seen.has(id))
      }
    } finally {
      summary.durationMs = Date.now() - startedAt
      endTiming()
    }

    logger.info(summary.aborted ? '⏹️ Index run aborted' : '✅ Index run completed', {
      component: 'Indexer',
      sourceRoot,
      documentsIndexed: summary.documentsIndexed,
      documentsSkipped: summary.documentsSkipped,
      documentsFailed: summary.documentsFailed,
      chunksWritten: summary.chunksWritten,
      chunksDeleted: summary.chunksDeleted,
      missing: summary.missing.length,
      durationMs: summary.durationMs,
    })

    return summary
  }

  /**
   * Indexes one document. Throws on failure; the store keeps the previous commit.
   */
  async indexDocument(document: Document, incremental: boolean, signal?: AbortSignal): Promise<DocumentResult> {
    throwIfAborted(signal, 'index')
    const modelId = this.embedder.modelId
    const record = await this.store.getDocument(document.id)

    if (
      incremental &&
      record !== null &&
      record.status === 'processed' &&
      record.contentHash === document.contentHash &&
      record.embeddingModel === modelId
    ) {
      logger.debug('Document unchanged, skipping', { component: 'Indexer', documentId: document.id })
      return { skipped: true }
    }

    // Previously committed chunks stay searchable until the new commit lands
    await this.store.markDocumentStatus(document.id, record?.contentHash ? 'stale' : 'unprocessed')

    const chunks = this.chunker.chunkText(document.id, document.content)
    const embedded: EmbeddedChunk[] = []
    for (const chunk of chunks) {
      throwIfAborted(signal, 'index')
      const vector = await this.embedder.embed(chunk.text, signal)
      embedded.push({ ...chunk, id: chunkId(document.id, chunk.index), vector, embeddingModel: modelId })
    }

    throwIfAborted(signal, 'index')
    const result = await this.store.replaceDocument({
      documentId: document.id,
      contentHash: document.contentHash,
      modifiedAt: document.modifiedAt,
      embeddingModel: modelId,
      chunks: embedded,
    })

    logger.debug('Document indexed', {
      component: 'Indexer',
      documentId: document.id,
      chunksWritten: result.chunksWritten,
      chunksDeleted: result.chunksDeleted,
    })

    return { skipped: false, ...result }
  }
}
