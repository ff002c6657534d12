/**
 * RAG Service - RAG Domain Facade
 * Owns the indexing pipeline and the retriever behind one lifecycle
 */

import { logger } from '@/shared/logger/index.js'
import { ErrorCode, ErrorUtils, StructuredError } from '@/shared/errors/index.js'
import type { ServerConfig } from '@/shared/config/config-factory.js'
import type { Embedder, FileSource, VectorStore } from './core/interfaces.js'
import type { DocumentRecord, IndexOptions, IndexSummary, QueryOptions, RetrievalResult } from './core/models.js'
import { createEmbedder } from './embeddings/index.js'
import { SqliteVectorStore } from './vectorstore/sqlite.js'
import { ChunkingService } from './services/chunking.js'
import { DocumentLoader } from './services/document/loader.js'
import { FileSystemSource } from './services/document/source.js'
import { Retriever } from './services/search.js'
import { Indexer } from './workflows/indexer.js'

/**
 * Collaborators that can be swapped in, mostly by tests. Anything omitted is built from config.
 */
export interface RAGServiceDependencies {
  embedder?: Embedder
  store?: VectorStore
  source?: FileSource
}

export interface RagInfo {
  isReady: boolean
  embeddingModel: string
  dimensions: number
  documentCount: number
  chunkCount: number
  indexedModels: string[]
}

interface Components {
  config: ServerConfig
  embedder: Embedder
  store: VectorStore
  indexer: Indexer
  retriever: Retriever
}

export class RAGService {
  private components: Components | null = null
  // index runs are serialized; two runs never race on the same document
  private indexQueue: Promise<unknown> = Promise.resolve()

  constructor(private readonly dependencies: RAGServiceDependencies = {}) {
    logger.debug('RAGService instance created (not initialized)')
  }

  async initialize(config: ServerConfig): Promise<void> {
    if (this.components) {
      logger.warn('RAGService already initialized, skipping')
      return
    }

    try {
      logger.info('🔧 Initializing RAG services...', { component: 'RAGService' })

      const embedder = this.dependencies.embedder ?? createEmbedder(config.embedding)
      if (embedder.healthCheck && !(await embedder.healthCheck())) {
        logger.warn('⚠️ Embedding server is not reachable; indexing and search will fail until it is', {
          component: 'RAGService',
          embeddingModel: embedder.modelId,
        })
      }
      const store =
        this.dependencies.store ??
        new SqliteVectorStore({
          databasePath: config.databasePath,
          dimensions: embedder.dimensions,
          metric: config.search.metric,
        })
      await store.init()

      const chunker = new ChunkingService({
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
        minChunkSize: config.minChunkSize,
      })
      const loader = new DocumentLoader(this.dependencies.source ?? new FileSystemSource())

      this.components = {
        config,
        embedder,
        store,
        indexer: new Indexer({ loader, chunker, embedder, store, concurrency: config.indexConcurrency }),
        retriever: new Retriever(embedder, store, {
          defaultTopK: config.search.defaultTopK,
          maxTopK: config.search.maxTopK,
          similarityThreshold: config.search.similarityThreshold,
          metric: config.search.metric,
        }),
      }

      logger.info('✅ RAGService fully initialized', {
        component: 'RAGService',
        embeddingModel: embedder.modelId,
        dimensions: embedder.dimensions,
      })
    } catch (error) {
      logger.error('Failed to initialize RAGService', error, { component: 'RAGService' })
      if (error instanceof StructuredError) throw error
      throw new StructuredError('RAG service initialization failed', ErrorCode.INITIALIZATION_ERROR, 'HIGH', {
        component: 'RAGService',
        originalError: ErrorUtils.message(error),
      }, ErrorUtils.toError(error))
    }
  }

  /**
   * Indexes the source root (the configured documents directory by default)
   */
  async index(options: Partial<IndexOptions> = {}): Promise<IndexSummary> {
    const { config, indexer } = this.ensureInitialized()
    const run = this.indexQueue.then(() =>
      indexer.index({
        sourceRoot: options.sourceRoot ?? config.documentsDir,
        incremental: options.incremental ?? true,
        concurrency: options.concurrency ?? config.indexConcurrency,
        signal: options.signal,
      })
    )
    this.indexQueue = run.catch(() => undefined)
    return run
  }

  async search(options: QueryOptions): Promise<RetrievalResult> {
    const { retriever } = this.ensureInitialized()

    logger.info('🔍 Performing RAG search', {
      component: 'RAGService',
      query: options.text.substring(0, 100),
      topK: options.topK,
    })

    const results = await retriever.query(options)

    logger.info('✅ RAG search completed', { component: 'RAGService', resultCount: results.length })
    return results
  }

  query(text: string, topK?: number, threshold?: number, signal?: AbortSignal): Promise<RetrievalResult> {
    return this.search({ text, topK, threshold, signal })
  }

  async getDocumentCount(): Promise<number> {
    return this.ensureInitialized().store.countDocuments()
  }

  async getChunkCount(): Promise<number> {
    return this.ensureInitialized().store.countChunks()
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return this.ensureInitialized().store.listDocuments()
  }

  /**
   * Explicit removal; the indexer never deletes documents on its own
   */
  async removeDocument(documentId: string): Promise<boolean> {
    const { store } = this.ensureInitialized()
    const removed = await store.removeDocument(documentId)
    if (removed) {
      logger.event('document_removed', { component: 'RAGService', documentId })
    } else {
      logger.info('Document not found in index', { component: 'RAGService', documentId })
    }
    return removed
  }

  async clear(): Promise<void> {
    await this.ensureInitialized().store.clear()
    logger.event('index_cleared', { component: 'RAGService' })
  }

  async getRagInfo(): Promise<RagInfo> {
    const { embedder, store } = this.ensureInitialized()
    const [documentCount, chunkCount, indexedModels] = await Promise.all([
      store.countDocuments(),
      store.countChunks(),
      store.getIndexedModels(),
    ])

    return {
      isReady: true,
      embeddingModel: embedder.modelId,
      dimensions: embedder.dimensions,
      documentCount,
      chunkCount,
      indexedModels,
    }
  }

  isReady(): boolean {
    return this.components !== null
  }

  async shutdown(): Promise<void> {
    const components = this.components
    if (!components) {
      logger.debug('RAGService not initialized, nothing to shutdown')
      return
    }

    logger.info('🛑 Shutting down RAG services...', { component: 'RAGService' })
    this.components = null
    await this.indexQueue
    await components.embedder.close?.()
    await components.store.close()
    logger.info('✅ RAG services shutdown completed', { component: 'RAGService' })
  }

  private ensureInitialized(): Components {
    if (!this.components) {
      throw new StructuredError('RAGService not initialized. Call initialize() first.', ErrorCode.INITIALIZATION_ERROR)
    }
    return this.components
  }
}
