/**
 * Retriever
 * Embeds a query with the indexing model and ranks stored chunks by similarity
 */

import type { Embedder, NearestNeighborQuery, VectorStore } from '@/domains/rag/core/interfaces.js'
import type { EmbeddedChunk, QueryOptions, RetrievalHit, RetrievalResult } from '@/domains/rag/core/models.js'
import type { SimilarityMetric } from '@/shared/config/config-factory.js'
import { ConfigMismatchError, ValidationError } from '@/shared/errors/index.js'
import { logger, startTiming } from '@/shared/logger/index.js'
import { throwIfAborted } from '@/shared/utils/resilience.js'
import { reconstructText } from './chunking.js'

export interface RetrieverOptions {
  defaultTopK?: number
  maxTopK?: number
  similarityThreshold?: number
  metric?: SimilarityMetric
}

export class Retriever {
  private readonly defaultTopK: number
  private readonly maxTopK: number
  private readonly defaultThreshold: number | undefined
  private readonly metric: SimilarityMetric

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    options: RetrieverOptions = {}
  ) {
    this.defaultTopK = options.defaultTopK ?? 5
    this.maxTopK = options.maxTopK ?? 50
    this.defaultThreshold = options.similarityThreshold
    this.metric = options.metric ?? 'cosine'
  }

  async query(options: QueryOptions): Promise<RetrievalResult> {
    const { text, signal, withContext = false, fullDocument = false } = options
    const topK = options.topK ?? this.defaultTopK
    const threshold = options.threshold ?? this.defaultThreshold
    const contextSize = options.contextSize ?? 1

    this.validate(text, topK, threshold, contextSize)
    throwIfAborted(signal, 'query')

    const endTiming = startTiming('query', { component: 'Retriever', topK })
    try {
      const models = await this.store.getIndexedModels()
      if (models.length === 0) {
        logger.debug('Query against an empty index', { component: 'Retriever' })
        return []
      }

      const foreign = models.filter((model) => model !== this.embedder.modelId)
      if (foreign.length > 0) {
        throw new ConfigMismatchError(
          `Index contains vectors from ${foreign.join(', ')}; query model is ${this.embedder.modelId}. Re-index with the current model.`,
          { queryModel: this.embedder.modelId, indexedModels: models }
        )
      }

      const vector = await this.embedder.embed(text, signal)
      throwIfAborted(signal, 'query')

      const neighborQuery: NearestNeighborQuery = {
        vector,
        k: topK,
        embeddingModel: this.embedder.modelId,
        threshold,
      }

      let results: RetrievalHit[]
      if (withContext || fullDocument) {
        const { hits, documents } = await this.store.nearestNeighborhood(neighborQuery)
        results = hits.map((hit) =>
          this.expand(hit, documents.get(hit.chunk.documentId) ?? [], withContext, contextSize, fullDocument)
        )
      } else {
        results = await this.store.nearestNeighbors(neighborQuery)
      }
      throwIfAborted(signal, 'query')

      logger.debug('Query completed', { component: 'Retriever', resultCount: results.length })
      return results
    } finally {
      endTiming()
    }
  }

  private validate(text: string, topK: number, threshold: number | undefined, contextSize: number): void {
    if (text.trim().length === 0) {
      throw new ValidationError('Query text must not be empty', 'text')
    }
    if (!Number.isInteger(topK) || topK < 1 || topK > this.maxTopK) {
      throw new ValidationError(`topK must be an integer between 1 and ${this.maxTopK}, got ${topK}`, 'topK')
    }
    if (threshold !== undefined) {
      if (!Number.isFinite(threshold)) {
        throw new ValidationError(`threshold must be a finite number, got ${threshold}`, 'threshold')
      }
      if (this.metric === 'cosine' && (threshold < -1 || threshold > 1)) {
        throw new ValidationError(`threshold must be between -1 and 1 for cosine similarity, got ${threshold}`, 'threshold')
      }
    }
    if (!Number.isInteger(contextSize) || contextSize < 0) {
      throw new ValidationError(`contextSize must be a non-negative integer, got ${contextSize}`, 'contextSize')
    }
  }

  private expand(
    hit: RetrievalHit,
    chunks: EmbeddedChunk[],
    withContext: boolean,
    contextSize: number,
    fullDocument: boolean
  ): RetrievalHit {
    const result: RetrievalHit = { ...hit }
    if (withContext) {
      result.context = chunks.filter((chunk) => Math.abs(chunk.index - hit.chunk.index) <= contextSize)
    }
    if (fullDocument) {
      result.fullDocument = reconstructText(chunks)
    }
    return result
  }
}
