/**
 * Embedding Adapter
 * Connects a LangChain Embeddings implementation to the Embedder contract
 */

import type { Embeddings } from '@langchain/core/embeddings'
import type { Embedder } from '@/domains/rag/core/interfaces.js'
import type { EmbeddingOverflow } from '@/shared/config/config-factory.js'
import { EmbeddingError, ErrorUtils, StructuredError, ValidationError } from '@/shared/errors/index.js'
import { abortable, throwIfAborted } from '@/shared/utils/resilience.js'
import { logger } from '@/shared/logger/index.js'

export interface EmbedderModelInfo {
  modelId: string
  dimensions: number
  maxInputLength: number
  overflow?: EmbeddingOverflow
  healthCheck?: () => Promise<boolean>
}

export class LangChainEmbedder implements Embedder {
  readonly modelId: string
  readonly dimensions: number
  readonly maxInputLength: number
  private readonly overflow: EmbeddingOverflow
  private readonly ping: (() => Promise<boolean>) | undefined

  constructor(
    private readonly embeddings: Embeddings,
    info: EmbedderModelInfo
  ) {
    this.modelId = info.modelId
    this.dimensions = info.dimensions
    this.maxInputLength = info.maxInputLength
    this.overflow = info.overflow ?? 'truncate'
    this.ping = info.healthCheck
  }

  async healthCheck(): Promise<boolean> {
    return this.ping ? this.ping() : true
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    throwIfAborted(signal, 'embed')
    const input = this.fitInput(text)

    let vector: number[]
    try {
      vector = await abortable(this.embeddings.embedQuery(input), signal, 'embed')
    } catch (error) {
      if (error instanceof StructuredError) throw error
      throw new EmbeddingError(
        `Embedding failed for model ${this.modelId}: ${ErrorUtils.message(error)}`,
        this.modelId,
        ErrorUtils.toError(error)
      )
    }

    return this.checkVector(vector)
  }

  private fitInput(text: string): string {
    if (text.length <= this.maxInputLength) return text

    if (this.overflow === 'reject') {
      throw new ValidationError(
        `Input of ${text.length} characters exceeds the model limit of ${this.maxInputLength}`,
        'text',
        { model: this.modelId, length: text.length, maxInputLength: this.maxInputLength }
      )
    }

    logger.debug('Truncating embedding input', {
      component: 'LangChainEmbedder',
      length: text.length,
      maxInputLength: this.maxInputLength,
    })
    return text.slice(0, this.maxInputLength)
  }

  private checkVector(vector: number[]): number[] {
    if (vector.length !== this.dimensions) {
      throw new ValidationError(
        `Model ${this.modelId} returned ${vector.length} dimensions, expected ${this.dimensions}`,
        'vector',
        { model: this.modelId, expected: this.dimensions, actual: vector.length }
      )
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new ValidationError(`Model ${this.modelId} returned a non-finite vector component`, 'vector', {
        model: this.modelId,
      })
    }
    return vector
  }
}
