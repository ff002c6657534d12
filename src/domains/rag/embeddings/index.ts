/**
 * Embedding Factory
 */

import type { Embedder } from '@/domains/rag/core/interfaces.js'
import type { EmbeddingConfig } from '@/shared/config/config-factory.js'
import { logger } from '@/shared/logger/index.js'
import { OllamaEmbeddings } from './ollama.js'
import { LangChainEmbedder } from './adapter.js'
import { ResilientEmbedder } from './resilient.js'

export { OllamaEmbeddings } from './ollama.js'
export { LangChainEmbedder } from './adapter.js'
export { ResilientEmbedder } from './resilient.js'
export type { ResilienceOptions } from './resilient.js'

/**
 * Provider -> LangChain adapter -> timeout/retry/circuit breaker
 */
export function createEmbedder(config: EmbeddingConfig): Embedder {
  logger.info(`🏭 Creating embedding service: ${config.provider}`, { model: config.model })

  const embeddings = new OllamaEmbeddings({
    baseUrl: config.ollamaBaseUrl,
    model: config.model,
    healthCheckTimeoutMs: config.timeoutMs,
  })

  const embedder = new LangChainEmbedder(embeddings, {
    modelId: config.model,
    dimensions: config.dimensions,
    maxInputLength: config.maxInputLength,
    overflow: config.overflow,
    healthCheck: () => embeddings.healthCheck(),
  })

  return new ResilientEmbedder(embedder, {
    timeoutMs: config.timeoutMs,
    retries: config.retries,
    retryMinTimeoutMs: config.retryMinTimeoutMs,
    breakerThreshold: config.breakerThreshold,
    breakerResetMs: config.breakerResetMs,
  })
}
