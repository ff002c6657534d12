/**
 * Resilient Embedder
 * Decorates an Embedder with a per-call timeout, retry with exponential backoff
 * and a circuit breaker that fails fast while the model server is down.
 */

import type CircuitBreaker from 'opossum'
import type { Embedder } from '@/domains/rag/core/interfaces.js'
import { EmbeddingError, ErrorCode, ErrorUtils } from '@/shared/errors/index.js'
import { createCircuitBreaker, isCircuitOpenError, withRetry, withTimeout } from '@/shared/utils/resilience.js'

export interface ResilienceOptions {
  timeoutMs: number
  retries: number
  retryMinTimeoutMs: number
  breakerThreshold: number
  breakerResetMs: number
}

export class ResilientEmbedder implements Embedder {
  private readonly breaker: CircuitBreaker<[string, AbortSignal | undefined], number[]>

  constructor(
    private readonly inner: Embedder,
    private readonly options: ResilienceOptions
  ) {
    this.breaker = createCircuitBreaker(
      `embedding:${inner.modelId}`,
      (text: string, signal: AbortSignal | undefined) =>
        withTimeout(inner.embed(text, signal), {
          timeoutMs: options.timeoutMs,
          operation: 'embed',
          abortSignal: signal,
        }),
      {
        volumeThreshold: options.breakerThreshold,
        resetTimeout: options.breakerResetMs,
        // validation failures and cancellations say nothing about the model server's health
        errorFilter: (error) => !ErrorUtils.isRetryable(error),
      }
    )
  }

  get modelId(): string {
    return this.inner.modelId
  }

  get dimensions(): number {
    return this.inner.dimensions
  }

  get maxInputLength(): number {
    return this.inner.maxInputLength
  }

  get isCircuitOpen(): boolean {
    return this.breaker.opened
  }

  embed(text: string, signal?: AbortSignal): Promise<number[]> {
    return withRetry(
      async () => {
        try {
          return await this.breaker.fire(text, signal)
        } catch (error) {
          if (isCircuitOpenError(error)) {
            throw new EmbeddingError(
              `Embedding model ${this.modelId} is unavailable (circuit open)`,
              this.modelId,
              ErrorUtils.toError(error),
              { code: ErrorCode.CIRCUIT_OPEN, retryable: false }
            )
          }
          throw error
        }
      },
      `embed:${this.modelId}`,
      { retries: this.options.retries, minTimeout: this.options.retryMinTimeoutMs, signal }
    )
  }

  async healthCheck(): Promise<boolean> {
    return this.inner.healthCheck ? this.inner.healthCheck() : true
  }

  async close(): Promise<void> {
    this.breaker.shutdown()
    await this.inner.close?.()
  }
}
