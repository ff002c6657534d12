import { Embeddings } from '@langchain/core/embeddings'
import fetch from 'node-fetch'
import { EmbeddingError, ErrorCode, ErrorUtils, StructuredError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

export interface OllamaEmbeddingsParams {
  baseUrl: string
  model: string
  keepAlive?: string
  healthCheckTimeoutMs?: number
}

/**
 * LangChain-compatible Ollama embeddings
 * Talks to a local Ollama server's /api/embeddings endpoint, one text per request.
 */
export class OllamaEmbeddings extends Embeddings {
  private readonly baseUrl: string
  private readonly model: string
  private readonly keepAlive: string
  private readonly healthCheckTimeoutMs: number

  constructor(params: OllamaEmbeddingsParams) {
    super({})
    this.baseUrl = params.baseUrl.replace(/\/+$/, '')
    this.model = params.model
    this.keepAlive = params.keepAlive ?? '1m'
    this.healthCheckTimeoutMs = params.healthCheckTimeoutMs ?? 5000
  }

  async embedQuery(text: string): Promise<number[]> {
    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: text,
        keep_alive: this.keepAlive,
        options: { temperature: 0 },
      }),
    }).catch((error: unknown) => {
      throw new EmbeddingError(
        `Ollama request failed: ${ErrorUtils.message(error)}`,
        this.model,
        ErrorUtils.toError(error),
        { code: ErrorCode.CONNECTION_ERROR }
      )
    })

    if (!response.ok) {
      throw this.httpError(response.status, response.statusText)
    }

    const data: unknown = await response.json()
    const embedding = OllamaEmbeddings.extractEmbedding(data)
    if (!embedding) {
      throw new EmbeddingError('Invalid embedding data received from Ollama', this.model, undefined, {
        retryable: false,
      })
    }

    return embedding
  }

  /**
   * Ollama has no batch endpoint; documents are embedded one after another
   */
  async embedDocuments(documents: string[]): Promise<number[][]> {
    const embeddings: number[][] = []
    for (const document of documents) {
      embeddings.push(await this.embedQuery(document))
    }
    return embeddings
  }

  /**
   * True when the server answers /api/tags
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { method: 'GET', timeout: this.healthCheckTimeoutMs })
      return response.ok
    } catch (error) {
      logger.warn('Ollama health check failed', { baseUrl: this.baseUrl, error: ErrorUtils.message(error) })
      return false
    }
  }

  private httpError(status: number, statusText: string): StructuredError {
    const message = `Ollama API error: ${status} ${statusText}`
    if (status === 429) {
      return new EmbeddingError(message, this.model, undefined, { code: ErrorCode.RATE_LIMIT_ERROR })
    }
    if (status >= 500) {
      return new EmbeddingError(message, this.model, undefined, { code: ErrorCode.SERVICE_UNAVAILABLE })
    }
    // 4xx other than 429 (unknown model, bad request) will not succeed on retry
    return new EmbeddingError(message, this.model, undefined, { retryable: false })
  }

  private static extractEmbedding(data: unknown): number[] | null {
    if (typeof data !== 'object' || data === null || !('embedding' in data)) return null
    const { embedding } = data
    if (!Array.isArray(embedding)) return null

    const vector: number[] = []
    for (const value of embedding) {
      if (typeof value !== 'number') return null
      vector.push(value)
    }
    return vector
  }
}
