import { resolve } from 'path'
import { logger, LogLevel } from '@/shared/logger/index.js'
import { ConfigurationError } from '@/shared/errors/index.js'

/**
 * Configuration Factory for the docs RAG server
 * Environment-variable driven server settings
 */

export type SimilarityMetric = 'cosine' | 'inner_product'
export type EmbeddingProvider = 'ollama'
export type EmbeddingOverflow = 'truncate' | 'reject'
export type MCPTransportType = 'stdio'

export interface ChunkingConfig {
  chunkSize: number // characters per chunk (default: 500)
  chunkOverlap: number // characters repeated from the previous chunk (default: 100)
  minChunkSize: number // smallest chunk produced by a soft boundary (default: 50)
}

export interface EmbeddingConfig {
  provider: EmbeddingProvider
  model: string // default: nomic-embed-text
  dimensions: number // default: 768
  maxInputLength: number // characters accepted per call (default: 8192)
  overflow: EmbeddingOverflow // default: truncate
  ollamaBaseUrl: string // default: http://localhost:11434
  timeoutMs: number // per-call timeout (default: 30000)
  retries: number // retry attempts after the first failure (default: 3)
  retryMinTimeoutMs: number // first backoff delay (default: 500)
  breakerThreshold: number // failed calls before the circuit opens (default: 5)
  breakerResetMs: number // open -> half-open delay (default: 30000)
}

export interface SearchConfig {
  metric: SimilarityMetric // default: cosine
  defaultTopK: number // default: 5
  maxTopK: number // default: 50
  similarityThreshold?: number // unset by default
}

export interface ServerConfig extends ChunkingConfig {
  nodeEnv: string
  documentsDir: string // source root (default: ./documents)
  dataDir: string // default: ./.data
  databasePath: string // SQLite file (default: <dataDir>/rag.sqlite)
  logLevel: LogLevel // applied to the logger on startup
  indexConcurrency: number // documents processed in parallel (default: 2)
  embedding: EmbeddingConfig
  search: SearchConfig
  mcp: {
    type: MCPTransportType
    name: string
    version: string
  }
}

function intFromEnv(key: string, fallback: number): number {
  const raw = process.env[key]
  return raw === undefined || raw === '' ? fallback : Number.parseInt(raw, 10)
}

function floatFromEnv(key: string): number | undefined {
  const raw = process.env[key]
  return raw === undefined || raw === '' ? undefined : Number.parseFloat(raw)
}

const LOG_LEVELS: readonly LogLevel[] = Object.values(LogLevel)

function oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[key]
  if (raw === undefined || raw === '') return fallback
  const match = allowed.find((value) => value === raw)
  if (!match) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(', ')}, got '${raw}'`, key)
  }
  return match
}

export class ConfigFactory {
  /**
   * Returns the configuration for the current NODE_ENV
   */
  static getCurrentConfig(): ServerConfig {
    const nodeEnv = process.env['NODE_ENV'] || 'development'
    return nodeEnv === 'production'
      ? ConfigFactory.createProductionConfig()
      : ConfigFactory.createDevelopmentConfig()
  }

  private static createBaseConfig(): ServerConfig {
    const dataDir = process.env['DATA_DIR'] || './.data'

    return {
      nodeEnv: process.env['NODE_ENV'] || 'development',
      documentsDir: process.env['DOCUMENTS_DIR'] || './documents',
      dataDir,
      databasePath: process.env['DATABASE_PATH'] || resolve(dataDir, 'rag.sqlite'),
      logLevel: oneOf('LOG_LEVEL', LOG_LEVELS, LogLevel.INFO),

      chunkSize: intFromEnv('CHUNK_SIZE', 500),
      chunkOverlap: intFromEnv('CHUNK_OVERLAP', 100),
      minChunkSize: intFromEnv('MIN_CHUNK_SIZE', 50),
      indexConcurrency: intFromEnv('INDEX_CONCURRENCY', 2),

      embedding: {
        provider: oneOf('EMBEDDING_PROVIDER', ['ollama'] as const, 'ollama'),
        model: process.env['EMBEDDING_MODEL'] || 'nomic-embed-text',
        dimensions: intFromEnv('EMBEDDING_DIMENSIONS', 768),
        maxInputLength: intFromEnv('EMBEDDING_MAX_INPUT_LENGTH', 8192),
        overflow: oneOf('EMBEDDING_OVERFLOW', ['truncate', 'reject'] as const, 'truncate'),
        ollamaBaseUrl: process.env['OLLAMA_BASE_URL'] || 'http://localhost:11434',
        timeoutMs: intFromEnv('EMBEDDING_TIMEOUT_MS', 30000),
        retries: intFromEnv('EMBEDDING_RETRIES', 3),
        retryMinTimeoutMs: intFromEnv('EMBEDDING_RETRY_MIN_TIMEOUT_MS', 500),
        breakerThreshold: intFromEnv('EMBEDDING_BREAKER_THRESHOLD', 5),
        breakerResetMs: intFromEnv('EMBEDDING_BREAKER_RESET_MS', 30000),
      },

      search: {
        metric: oneOf('SIMILARITY_METRIC', ['cosine', 'inner_product'] as const, 'cosine'),
        defaultTopK: intFromEnv('DEFAULT_TOP_K', 5),
        maxTopK: intFromEnv('MAX_TOP_K', 50),
        similarityThreshold: floatFromEnv('SIMILARITY_THRESHOLD'),
      },

      mcp: {
        type: oneOf('MCP_TRANSPORT', ['stdio'] as const, 'stdio'),
        name: 'docs-rag-server',
        version: process.env['npm_package_version'] || '1.0.0',
      },
    }
  }

  static createDevelopmentConfig(): ServerConfig {
    return {
      ...ConfigFactory.createBaseConfig(),
      nodeEnv: 'development',
      logLevel: oneOf('LOG_LEVEL', LOG_LEVELS, LogLevel.DEBUG),
    }
  }

  static createProductionConfig(): ServerConfig {
    const baseConfig = ConfigFactory.createBaseConfig()
    return {
      ...baseConfig,
      nodeEnv: 'production',
      logLevel: oneOf('LOG_LEVEL', LOG_LEVELS, LogLevel.INFO),
      indexConcurrency: intFromEnv('INDEX_CONCURRENCY', 4),
    }
  }

  /**
   * Collects every problem and throws them together
   */
  static validateConfig(config: ServerConfig): void {
    const errors: string[] = []
    const isPositiveInt = (value: number) => Number.isInteger(value) && value > 0

    if (!config.documentsDir) {
      errors.push('Documents directory is required')
    }

    if (!config.databasePath) {
      errors.push('Database path is required')
    }

    if (!isPositiveInt(config.chunkSize)) {
      errors.push('Chunk size must be a positive integer')
    }

    if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
      errors.push('Chunk overlap must be between 0 and chunk size (exclusive)')
    }

    if (!isPositiveInt(config.minChunkSize) || config.minChunkSize > config.chunkSize) {
      errors.push('Minimum chunk size must be between 1 and chunk size')
    }

    if (!isPositiveInt(config.indexConcurrency)) {
      errors.push('Index concurrency must be at least 1')
    }

    const embedding = config.embedding
    if (!embedding.model) {
      errors.push('Embedding model is required')
    }

    if (!isPositiveInt(embedding.dimensions)) {
      errors.push('Embedding dimensions must be a positive integer')
    }

    if (!isPositiveInt(embedding.maxInputLength)) {
      errors.push('Embedding max input length must be a positive integer')
    } else if (config.chunkSize > embedding.maxInputLength) {
      errors.push('Chunk size must not exceed the embedding max input length')
    }

    if (!embedding.ollamaBaseUrl) {
      errors.push('Ollama base URL is required')
    }

    if (!isPositiveInt(embedding.timeoutMs)) {
      errors.push('Embedding timeout must be a positive integer')
    }

    if (!Number.isInteger(embedding.retries) || embedding.retries < 0) {
      errors.push('Embedding retries must be zero or more')
    }

    if (!isPositiveInt(embedding.breakerThreshold)) {
      errors.push('Circuit breaker threshold must be at least 1')
    }

    const search = config.search
    if (!isPositiveInt(search.maxTopK)) {
      errors.push('Max top-k must be at least 1')
    }

    if (!isPositiveInt(search.defaultTopK) || search.defaultTopK > search.maxTopK) {
      errors.push('Default top-k must be between 1 and max top-k')
    }

    if (
      search.similarityThreshold !== undefined &&
      (!Number.isFinite(search.similarityThreshold) ||
        (search.metric === 'cosine' && (search.similarityThreshold < -1 || search.similarityThreshold > 1)))
    ) {
      errors.push('Similarity threshold must be between -1 and 1 for cosine similarity')
    }

    if (errors.length > 0) {
      throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, 'ServerConfig', errors)
    }

    logger.debug('✅ Configuration validation passed', {
      embeddingModel: embedding.model,
      ollamaBaseUrl: embedding.ollamaBaseUrl,
      databasePath: config.databasePath,
      metric: search.metric,
    })
  }
}
