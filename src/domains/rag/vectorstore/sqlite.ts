/**
 * SQLite Vector Store
 * Chunks, their vectors and per-document indexing state in one better-sqlite3 database.
 * Vectors are stored as JSON and scored in process.
 */

import Database from 'better-sqlite3'
import { existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import type {
  DocumentCommit,
  NearestNeighborQuery,
  Neighborhood,
  ReplaceResult,
  VectorStore,
} from '@/domains/rag/core/interfaces.js'
import type { DocumentRecord, DocumentStatus, EmbeddedChunk, ScoredChunk } from '@/domains/rag/core/models.js'
import type { SimilarityMetric } from '@/shared/config/config-factory.js'
import {
  ConfigMismatchError,
  ErrorUtils,
  StoreError,
  StructuredError,
  ValidationError,
} from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'
import { compareScored, similarityFunction } from './similarity.js'

export interface SqliteVectorStoreOptions {
  databasePath: string
  dimensions: number
  metric?: SimilarityMetric
}

type ChunkRow = {
  id: string
  document_id: string
  chunk_index: number
  text: string
  start_offset: number
  end_offset: number
  embedding_model: string
  vector_json: string
}

type DocumentRow = {
  id: string
  content_hash: string | null
  status: string
  modified_at: string | null
  embedding_model: string | null
  chunk_count: number
  indexed_at: string | null
}

type DocumentStateParams = {
  id: string
  content_hash: string
  modified_at: string
  embedding_model: string
  chunk_count: number
  indexed_at: string
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS store_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  content_hash TEXT,
  status TEXT NOT NULL DEFAULT 'unprocessed',
  modified_at TEXT,
  embedding_model TEXT,
  chunk_count INTEGER NOT NULL DEFAULT 0,
  indexed_at TEXT
);

CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  start_offset INTEGER NOT NULL,
  end_offset INTEGER NOT NULL,
  embedding_model TEXT NOT NULL,
  vector_json TEXT NOT NULL,
  UNIQUE(document_id, chunk_index)
);

CREATE INDEX IF NOT EXISTS idx_chunks_document_id ON chunks(document_id);
CREATE INDEX IF NOT EXISTS idx_chunks_embedding_model ON chunks(embedding_model);
`

const DOCUMENT_STATUSES: readonly DocumentStatus[] = ['unprocessed', 'processed', 'stale']

function toStatus(value: string): DocumentStatus {
  return DOCUMENT_STATUSES.find((status) => status === value) ?? 'unprocessed'
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value)
}

function parseVector(json: string, chunkId: string): number[] {
  const parsed: unknown = JSON.parse(json)
  if (!Array.isArray(parsed)) {
    throw new StoreError(`Stored vector for ${chunkId} is not an array`, 'parseVector', { chunkId })
  }
  const vector: number[] = []
  for (const value of parsed) {
    if (typeof value !== 'number') {
      throw new StoreError(`Stored vector for ${chunkId} has a non-numeric component`, 'parseVector', { chunkId })
    }
    vector.push(value)
  }
  return vector
}

function toChunk(row: ChunkRow): EmbeddedChunk {
  return {
    id: row.id,
    documentId: row.document_id,
    index: row.chunk_index,
    text: row.text,
    startOffset: row.start_offset,
    endOffset: row.end_offset,
    embeddingModel: row.embedding_model,
    vector: parseVector(row.vector_json, row.id),
  }
}

function toRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    contentHash: row.content_hash,
    status: toStatus(row.status),
    modifiedAt: toDate(row.modified_at),
    embeddingModel: row.embedding_model,
    chunkCount: row.chunk_count,
    indexedAt: toDate(row.indexed_at),
  }
}

function toParams(chunk: EmbeddedChunk): ChunkRow {
  return {
    id: chunk.id,
    document_id: chunk.documentId,
    chunk_index: chunk.index,
    text: chunk.text,
    start_offset: chunk.startOffset,
    end_offset: chunk.endOffset,
    embedding_model: chunk.embeddingModel,
    vector_json: JSON.stringify(chunk.vector),
  }
}

function prepareStatements(db: Database.Database) {
  return {
    getMeta: db.prepare<[string], { value: string }>('SELECT value FROM store_meta WHERE key = ?'),
    setMeta: db.prepare<[string, string]>('INSERT OR REPLACE INTO store_meta (key, value) VALUES (?, ?)'),

    insertChunk: db.prepare<ChunkRow>(`
      INSERT INTO chunks (id, document_id, chunk_index, text, start_offset, end_offset, embedding_model, vector_json)
      VALUES (@id, @document_id, @chunk_index, @text, @start_offset, @end_offset, @embedding_model, @vector_json)
    `),
    upsertChunk: db.prepare<ChunkRow>(`
      INSERT INTO chunks (id, document_id, chunk_index, text, start_offset, end_offset, embedding_model, vector_json)
      VALUES (@id, @document_id, @chunk_index, @text, @start_offset, @end_offset, @embedding_model, @vector_json)
      ON CONFLICT(id) DO UPDATE SET
        chunk_index = excluded.chunk_index,
        text = excluded.text,
        start_offset = excluded.start_offset,
        end_offset = excluded.end_offset,
        embedding_model = excluded.embedding_model,
        vector_json = excluded.vector_json
    `),
    deleteChunks: db.prepare<[string]>('DELETE FROM chunks WHERE document_id = ?'),
    chunksForDocument: db.prepare<[string], ChunkRow>(
      'SELECT * FROM chunks WHERE document_id = ? ORDER BY chunk_index'
    ),
    allChunks: db.prepare<[], ChunkRow>('SELECT * FROM chunks'),
    chunksForModel: db.prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE embedding_model = ?'),
    indexedModels: db.prepare<[], { embedding_model: string }>(
      'SELECT DISTINCT embedding_model FROM chunks ORDER BY embedding_model'
    ),
    countChunks: db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM chunks'),
    countIndexedDocuments: db.prepare<[], { count: number }>(
      'SELECT COUNT(DISTINCT document_id) AS count FROM chunks'
    ),

    getDocument: db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?'),
    listDocuments: db.prepare<[], DocumentRow>('SELECT * FROM documents ORDER BY id'),
    ensureDocument: db.prepare<[string]>('INSERT OR IGNORE INTO documents (id) VALUES (?)'),
    setHash: db.prepare<[string, string]>(`
      INSERT INTO documents (id, content_hash) VALUES (?, ?)
      ON CONFLICT(id) DO UPDATE SET content_hash = excluded.content_hash
    `),
    setStatus: db.prepare<[string, string]>(`
      INSERT INTO documents (id, status) VALUES (?, ?)
      ON CONFLICT(id) DO UPDATE SET status = excluded.status
    `),
    setChunkCount: db.prepare<[string]>(
      'UPDATE documents SET chunk_count = (SELECT COUNT(*) FROM chunks WHERE document_id = documents.id) WHERE id = ?'
    ),
    commitDocument: db.prepare<DocumentStateParams>(`
      INSERT INTO documents (id, content_hash, status, modified_at, embedding_model, chunk_count, indexed_at)
      VALUES (@id, @content_hash, 'processed', @modified_at, @embedding_model, @chunk_count, @indexed_at)
      ON CONFLICT(id) DO UPDATE SET
        content_hash = excluded.content_hash,
        status = excluded.status,
        modified_at = excluded.modified_at,
        embedding_model = excluded.embedding_model,
        chunk_count = excluded.chunk_count,
        indexed_at = excluded.indexed_at
    `),
    deleteDocument: db.prepare<[string]>('DELETE FROM documents WHERE id = ?'),
    clearChunks: db.prepare<[]>('DELETE FROM chunks'),
    clearDocuments: db.prepare<[]>('DELETE FROM documents'),
  }
}

type Statements = ReturnType<typeof prepareStatements>

export class SqliteVectorStore implements VectorStore {
  readonly dimensions: number
  private readonly metric: SimilarityMetric
  private readonly databasePath: string
  private db: Database.Database | null = null
  private statements: Statements | null = null

  constructor(options: SqliteVectorStoreOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new ValidationError(`Vector dimensions must be a positive integer, got ${options.dimensions}`, 'dimensions')
    }
    this.databasePath = options.databasePath
    this.dimensions = options.dimensions
    this.metric = options.metric ?? 'cosine'
  }

  async init(): Promise<void> {
    if (this.db) return

    this.guard('init', () => {
      if (this.databasePath !== ':memory:') {
        const dir = dirname(this.databasePath)
        if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
      }

      const db = new Database(this.databasePath)
      try {
        db.pragma('journal_mode = WAL')
        db.exec(SCHEMA)
        const statements = prepareStatements(db)
        this.checkDimensions(statements)
        this.db = db
        this.statements = statements
      } catch (error) {
        db.close()
        throw error
      }
    })

    logger.info('✅ Vector store initialized', {
      component: 'SqliteVectorStore',
      databasePath: this.databasePath,
      dimensions: this.dimensions,
      metric: this.metric,
    })
  }

  async upsertChunk(chunk: EmbeddedChunk): Promise<void> {
    this.validateChunk(chunk)
    this.transaction('upsertChunk', (s) => {
      s.ensureDocument.run(chunk.documentId)
      s.upsertChunk.run(toParams(chunk))
      s.setChunkCount.run(chunk.documentId)
    })
  }

  async deleteChunksForDocument(documentId: string): Promise<number> {
    return this.transaction('deleteChunksForDocument', (s) => {
      const { changes } = s.deleteChunks.run(documentId)
      s.setChunkCount.run(documentId)
      return changes
    })
  }

  async replaceDocument(commit: DocumentCommit): Promise<ReplaceResult> {
    for (const chunk of commit.chunks) {
      this.validateChunk(chunk)
      if (chunk.documentId !== commit.documentId) {
        throw new ValidationError(
          `Chunk ${chunk.id} belongs to ${chunk.documentId}, not ${commit.documentId}`,
          'documentId',
          { documentId: commit.documentId }
        )
      }
      if (chunk.embeddingModel !== commit.embeddingModel) {
        throw new ValidationError(
          `Chunk ${chunk.id} was embedded with ${chunk.embeddingModel}, not ${commit.embeddingModel}`,
          'embeddingModel',
          { documentId: commit.documentId }
        )
      }
    }

    return this.transaction(
      'replaceDocument',
      (s) => {
        const { changes: chunksDeleted } = s.deleteChunks.run(commit.documentId)
        for (const chunk of commit.chunks) {
          s.insertChunk.run(toParams(chunk))
        }
        s.commitDocument.run({
          id: commit.documentId,
          content_hash: commit.contentHash,
          modified_at: commit.modifiedAt.toISOString(),
          embedding_model: commit.embeddingModel,
          chunk_count: commit.chunks.length,
          indexed_at: new Date().toISOString(),
        })
        return { chunksDeleted, chunksWritten: commit.chunks.length }
      },
      { documentId: commit.documentId }
    )
  }

  async nearestNeighbors(query: NearestNeighborQuery): Promise<ScoredChunk[]> {
    this.validateQuery(query)
    return this.read('nearestNeighbors', (s) => this.rank(s, query))
  }

  async nearestNeighborhood(query: NearestNeighborQuery): Promise<Neighborhood> {
    this.validateQuery(query)
    // one transaction, so a concurrent replaceDocument lands wholly before or after
    return this.transaction('nearestNeighborhood', (s) => {
      const hits = this.rank(s, query)
      const documents = new Map<string, EmbeddedChunk[]>()
      for (const { chunk } of hits) {
        if (!documents.has(chunk.documentId)) {
          documents.set(chunk.documentId, s.chunksForDocument.all(chunk.documentId).map(toChunk))
        }
      }
      return { hits, documents }
    })
  }

  async getDocumentHash(documentId: string): Promise<string | null> {
    return this.read('getDocumentHash', (s) => s.getDocument.get(documentId)?.content_hash ?? null)
  }

  async setDocumentHash(documentId: string, contentHash: string): Promise<void> {
    this.transaction('setDocumentHash', (s) => {
      s.setHash.run(documentId, contentHash)
    })
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    const row = this.read('getDocument', (s) => s.getDocument.get(documentId))
    return row ? toRecord(row) : null
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return this.read('listDocuments', (s) => s.listDocuments.all()).map(toRecord)
  }

  async markDocumentStatus(documentId: string, status: DocumentStatus): Promise<void> {
    this.transaction('markDocumentStatus', (s) => {
      s.setStatus.run(documentId, status)
    })
  }

  async removeDocument(documentId: string): Promise<boolean> {
    return this.transaction(
      'removeDocument',
      (s) => {
        const chunks = s.deleteChunks.run(documentId).changes
        const documents = s.deleteDocument.run(documentId).changes
        return chunks + documents > 0
      },
      { documentId }
    )
  }

  async getChunksForDocument(documentId: string): Promise<EmbeddedChunk[]> {
    return this.read('getChunksForDocument', (s) => s.chunksForDocument.all(documentId)).map(toChunk)
  }

  async getIndexedModels(): Promise<string[]> {
    return this.read('getIndexedModels', (s) => s.indexedModels.all().map((row) => row.embedding_model))
  }

  /**
   * Documents with at least one stored chunk
   */
  async countDocuments(): Promise<number> {
    return this.read('countDocuments', (s) => s.countIndexedDocuments.get()?.count ?? 0)
  }

  async countChunks(): Promise<number> {
    return this.read('countChunks', (s) => s.countChunks.get()?.count ?? 0)
  }

  async clear(): Promise<void> {
    this.transaction('clear', (s) => {
      s.clearChunks.run()
      s.clearDocuments.run()
    })
    logger.info('🗑️ Vector store cleared', { component: 'SqliteVectorStore' })
  }

  async close(): Promise<void> {
    if (!this.db) return
    this.db.close()
    this.db = null
    this.statements = null
  }

  private checkDimensions(statements: Statements): void {
    const stored = statements.getMeta.get('dimensions')
    if (!stored) {
      statements.setMeta.run('dimensions', String(this.dimensions))
      return
    }
    if (Number(stored.value) !== this.dimensions) {
      throw new ConfigMismatchError(
        `Store at ${this.databasePath} holds ${stored.value}-dimensional vectors, embedder produces ${this.dimensions}`,
        { databasePath: this.databasePath, stored: Number(stored.value), configured: this.dimensions }
      )
    }
  }

  private validateQuery(query: NearestNeighborQuery): void {
    this.validateVector(query.vector, 'query')
    if (!Number.isInteger(query.k) || query.k < 1) {
      throw new ValidationError(`k must be a positive integer, got ${query.k}`, 'k')
    }
  }

  private rank(s: Statements, query: NearestNeighborQuery): ScoredChunk[] {
    const rows = query.embeddingModel === undefined ? s.allChunks.all() : s.chunksForModel.all(query.embeddingModel)
    const score = similarityFunction(this.metric)
    const scored: ScoredChunk[] = []
    for (const row of rows) {
      const chunk = toChunk(row)
      const similarity = score(query.vector, chunk.vector)
      if (query.threshold !== undefined && similarity < query.threshold) continue
      scored.push({ chunk, score: similarity })
    }

    scored.sort(compareScored)
    return scored.slice(0, query.k)
  }

  private validateVector(vector: readonly number[], field: string): void {
    if (vector.length !== this.dimensions) {
      throw new ValidationError(
        `Vector has ${vector.length} dimensions, store expects ${this.dimensions}`,
        field,
        { expected: this.dimensions, actual: vector.length }
      )
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new ValidationError('Vector has a non-finite component', field)
    }
  }

  private validateChunk(chunk: EmbeddedChunk): void {
    this.validateVector(chunk.vector, 'vector')
    if (!chunk.embeddingModel) {
      throw new ValidationError(`Chunk ${chunk.id} has no embedding model`, 'embeddingModel')
    }
  }

  private requireStatements(operation: string): Statements {
    if (!this.statements) {
      throw new StoreError('Vector store is not initialized', operation, { databasePath: this.databasePath })
    }
    return this.statements
  }

  private read<T>(operation: string, fn: (statements: Statements) => T): T {
    return this.guard(operation, () => fn(this.requireStatements(operation)))
  }

  /**
   * Runs `fn` inside one SQLite transaction; any throw rolls the whole thing back
   */
  private transaction<T>(operation: string, fn: (statements: Statements) => T, context: Record<string, unknown> = {}): T {
    return this.guard(
      operation,
      () => {
        const statements = this.requireStatements(operation)
        const db = this.db
        if (!db) {
          throw new StoreError('Vector store is not initialized', operation)
        }
        return db.transaction(() => fn(statements))()
      },
      context
    )
  }

  private guard<T>(operation: string, fn: () => T, context: Record<string, unknown> = {}): T {
    try {
      return fn()
    } catch (error) {
      if (error instanceof StructuredError) throw error
      logger.error(`❌ Vector store operation failed: ${operation}`, error, { component: 'SqliteVectorStore', ...context })
      throw new StoreError(
        `Vector store ${operation} failed: ${ErrorUtils.message(error)}`,
        operation,
        context,
        ErrorUtils.toError(error)
      )
    }
  }
}
