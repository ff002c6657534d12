/**
 * RAG Core Models
 */

export type DocumentStatus = 'unprocessed' | 'processed' | 'stale'

/**
 * A loaded source document. `id` is the path relative to the source root, `/`-separated.
 */
export interface Document {
  id: string
  content: string
  contentHash: string // sha256 of the raw bytes
  modifiedAt: Date
  status: DocumentStatus
}

/**
 * Persisted per-document state
 */
export interface DocumentRecord {
  id: string
  contentHash: string | null // null until the first successful commit
  status: DocumentStatus
  modifiedAt: Date | null
  embeddingModel: string | null
  chunkCount: number
  indexedAt: Date | null
}

/**
 * Contiguous slice of a document. Offsets are character positions, end exclusive.
 */
export interface Chunk {
  documentId: string
  index: number
  text: string
  startOffset: number
  endOffset: number
}

export interface EmbeddedChunk extends Chunk {
  id: string
  vector: number[]
  embeddingModel: string
}

export interface ScoredChunk {
  chunk: EmbeddedChunk
  score: number
}

export interface RetrievalHit extends ScoredChunk {
  /** Neighbouring chunks of the same document in document order, the hit included */
  context?: EmbeddedChunk[]
  /** Whole document text rebuilt from its chunks */
  fullDocument?: string
}

export type RetrievalResult = RetrievalHit[]

export interface IndexFailure {
  documentId: string
  code: string
  message: string
}

export interface IndexSummary {
  documentsIndexed: number
  documentsSkipped: number
  documentsFailed: number
  chunksWritten: number
  chunksDeleted: number
  failures: IndexFailure[]
  /** Stored documents not found in this scan. They are kept. */
  missing: string[]
  aborted: boolean
  durationMs: number
}

export interface IndexOptions {
  sourceRoot: string
  incremental?: boolean
  concurrency?: number
  signal?: AbortSignal
}

export interface QueryOptions {
  text: string
  topK?: number
  threshold?: number
  withContext?: boolean
  contextSize?: number
  fullDocument?: boolean
  signal?: AbortSignal
}

export function chunkId(documentId: string, index: number): string {
  return `${documentId}#${index}`
}
