/**
 * RAG Core Interfaces
 * Contracts between the indexing pipeline and its collaborators
 */

import type { DocumentRecord, DocumentStatus, EmbeddedChunk, ScoredChunk } from './models.js'

/**
 * Text -> fixed-length vector. `dimensions` is D for every vector this model returns.
 */
export interface Embedder {
  readonly modelId: string
  readonly dimensions: number
  readonly maxInputLength: number
  embed(text: string, signal?: AbortSignal): Promise<number[]>
  /** Resolves false when the model server cannot be reached */
  healthCheck?(): Promise<boolean>
  close?(): Promise<void>
}

export interface RawFile {
  id: string
  bytes: Uint8Array
  modifiedAt: Date
}

/**
 * A file that was found but could not be read
 */
export interface UnreadableFile {
  id: string
  error: Error
}

export type SourceEntry = RawFile | UnreadableFile

/**
 * Raw file access. Yields every file under a root, id relative to that root, in a stable order.
 */
export interface FileSource {
  list(root: string): AsyncIterable<SourceEntry>
}

export interface NearestNeighborQuery {
  vector: number[]
  k: number
  embeddingModel?: string
  threshold?: number
}

/**
 * Nearest neighbours plus every stored chunk of each hit's document, read as one snapshot
 */
export interface Neighborhood {
  hits: ScoredChunk[]
  documents: Map<string, EmbeddedChunk[]>
}

export interface DocumentCommit {
  documentId: string
  contentHash: string
  modifiedAt: Date
  embeddingModel: string
  chunks: EmbeddedChunk[]
}

export interface ReplaceResult {
  chunksDeleted: number
  chunksWritten: number
}

export interface VectorStore {
  readonly dimensions: number
  init(): Promise<void>
  upsertChunk(chunk: EmbeddedChunk): Promise<void>
  deleteChunksForDocument(documentId: string): Promise<number>
  /** Deletes old chunks, inserts the new ones and records the hash in one transaction */
  replaceDocument(commit: DocumentCommit): Promise<ReplaceResult>
  nearestNeighbors(query: NearestNeighborQuery): Promise<ScoredChunk[]>
  /** Same ranking as nearestNeighbors; hits and their documents come from one read transaction */
  nearestNeighborhood(query: NearestNeighborQuery): Promise<Neighborhood>
  getDocumentHash(documentId: string): Promise<string | null>
  setDocumentHash(documentId: string, contentHash: string): Promise<void>
  getDocument(documentId: string): Promise<DocumentRecord | null>
  listDocuments(): Promise<DocumentRecord[]>
  markDocumentStatus(documentId: string, status: DocumentStatus): Promise<void>
  removeDocument(documentId: string): Promise<boolean>
  getChunksForDocument(documentId: string): Promise<EmbeddedChunk[]>
  getIndexedModels(): Promise<string[]>
  countDocuments(): Promise<number>
  countChunks(): Promise<number>
  clear(): Promise<void>
  close(): Promise<void>
}
