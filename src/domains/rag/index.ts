/**
 * RAG Domain - Main Export
 */

// Main RAG Service - High-level facade
export { RAGService } from './rag-service.js'
export type { RagInfo, RAGServiceDependencies } from './rag-service.js'

// Core types and interfaces
export type * from './core/models.js'
export { chunkId } from './core/models.js'
export type * from './core/interfaces.js'

// Pipeline building blocks
export { ChunkingService, reconstructText } from './services/chunking.js'
export { DocumentLoader, type LoadOutcome } from './services/document/loader.js'
export { FileReader, detectFileType, normalizeText } from './services/document/reader.js'
export { FileSystemSource } from './services/document/source.js'
export { Retriever, type RetrieverOptions } from './services/search.js'
export { Indexer } from './workflows/indexer.js'
export { SqliteVectorStore } from './vectorstore/sqlite.js'
export { cosineSimilarity, innerProduct, compareScored } from './vectorstore/similarity.js'
export { createEmbedder, OllamaEmbeddings, LangChainEmbedder, ResilientEmbedder } from './embeddings/index.js'
