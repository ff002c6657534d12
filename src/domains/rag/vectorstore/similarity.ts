import type { SimilarityMetric } from '@/shared/config/config-factory.js'
import type { ScoredChunk } from '@/domains/rag/core/models.js'

export function innerProduct(a: readonly number[], b: readonly number[]): number {
  let dot = 0
  const len = Math.min(a.length, b.length)
  for (let i = 0; i < len; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0)
  }
  return dot
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero norm
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0
  let na = 0
  let nb = 0

  const len = Math.min(a.length, b.length)
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? 0
    const bv = b[i] ?? 0
    dot += av * bv
    na += av * av
    nb += bv * bv
  }

  if (na === 0 || nb === 0) return 0
  const score = dot / (Math.sqrt(na) * Math.sqrt(nb))
  return Math.max(-1, Math.min(1, score))
}

export function similarityFunction(metric: SimilarityMetric): (a: readonly number[], b: readonly number[]) => number {
  return metric === 'inner_product' ? innerProduct : cosineSimilarity
}

/**
 * Score descending, then documentId ascending, then chunk index ascending
 */
export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) return b.score - a.score
  if (a.chunk.documentId !== b.chunk.documentId) return a.chunk.documentId < b.chunk.documentId ? -1 : 1
  return a.chunk.index - b.chunk.index
}
