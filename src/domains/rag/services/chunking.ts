/**
 * Chunking Service
 * Splits normalized document text into overlapping character windows,
 * preferring paragraph, line, sentence and word boundaries over hard cuts.
 */

import type { ChunkingConfig } from '@/shared/config/config-factory.js'
import type { Chunk } from '@/domains/rag/core/models.js'
import { ValidationError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

// Boundary classes in priority order. A cut lands right after the separator.
const BOUNDARY_SEPARATORS: readonly (readonly string[])[] = [
  ['\n\n'],
  ['\n'],
  ['. ', '? ', '! ', '。', '！', '？'],
]

const WHITESPACE = /\s/

// Offsets are UTF-16 code units; a cut between the halves of a pair would leave lone surrogates
function splitsSurrogatePair(text: string, at: number): boolean {
  if (at <= 0 || at >= text.length) return false
  const before = text.charCodeAt(at - 1)
  const after = text.charCodeAt(at)
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff
}

export class ChunkingService {
  private readonly chunkSize: number
  private readonly chunkOverlap: number
  private readonly minChunkSize: number

  constructor(config: ChunkingConfig) {
    ChunkingService.validate(config)
    this.chunkSize = config.chunkSize
    this.chunkOverlap = config.chunkOverlap
    this.minChunkSize = config.minChunkSize
  }

  static validate(config: ChunkingConfig): void {
    const { chunkSize, chunkOverlap, minChunkSize } = config

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`, 'chunkSize', { chunkSize })
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ValidationError(
        `chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap} with chunkSize ${chunkSize}`,
        'chunkOverlap',
        { chunkSize, chunkOverlap }
      )
    }
    if (!Number.isInteger(minChunkSize) || minChunkSize < 1 || minChunkSize > chunkSize) {
      throw new ValidationError(
        `minChunkSize must be an integer in [1, chunkSize], got ${minChunkSize}`,
        'minChunkSize',
        { chunkSize, minChunkSize }
      )
    }
  }

  /**
   * Every character of `text` falls in at least one chunk; chunk i+1 starts with
   * the last `chunkOverlap` characters of chunk i (one more when that would split a surrogate pair).
   */
  chunkText(documentId: string, text: string): Chunk[] {
    if (text.trim().length === 0) {
      return []
    }

    const chunks: Chunk[] = []
    let start = 0

    while (start < text.length) {
      const end =
        text.length - start <= this.chunkSize
          ? text.length
          : this.findBreak(text, start + Math.max(this.chunkOverlap, this.minChunkSize - 1), start + this.chunkSize)

      chunks.push({
        documentId,
        index: chunks.length,
        text: text.slice(start, end),
        startOffset: start,
        endOffset: end,
      })

      if (end === text.length) break
      let next = end - this.chunkOverlap
      if (splitsSurrogatePair(text, next)) {
        next = next - 1 > start ? next - 1 : next + 1
      }
      start = next
    }

    if (chunks.length > 10) {
      logger.debug('✅ Text chunking completed', {
        component: 'ChunkingService',
        documentId,
        chunksCount: chunks.length,
        averageChunkSize: Math.round(text.length / chunks.length),
      })
    }

    return chunks
  }

  /**
   * Last boundary cut in (lower, upper], falling back to a hard cut at upper
   */
  private findBreak(text: string, lower: number, upper: number): number {
    for (const separators of BOUNDARY_SEPARATORS) {
      let best = -1
      for (const separator of separators) {
        const at = text.lastIndexOf(separator, upper - separator.length)
        if (at < 0) continue
        const cut = at + separator.length
        if (cut > lower && cut > best) best = cut
      }
      if (best > 0) return best
    }

    for (let cut = upper; cut > lower; cut--) {
      if (WHITESPACE.test(text.charAt(cut - 1))) return cut
    }

    if (splitsSurrogatePair(text, upper) && upper - 1 > lower) return upper - 1
    return upper
  }
}

/**
 * Rebuilds the original text from its chunks by dropping the overlapping prefix of each one
 */
export function reconstructText(chunks: readonly Chunk[]): string {
  const ordered = [...chunks].sort((a, b) => a.index - b.index)
  let text = ''
  let covered = 0

  for (const chunk of ordered) {
    text += chunk.text.slice(Math.max(0, covered - chunk.startOffset))
    covered = Math.max(covered, chunk.endOffset)
  }

  return text
}
