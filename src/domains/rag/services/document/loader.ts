import type { FileSource } from '@/domains/rag/core/interfaces.js'
import type { Document } from '@/domains/rag/core/models.js'
import { ErrorUtils, LoadError } from '@/shared/errors/index.js'
import { calculateContentHash } from '@/shared/utils/crypto.js'
import { logger } from '@/shared/logger/index.js'
import { FileReader } from './reader.js'

export type LoadOutcome = { ok: true; document: Document } | { ok: false; error: LoadError }

/**
 * Document Loader
 * Lazily turns every file under a source root into a normalized Document.
 * Per-file failures are yielded as outcomes, never thrown.
 */
export class DocumentLoader {
  constructor(
    private readonly source: FileSource,
    private readonly reader: FileReader = new FileReader()
  ) {}

  async *load(root: string, signal?: AbortSignal): AsyncGenerator<LoadOutcome> {
    for await (const entry of this.source.list(root)) {
      if (signal?.aborted) return

      if ('error' in entry) {
        yield {
          ok: false,
          error: new LoadError(`Failed to read ${entry.id}: ${entry.error.message}`, entry.id, 'unreadable', entry.error),
        }
        continue
      }

      try {
        const parsed = await this.reader.read(entry)
        yield {
          ok: true,
          document: {
            id: entry.id,
            content: parsed.pageContent,
            contentHash: calculateContentHash(entry.bytes),
            modifiedAt: entry.modifiedAt,
            status: 'unprocessed',
          },
        }
      } catch (error) {
        const loadError =
          error instanceof LoadError
            ? error
            : new LoadError(ErrorUtils.message(error), entry.id, 'unreadable', ErrorUtils.toError(error))
        logger.warn(`Skipping ${entry.id}: ${loadError.message}`, { documentId: entry.id, reason: loadError.reason })
        yield { ok: false, error: loadError }
      }
    }
  }

  /**
   * Drains the loader; convenient for small corpora and tests
   */
  async loadAll(root: string): Promise<{ documents: Document[]; errors: LoadError[] }> {
    const documents: Document[] = []
    const errors: LoadError[] = []
    for await (const outcome of this.load(root)) {
      if (outcome.ok) documents.push(outcome.document)
      else errors.push(outcome.error)
    }
    return { documents, errors }
  }
}
