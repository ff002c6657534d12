/**
 * Queries that overlap a re-index see one version of each document
 */

import { describe, test, expect, afterEach } from '@jest/globals';
import type { DocumentCommit, NearestNeighborQuery, Neighborhood } from '@/domains/rag/core/interfaces.js';
import { chunkId, type EmbeddedChunk, type RetrievalHit, type ScoredChunk } from '@/domains/rag/core/models.js';
import { RAGService } from '@/domains/rag/rag-service.js';
import { SqliteVectorStore } from '@/domains/rag/vectorstore/sqlite.js';
import { HashEmbedder, MemorySource, createTestConfig, createTestRag, hashVector, type TestRag } from '../helpers/test-utils.js';

const OLD_X = 'Alpha version of the x document.';
const NEW_X = 'Gamma version of the x document.';

/**
 * Commits a pending replacement right after the next read on the query path returns
 */
class InterleavingStore extends SqliteVectorStore {
  private pending: DocumentCommit | null = null;

  commitAfterNextRead(commit: DocumentCommit): void {
    this.pending = commit;
  }

  override async nearestNeighbors(query: NearestNeighborQuery): Promise<ScoredChunk[]> {
    const result = await super.nearestNeighbors(query);
    await this.flush();
    return result;
  }

  override async nearestNeighborhood(query: NearestNeighborQuery): Promise<Neighborhood> {
    const result = await super.nearestNeighborhood(query);
    await this.flush();
    return result;
  }

  override async getChunksForDocument(documentId: string): Promise<EmbeddedChunk[]> {
    const result = await super.getChunksForDocument(documentId);
    await this.flush();
    return result;
  }

  private async flush(): Promise<void> {
    const commit = this.pending;
    if (!commit) return;
    this.pending = null;
    await this.replaceDocument(commit);
  }
}

function expectConsistent(hit: RetrievalHit, versions: string[]): void {
  const fullDocument = hit.fullDocument ?? '';
  expect(versions).toContain(fullDocument);
  expect(fullDocument.slice(hit.chunk.startOffset, hit.chunk.endOffset)).toBe(hit.chunk.text);
  expect(hit.context?.find((chunk) => chunk.id === hit.chunk.id)?.text).toBe(hit.chunk.text);
  for (const chunk of hit.context ?? []) {
    expect(fullDocument.slice(chunk.startOffset, chunk.endOffset)).toBe(chunk.text);
  }
}

describe('Retrieval during re-index', () => {
  let service: RAGService | undefined;
  let rag: TestRag | undefined;

  afterEach(async () => {
    await service?.shutdown();
    await rag?.service.shutdown();
    service = undefined;
    rag = undefined;
  });

  test('a commit landing mid-query does not mix versions into one hit', async () => {
    const embedder = new HashEmbedder();
    const store = new InterleavingStore({ databasePath: ':memory:', dimensions: embedder.dimensions });
    service = new RAGService({ embedder, store, source: new MemorySource({ 'x.md': OLD_X }) });
    await service.initialize(createTestConfig());
    await service.index();

    store.commitAfterNextRead({
      documentId: 'x.md',
      contentHash: 'new-hash',
      modifiedAt: new Date('2024-02-01T00:00:00.000Z'),
      embeddingModel: embedder.modelId,
      chunks: [
        {
          id: chunkId('x.md', 0),
          documentId: 'x.md',
          index: 0,
          text: NEW_X,
          startOffset: 0,
          endOffset: NEW_X.length,
          embeddingModel: embedder.modelId,
          vector: hashVector(NEW_X, embedder.dimensions),
        },
      ],
    });

    const results = await service.search({ text: 'alpha version', withContext: true, fullDocument: true });

    expect(results).toHaveLength(1);
    expect(results[0]?.chunk.text).toBe(OLD_X);
    expect(results[0]?.context?.map((chunk) => chunk.text)).toEqual([OLD_X]);
    expect(results[0]?.fullDocument).toBe(OLD_X);
    expect((await store.getChunksForDocument('x.md')).map((chunk) => chunk.text)).toEqual([NEW_X]);
  });

  test('queries running alongside a re-index each see a single version', async () => {
    const oldText = Array.from({ length: 10 }, (_, i) => `Alpha section ${i} with shared words and term${i}.`).join('\n');
    const newText = Array.from({ length: 8 }, (_, i) => `Gamma section ${i} with shared words and item${i}.`).join('\n');
    rag = await createTestRag({ 'x.md': oldText });
    await rag.service.index();
    expect(await rag.service.getChunkCount()).toBeGreaterThan(1);

    rag.source.set('x.md', newText);
    const current = rag;
    const indexing = current.service.index();
    const queries = Array.from({ length: 6 }, () =>
      current.service.search({ text: 'section shared words', topK: 3, withContext: true, fullDocument: true })
    );

    const [summary, results] = await Promise.all([indexing, Promise.all(queries)]);

    expect(summary.documentsIndexed).toBe(1);
    for (const hits of results) {
      expect(hits.length).toBeGreaterThan(0);
      for (const hit of hits) {
        expectConsistent(hit, [oldText, newText]);
      }
    }

    const after = await current.service.search({ text: 'gamma section', topK: 1, withContext: true, fullDocument: true });
    expect(after[0]?.fullDocument).toBe(newText);
  });
});
