/**
 * Unit tests for ChunkingService
 */

import { describe, test, expect } from '@jest/globals';
import { ChunkingService, reconstructText } from '@/domains/rag/services/chunking.js';
import { ValidationError } from '@/shared/errors/index.js';

describe('ChunkingService', () => {
  describe('configuration', () => {
    test('rejects overlap equal to chunk size', () => {
      expect(() => new ChunkingService({ chunkSize: 100, chunkOverlap: 100, minChunkSize: 10 })).toThrow(
        ValidationError
      );
    });

    test('rejects non-positive chunk size', () => {
      expect(() => ChunkingService.validate({ chunkSize: 0, chunkOverlap: 0, minChunkSize: 1 })).toThrow(
        'chunkSize must be a positive integer, got 0'
      );
    });

    test('rejects minimum chunk size larger than chunk size', () => {
      expect(() => ChunkingService.validate({ chunkSize: 50, chunkOverlap: 5, minChunkSize: 51 })).toThrow(
        'minChunkSize must be an integer in [1, chunkSize], got 51'
      );
    });

    test('reports the offending field', () => {
      try {
        ChunkingService.validate({ chunkSize: 10, chunkOverlap: -1, minChunkSize: 1 });
        throw new Error('expected validation to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.context['field']).toBe('chunkOverlap');
        }
      }
    });
  });

  describe('chunkText', () => {
    test('splits unbroken text into overlapping windows', () => {
      const chunker = new ChunkingService({ chunkSize: 500, chunkOverlap: 50, minChunkSize: 50 });
      const text = 'a'.repeat(1200);

      const chunks = chunker.chunkText('doc.txt', text);

      expect(chunks.map((chunk) => [chunk.startOffset, chunk.endOffset])).toEqual([
        [0, 500],
        [450, 950],
        [900, 1200],
      ]);
      expect(chunks.map((chunk) => chunk.index)).toEqual([0, 1, 2]);
      expect(chunks.every((chunk) => chunk.documentId === 'doc.txt')).toBe(true);
    });

    test('returns no chunks for empty or whitespace-only text', () => {
      const chunker = new ChunkingService({ chunkSize: 100, chunkOverlap: 10, minChunkSize: 10 });

      expect(chunker.chunkText('empty.txt', '')).toEqual([]);
      expect(chunker.chunkText('blank.txt', '  \n\t\n ')).toEqual([]);
    });

    test('keeps short text in a single chunk', () => {
      const chunker = new ChunkingService({ chunkSize: 100, chunkOverlap: 10, minChunkSize: 10 });

      expect(chunker.chunkText('short.md', 'Just a few words.')).toEqual([
        { documentId: 'short.md', index: 0, text: 'Just a few words.', startOffset: 0, endOffset: 17 },
      ]);
    });

    test('prefers paragraph breaks, then whitespace, over hard cuts', () => {
      const chunker = new ChunkingService({ chunkSize: 20, chunkOverlap: 5, minChunkSize: 5 });
      const text = 'aaaa bbbb.\n\ncccc dddd eeee ffff';

      const chunks = chunker.chunkText('notes.txt', text);

      expect(chunks.map((chunk) => chunk.text)).toEqual(['aaaa bbbb.\n\n', 'bb.\n\ncccc dddd eeee ', 'eeee ffff']);
      expect(chunks.map((chunk) => [chunk.startOffset, chunk.endOffset])).toEqual([
        [0, 12],
        [7, 27],
        [22, 31],
      ]);
    });

    test('cuts after a sentence end when no line break is available', () => {
      const chunker = new ChunkingService({ chunkSize: 30, chunkOverlap: 0, minChunkSize: 5 });
      const text = 'One short line. Another sentence follows here.';

      const chunks = chunker.chunkText('sentences.txt', text);

      expect(chunks[0]?.text).toBe('One short line. ');
      expect(chunks[1]?.text).toBe('Another sentence follows here.');
    });

    test('chunk i+1 starts with the last overlap characters of chunk i', () => {
      const chunker = new ChunkingService({ chunkSize: 40, chunkOverlap: 8, minChunkSize: 10 });
      const text = Array.from({ length: 30 }, (_, i) => `word${i}`).join(' ');

      const chunks = chunker.chunkText('words.txt', text);

      expect(chunks.length).toBeGreaterThan(1);
      for (let i = 1; i < chunks.length; i++) {
        const previous = chunks[i - 1];
        const current = chunks[i];
        if (!previous || !current) throw new Error('missing chunk');
        expect(current.startOffset).toBe(previous.endOffset - 8);
        expect(current.text.startsWith(previous.text.slice(-8))).toBe(true);
        expect(current.text.length).toBeLessThanOrEqual(40);
      }
    });

    test('covers every character and reconstructs the original text', () => {
      const chunker = new ChunkingService({ chunkSize: 64, chunkOverlap: 16, minChunkSize: 16 });
      const text = [
        'Indexing turns files into searchable chunks.',
        '',
        'Each chunk keeps its character offsets. Overlap repeats a little context!',
        'Retrieval ranks chunks by similarity? It does.',
        '',
        'Short tail.',
      ].join('\n');

      const chunks = chunker.chunkText('guide.md', text);

      expect(chunks[0]?.startOffset).toBe(0);
      expect(chunks[chunks.length - 1]?.endOffset).toBe(text.length);
      for (const chunk of chunks) {
        expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset));
      }
      expect(reconstructText(chunks)).toBe(text);
    });

    test('never cuts between the halves of a surrogate pair', () => {
      const chunker = new ChunkingService({ chunkSize: 500, chunkOverlap: 50, minChunkSize: 50 });
      const text = 'a' + '\u{1F600}'.repeat(600);

      const chunks = chunker.chunkText('emoji.txt', text);

      expect(chunks.map((chunk) => [chunk.startOffset, chunk.endOffset])).toEqual([
        [0, 499],
        [449, 949],
        [899, 1201],
      ]);
      for (const chunk of chunks) {
        expect(chunk.text.charCodeAt(0)).not.toBe(0xde00);
        expect(chunk.text.charCodeAt(chunk.text.length - 1)).not.toBe(0xd83d);
      }
      expect(reconstructText(chunks)).toBe(text);
    });

    test('widens the overlap by one unit rather than start inside a surrogate pair', () => {
      const chunker = new ChunkingService({ chunkSize: 500, chunkOverlap: 51, minChunkSize: 50 });
      const text = 'a' + '\u{1F600}'.repeat(600);

      const chunks = chunker.chunkText('emoji.txt', text);

      expect(chunks.map((chunk) => [chunk.startOffset, chunk.endOffset])).toEqual([
        [0, 499],
        [447, 947],
        [895, 1201],
      ]);
      expect(chunks.every((chunk) => chunk.text === text.slice(chunk.startOffset, chunk.endOffset))).toBe(true);
      expect(reconstructText(chunks)).toBe(text);
    });

    test('is deterministic', () => {
      const chunker = new ChunkingService({ chunkSize: 50, chunkOverlap: 10, minChunkSize: 10 });
      const text = 'The same input always yields the same chunks. '.repeat(8);

      expect(chunker.chunkText('a.txt', text)).toEqual(chunker.chunkText('a.txt', text));
    });
  });

  describe('reconstructText', () => {
    test('orders chunks by index before joining', () => {
      const chunker = new ChunkingService({ chunkSize: 500, chunkOverlap: 50, minChunkSize: 50 });
      const text = 'b'.repeat(1200);
      const chunks = chunker.chunkText('doc.txt', text).reverse();

      expect(reconstructText(chunks)).toBe(text);
    });
  });
});
