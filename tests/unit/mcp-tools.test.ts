/**
 * Unit tests for the MCP tool handlers and registry
 */

import { describe, test, expect, afterEach } from '@jest/globals';
import { createToolRegistry, type ToolHandler, type ToolRegistry } from '@/domains/mcp/index.js';
import { RAGService } from '@/domains/rag/rag-service.js';
import { createTestConfig, createTestRag, type TestRag } from '../helpers/test-utils.js';
import { parseToolPayload } from '../helpers/mcp.js';

const CORPUS = {
  'guides/setup.md': 'Install the server and point it at the documents folder.',
  'notes.txt': 'Chunk overlap keeps context between neighbouring chunks.',
};

const TOOL_NAMES = ['search', 'get_document_count', 'index_documents', 'remove_document'];

describe('MCP tools', () => {
  let rag: TestRag | undefined;

  async function setup(files: Record<string, string> = CORPUS): Promise<ToolRegistry> {
    rag = await createTestRag(files);
    return createToolRegistry(rag.service, rag.config.search);
  }

  afterEach(async () => {
    await rag?.service.shutdown();
    rag = undefined;
  });

  describe('ToolRegistry', () => {
    test('registers the four tools with object input schemas', async () => {
      const registry = await setup();

      expect(registry.getToolNames()).toEqual(TOOL_NAMES);
      expect(registry.getTools().map((tool) => tool.inputSchema.type)).toEqual(['object', 'object', 'object', 'object']);
    });

    test('rejects registering a tool name twice', async () => {
      const registry = await setup();
      const duplicate: ToolHandler = {
        definition: { name: 'search', inputSchema: { type: 'object' } },
        handle: async () => ({ content: [] }),
      };

      expect(() => registry.register(duplicate)).toThrow("Tool 'search' is already registered");
    });

    test('answers unknown tools with the list of available ones', async () => {
      const registry = await setup();

      const { isError, payload } = parseToolPayload(await registry.call('summarize', {}));

      expect(isError).toBe(true);
      expect(payload).toEqual({
        error: 'UnknownTool',
        message: "Tool 'summarize' is not available",
        availableTools: TOOL_NAMES,
        suggestion: 'Use list_tools to see all available tools',
      });
    });
  });

  describe('index_documents', () => {
    test('indexes the documents directory and reports counts', async () => {
      const registry = await setup();

      const { isError, payload } = parseToolPayload(await registry.call('index_documents', {}));

      expect(isError).toBe(false);
      expect(payload).toMatchObject({
        documents_indexed: 2,
        documents_skipped: 0,
        documents_failed: 0,
        chunks_written: 2,
        chunks_deleted: 0,
        failures: [],
        missing: [],
        aborted: false,
        message: 'Indexed 2 document(s), skipped 0, failed 0',
      });
      expect(rag?.source.roots).toEqual(['docs']);
    });

    test('passes source_dir and full through', async () => {
      const registry = await setup();
      await registry.call('index_documents', {});

      const { payload } = parseToolPayload(await registry.call('index_documents', { source_dir: 'elsewhere', full: true }));

      expect(payload).toMatchObject({ documents_indexed: 2, chunks_deleted: 2 });
      expect(rag?.source.roots).toEqual(['docs', 'elsewhere']);
    });

    test('rejects arguments of the wrong type', async () => {
      const registry = await setup();

      const { isError, payload } = parseToolPayload(await registry.call('index_documents', { full: 'yes' }));

      expect(isError).toBe(true);
      expect(payload).toMatchObject({ error: 'InvalidArguments', message: 'full: Expected boolean, received string' });
    });
  });

  describe('search', () => {
    test('tells the caller to index first when the index is empty', async () => {
      const registry = await setup();

      const { isError, payload } = parseToolPayload(await registry.call('search', { query: 'install' }));

      expect(isError).toBe(true);
      expect(payload).toEqual({
        error: 'EmptyIndex',
        message: 'No documents are indexed yet',
        suggestion: 'Index the documents first with `docs-rag index` or the index_documents tool.',
      });
    });

    test('returns ranked results with context by default', async () => {
      const registry = await setup();
      await registry.call('index_documents', {});

      const { isError, payload } = parseToolPayload(
        await registry.call('search', { query: 'Install the server and point it at the documents folder.', limit: 1 })
      );

      expect(isError).toBe(false);
      expect(payload).toMatchObject({
        query: 'Install the server and point it at the documents folder.',
        results_count: 1,
        results: [
          {
            rank: 1,
            document_id: 'guides/setup.md',
            chunk_index: 0,
            content: 'Install the server and point it at the documents folder.',
            start_offset: 0,
            end_offset: 56,
            context: [
              { chunk_index: 0, content: 'Install the server and point it at the documents folder.', is_match: true },
            ],
          },
        ],
        message: "Found 1 result(s) for 'Install the server and point it at the documents folder.'",
      });
    });

    test('returns the full document when asked', async () => {
      const registry = await setup();
      await registry.call('index_documents', {});

      const { payload } = parseToolPayload(
        await registry.call('search', { query: 'chunk overlap', limit: 1, with_context: false, full_document: true })
      );

      expect(payload).toMatchObject({
        results: [{ document_id: 'notes.txt', full_document: CORPUS['notes.txt'] }],
      });
    });

    test('reports no matches above the threshold', async () => {
      const registry = await setup();
      await registry.call('index_documents', {});

      const { isError, payload } = parseToolPayload(
        await registry.call('search', { query: 'zebra', threshold: 0.9 })
      );

      expect(isError).toBe(false);
      expect(payload).toEqual({
        query: 'zebra',
        results_count: 0,
        results: [],
        message: "No results matched 'zebra'",
      });
    });

    test('validates arguments', async () => {
      const registry = await setup();

      const missing = parseToolPayload(await registry.call('search', {}));
      const blank = parseToolPayload(await registry.call('search', { query: '   ' }));
      const limit = parseToolPayload(await registry.call('search', { query: 'x', limit: 0 }));

      expect(missing.payload).toMatchObject({ error: 'InvalidArguments', message: 'query: Required' });
      expect(blank.payload).toMatchObject({ error: 'InvalidArguments', message: 'query: Query parameter is required' });
      expect(limit.payload).toMatchObject({
        error: 'InvalidArguments',
        message: 'limit: Number must be greater than or equal to 1',
      });
    });

    test('reports a service that is not ready', async () => {
      const registry = createToolRegistry(new RAGService(), createTestConfig().search);

      const { isError, payload } = parseToolPayload(await registry.call('search', { query: 'install' }));

      expect(isError).toBe(true);
      expect(payload).toMatchObject({
        error: 'ServiceNotReady',
        code: 'INITIALIZATION_ERROR',
        toolName: 'search',
        message: 'RAGService not initialized. Call initialize() first.',
      });
    });
  });

  describe('get_document_count', () => {
    test('reports documents, chunks and the model', async () => {
      const registry = await setup();
      await registry.call('index_documents', {});

      const { payload } = parseToolPayload(await registry.call('get_document_count', {}));

      expect(payload).toEqual({
        count: 2,
        chunk_count: 2,
        embedding_model: 'hash-embedder-v1',
        indexed_models: ['hash-embedder-v1'],
        message: 'Documents in index: 2',
      });
    });
  });

  describe('remove_document', () => {
    test('removes an indexed document', async () => {
      const registry = await setup();
      await registry.call('index_documents', {});

      const { isError, payload } = parseToolPayload(
        await registry.call('remove_document', { document_id: 'notes.txt' })
      );

      expect(isError).toBe(false);
      expect(payload).toEqual({ removed: true, document_id: 'notes.txt', message: "Removed 'notes.txt' from the index" });
      await expect(rag?.service.getDocumentCount()).resolves.toBe(1);
    });

    test('reports an unknown document', async () => {
      const registry = await setup();

      const { isError, payload } = parseToolPayload(
        await registry.call('remove_document', { document_id: 'missing.md' })
      );

      expect(isError).toBe(true);
      expect(payload).toMatchObject({ error: 'DocumentNotFound', message: "Document 'missing.md' is not in the index" });
    });
  });
});
