/**
 * Unit tests for the command line front end
 */

import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { parseCommand, run, USAGE } from '@/cli.js';
import { DocsRagApplication } from '@/app/application.js';
import { SqliteVectorStore } from '@/domains/rag/vectorstore/sqlite.js';
import { ValidationError } from '@/shared/errors/index.js';
import { HashEmbedder, MemorySource, createTestConfig } from '../helpers/test-utils.js';

describe('parseCommand', () => {
  test('parses index options', () => {
    expect(parseCommand(['index'])).toEqual({ name: 'index', source: undefined, full: false });
    expect(parseCommand(['index', '--source', 'docs/api', '--full'])).toEqual({
      name: 'index',
      source: 'docs/api',
      full: true,
    });
  });

  test('parses commands without arguments', () => {
    expect(parseCommand(['count'])).toEqual({ name: 'count' });
    expect(parseCommand(['clear'])).toEqual({ name: 'clear' });
    expect(parseCommand(['serve'])).toEqual({ name: 'serve', modules: [] });
    expect(parseCommand(['serve', '--module', './tools/weather.js', '-m', 'docs-rag-extra'])).toEqual({
      name: 'serve',
      modules: ['./tools/weather.js', 'docs-rag-extra'],
    });
    expect(parseCommand([])).toEqual({ name: 'help' });
    expect(parseCommand(['--help'])).toEqual({ name: 'help' });
  });

  test('parses remove with its document id', () => {
    expect(parseCommand(['remove', 'guides/setup.md'])).toEqual({ name: 'remove', documentId: 'guides/setup.md' });
  });

  test('rejects a missing id and unknown commands', () => {
    expect(() => parseCommand(['remove'])).toThrow(ValidationError);
    expect(() => parseCommand(['reindex'])).toThrow("Unknown command 'reindex'");
  });
});

describe('run', () => {
  let output: string[];
  let app: DocsRagApplication;

  beforeEach(() => {
    output = [];
    jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      output.push(String(chunk));
      return true;
    });
    const embedder = new HashEmbedder();
    app = new DocsRagApplication(createTestConfig(), {
      embedder,
      store: new SqliteVectorStore({ databasePath: ':memory:', dimensions: embedder.dimensions }),
      source: new MemorySource({ 'a.md': 'First document.', 'b.md': 'Second document.' }),
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await app.shutdown();
  });

  test('prints usage for help', async () => {
    await expect(run({ name: 'help' }, app)).resolves.toBe(0);
    expect(output).toEqual([`${USAGE}\n`]);
  });

  test('indexes and prints the summary', async () => {
    const code = await run({ name: 'index', full: false }, app);

    expect(code).toBe(0);
    const summary: unknown = JSON.parse(output.join(''));
    expect(summary).toMatchObject({ documentsIndexed: 2, documentsFailed: 0, aborted: false });
  });

  test('counts, removes and clears', async () => {
    await run({ name: 'index', full: false }, app);
    output.length = 0;

    await expect(run({ name: 'count' }, app)).resolves.toBe(0);
    await expect(run({ name: 'remove', documentId: 'a.md' }, app)).resolves.toBe(0);
    await expect(run({ name: 'remove', documentId: 'a.md' }, app)).resolves.toBe(1);
    await expect(run({ name: 'clear' }, app)).resolves.toBe(0);

    expect(output).toEqual([
      '2\n',
      "Removed 'a.md'\n",
      "Document 'a.md' is not in the index\n",
      'Index cleared\n',
    ]);
  });
});
