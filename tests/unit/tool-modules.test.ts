/**
 * Tool module loading tests
 */

import { describe, test, expect, afterEach } from '@jest/globals';
import { loadToolModules, resolveModuleSpecifier } from '@/app/tool-modules.js';
import { ValidationError } from '@/shared/errors/index.js';
import { createTestRag, type TestRag } from '../helpers/test-utils.js';
import { EchoHandler } from '../helpers/tools.js';

describe('resolveModuleSpecifier', () => {
  test('turns relative and absolute paths into file URLs', () => {
    expect(resolveModuleSpecifier('./tools/weather.js', '/srv/app')).toBe('file:///srv/app/tools/weather.js');
    expect(resolveModuleSpecifier('/opt/tools/weather.js', '/srv/app')).toBe('file:///opt/tools/weather.js');
  });

  test('leaves package names alone', () => {
    expect(resolveModuleSpecifier('docs-rag-extra', '/srv/app')).toBe('docs-rag-extra');
  });
});

describe('loadToolModules', () => {
  let rag: TestRag | undefined;

  afterEach(async () => {
    await rag?.service.shutdown();
    rag = undefined;
  });

  test('builds factories from modules exporting createTools', async () => {
    rag = await createTestRag();
    const requested: string[] = [];
    const modules: Record<string, unknown> = {
      'esm-tools': { createTools: (service: TestRag['service']) => [new EchoHandler(service, 'esm_echo')] },
      'cjs-tools': { default: { createTools: (service: TestRag['service']) => [new EchoHandler(service, 'cjs_echo')] } },
    };

    const factories = await loadToolModules(['esm-tools', 'cjs-tools'], async (specifier) => {
      requested.push(specifier);
      return modules[specifier];
    });

    expect(requested).toEqual(['esm-tools', 'cjs-tools']);
    const service = rag.service;
    expect(factories.flatMap((factory) => factory(service)).map((tool) => tool.definition.name)).toEqual([
      'esm_echo',
      'cjs_echo',
    ]);
  });

  test('skips modules that fail to import or export no createTools', async () => {
    const factories = await loadToolModules(['missing-tools', 'empty-tools'], async (specifier) => {
      if (specifier === 'missing-tools') throw new Error('Cannot find module');
      return { somethingElse: true };
    });

    expect(factories).toEqual([]);
  });

  test('rejects a createTools result that is not a list of tool handlers', async () => {
    rag = await createTestRag();
    const [factory] = await loadToolModules(['broken-tools'], async () => ({
      createTools: () => [{ definition: { name: 'no_schema' }, handle: async () => ({ content: [] }) }],
    }));
    if (!factory) throw new Error('expected a factory');
    const service = rag.service;

    expect(() => factory(service)).toThrow(ValidationError);
    expect(() => factory(service)).toThrow(
      "Tool module 'broken-tools' must return an array of tool handlers from createTools()"
    );
  });
});
