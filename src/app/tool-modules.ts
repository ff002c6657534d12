/**
 * Tool modules named on the command line
 * A module exports `createTools(ragService)` returning MCP tool handlers.
 */

import path from 'path'
import { pathToFileURL } from 'url'
import { ToolSchema } from '@modelcontextprotocol/sdk/types.js'
import type { ToolFactory, ToolHandler } from '@/domains/mcp/index.js'
import { ErrorUtils, ValidationError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

export type ModuleImporter = (specifier: string) => Promise<unknown>

const importModule: ModuleImporter = (specifier) => import(specifier)

/**
 * Relative and absolute paths resolve against the working directory; anything else is a package name
 */
export function resolveModuleSpecifier(specifier: string, cwd = process.cwd()): string {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href
  }
  return specifier
}

function isToolHandler(value: unknown): value is ToolHandler {
  if (typeof value !== 'object' || value === null) return false
  if (!('definition' in value) || !('handle' in value)) return false
  return typeof value.handle === 'function' && ToolSchema.safeParse(value.definition).success
}

function toFactory(specifier: string, loaded: unknown): ToolFactory | null {
  const candidates = [loaded]
  // CommonJS modules come back wrapped in `default`
  if (typeof loaded === 'object' && loaded !== null && 'default' in loaded) {
    candidates.push(loaded.default)
  }

  for (const candidate of candidates) {
    if (typeof candidate !== 'object' || candidate === null || !('createTools' in candidate)) continue
    const { createTools } = candidate
    if (typeof createTools !== 'function') continue

    return (ragService) => {
      const tools: unknown = createTools(ragService)
      if (!Array.isArray(tools) || !tools.every(isToolHandler)) {
        throw new ValidationError(
          `Tool module '${specifier}' must return an array of tool handlers from createTools()`,
          'module',
          { module: specifier }
        )
      }
      return tools
    }
  }
  return null
}

/**
 * Imports each module; ones that fail to load or export no createTools are logged and skipped
 */
export async function loadToolModules(
  specifiers: readonly string[],
  importer: ModuleImporter = importModule
): Promise<ToolFactory[]> {
  const factories: ToolFactory[] = []

  for (const specifier of specifiers) {
    let loaded: unknown
    try {
      loaded = await importer(resolveModuleSpecifier(specifier))
    } catch (error) {
      logger.error(`❌ Failed to load tool module '${specifier}'`, error, {
        component: 'ToolModules',
        module: specifier,
        reason: ErrorUtils.message(error),
      })
      continue
    }

    const factory = toFactory(specifier, loaded)
    if (!factory) {
      logger.warn(`⚠️ Tool module '${specifier}' exports no createTools function`, {
        component: 'ToolModules',
        module: specifier,
      })
      continue
    }

    factories.push(factory)
    logger.info(`🧩 Loaded tool module '${specifier}'`, { component: 'ToolModules', module: specifier })
  }

  return factories
}
