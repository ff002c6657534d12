#!/usr/bin/env node
/**
 * docs-rag command line
 *
 *   docs-rag index [--source DIR] [--full]
 *   docs-rag count
 *   docs-rag remove <document-id>
 *   docs-rag clear
 *   docs-rag serve [--module PATH]...
 */

import 'dotenv/config'
import { parseArgs } from 'util'
import { DocsRagApplication } from '@/app/application.js'
import { loadToolModules } from '@/app/tool-modules.js'
import { ConfigFactory } from '@/shared/config/config-factory.js'
import { ErrorUtils, ValidationError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

export type CliCommand =
  | { name: 'index'; source?: string; full: boolean }
  | { name: 'count' }
  | { name: 'remove'; documentId: string }
  | { name: 'clear' }
  | { name: 'serve'; modules: string[] }
  | { name: 'help' }

export const USAGE = `Usage: docs-rag <command>

Commands:
  index [--source DIR] [--full]   Index documents (incremental unless --full)
  count                           Print the number of indexed documents
  remove <document-id>            Remove one document from the index
  clear                           Remove every document from the index
  serve [--module PATH]...        Start the MCP server on stdio, adding tools from each module`

export function parseCommand(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      source: { type: 'string', short: 's' },
      full: { type: 'boolean', default: false },
      module: { type: 'string', short: 'm', multiple: true },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  })

  const [command, ...rest] = positionals
  if (values.help || command === undefined || command === 'help') {
    return { name: 'help' }
  }

  switch (command) {
    case 'index':
      return { name: 'index', source: values.source, full: values.full ?? false }
    case 'count':
    case 'clear':
      return { name: command }
    case 'serve':
      return { name: 'serve', modules: values.module ?? [] }
    case 'remove': {
      const documentId = rest[0]
      if (!documentId) {
        throw new ValidationError('remove needs a document id', 'documentId')
      }
      return { name: 'remove', documentId }
    }
    default:
      throw new ValidationError(`Unknown command '${command}'`, 'command', { command })
  }
}

function print(value: unknown): void {
  process.stdout.write(typeof value === 'string' ? `${value}\n` : `${JSON.stringify(value, null, 2)}\n`)
}

/**
 * Runs one command to completion and returns the exit code.
 * `serve` resolves once the server is connected and keeps running until a signal arrives.
 */
export async function run(command: CliCommand, app: DocsRagApplication): Promise<number> {
  if (command.name === 'help') {
    print(USAGE)
    return 0
  }

  await app.initialize()
  const rag = app.ragService

  switch (command.name) {
    case 'index': {
      const controller = new AbortController()
      const onSigint = () => {
        logger.warn('⏹️ Interrupt received, finishing in-flight documents...', { component: 'CLI' })
        controller.abort()
      }
      process.once('SIGINT', onSigint)
      try {
        const summary = await rag.index({
          sourceRoot: command.source,
          incremental: !command.full,
          signal: controller.signal,
        })
        print(summary)
        return summary.documentsFailed > 0 || summary.aborted ? 1 : 0
      } finally {
        process.removeListener('SIGINT', onSigint)
      }
    }
    case 'count':
      print(String(await rag.getDocumentCount()))
      return 0
    case 'remove': {
      const removed = await rag.removeDocument(command.documentId)
      print(removed ? `Removed '${command.documentId}'` : `Document '${command.documentId}' is not in the index`)
      return removed ? 0 : 1
    }
    case 'clear':
      await rag.clear()
      print('Index cleared')
      return 0
    case 'serve':
      await app.serve()
      return 0
  }
}

async function main(): Promise<void> {
  let command: CliCommand
  try {
    command = parseCommand(process.argv.slice(2))
  } catch (error) {
    process.stderr.write(`${ErrorUtils.message(error)}\n\n${USAGE}\n`)
    process.exit(2)
  }

  const config = ConfigFactory.getCurrentConfig()
  const extraTools = command.name === 'serve' ? await loadToolModules(command.modules) : []
  const app = new DocsRagApplication(config, {}, { extraTools })

  const shutdown = async (reason: string, code: number) => {
    logger.info(`Received ${reason}, shutting down...`, { component: 'CLI' })
    try {
      await app.shutdown()
    } catch (error) {
      logger.error('Error during shutdown', error, { component: 'CLI' })
    }
    process.exit(code)
  }

  try {
    const code = await run(command, app)
    if (command.name === 'serve') {
      process.once('SIGINT', () => void shutdown('SIGINT', 0))
      process.once('SIGTERM', () => void shutdown('SIGTERM', 0))
      process.stdin.once('end', () => void shutdown('stdin close', 0))
      return
    }
    await app.shutdown()
    process.exit(code)
  } catch (error) {
    logger.fatal('docs-rag failed', error, { component: 'CLI', command: command.name })
    process.stderr.write(`${ErrorUtils.message(error)}\n`)
    await shutdown('failure', 1)
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal('Fatal error', error)
    process.exit(1)
  })
}
