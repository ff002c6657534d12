import { readdir, readFile, stat } from 'fs/promises'
import { join, relative, sep } from 'path'
import type { FileSource, SourceEntry } from '@/domains/rag/core/interfaces.js'
import { ErrorUtils, LoadError } from '@/shared/errors/index.js'
import { logger } from '@/shared/logger/index.js'

const IGNORED_DIRECTORIES = new Set(['node_modules', 'dist', 'coverage', '__pycache__'])

/**
 * Walks a directory tree on the local filesystem.
 * Hidden entries and build output directories are skipped; siblings are visited in name order.
 */
export class FileSystemSource implements FileSource {
  async *list(root: string): AsyncGenerator<SourceEntry> {
    try {
      const rootStats = await stat(root)
      if (!rootStats.isDirectory()) {
        throw new Error(`${root} is not a directory`)
      }
    } catch (error) {
      throw new LoadError(`Source directory not readable: ${root}`, root, 'unreadable', ErrorUtils.toError(error))
    }

    yield* this.walk(root, root)
  }

  private async *walk(root: string, dir: string): AsyncGenerator<SourceEntry> {
    const entries = await readdir(dir, { withFileTypes: true })
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue
      const fullPath = join(dir, entry.name)

      if (entry.isDirectory()) {
        if (IGNORED_DIRECTORIES.has(entry.name)) continue
        yield* this.walk(root, fullPath)
        continue
      }

      if (!entry.isFile()) continue

      const id = relative(root, fullPath).split(sep).join('/')
      try {
        const [bytes, stats] = await Promise.all([readFile(fullPath), stat(fullPath)])
        yield { id, bytes, modifiedAt: stats.mtime }
      } catch (error) {
        logger.warn('Could not read source file', { documentId: id, filePath: fullPath, error: ErrorUtils.message(error) })
        yield { id, error: ErrorUtils.toError(error) }
      }
    }
  }
}
