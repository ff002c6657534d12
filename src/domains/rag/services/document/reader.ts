import { extname } from 'path'
import { Readable } from 'stream'
import { Document } from '@langchain/core/documents'
import { extractText, getDocumentProxy } from 'unpdf'
import mammoth from 'mammoth'
import csv from 'csv-parser'
import type { RawFile } from '@/domains/rag/core/interfaces.js'
import { ErrorUtils, LoadError } from '@/shared/errors/index.js'

export type FileType = 'txt' | 'md' | 'json' | 'csv' | 'html' | 'xml' | 'docx' | 'pdf'

const EXTENSION_TYPES: Record<string, FileType> = {
  txt: 'txt',
  text: 'txt',
  log: 'txt',
  md: 'md',
  markdown: 'md',
  json: 'json',
  csv: 'csv',
  html: 'html',
  htm: 'html',
  xml: 'xml',
  docx: 'docx',
  pdf: 'pdf',
}

const ENTITIES: Record<string, string> = {
  nbsp: ' ',
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
}

export interface ReaderMetadata {
  source: string
  fileType: FileType
  [key: string]: unknown
}

export function detectFileType(id: string): FileType | null {
  const extension = extname(id).slice(1).toLowerCase()
  return EXTENSION_TYPES[extension] ?? null
}

/**
 * Unifies line endings. Every converter's output passes through here.
 */
export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, '\n')
}

/**
 * Converts raw file bytes into plain text, picking the converter from the file extension
 */
export class FileReader {
  static supportedExtensions(): string[] {
    return Object.keys(EXTENSION_TYPES)
  }

  async read(file: RawFile): Promise<Document<ReaderMetadata>> {
    const fileType = detectFileType(file.id)
    if (!fileType) {
      throw new LoadError(`Unsupported file format: ${file.id}`, file.id, 'unsupported')
    }

    try {
      const { text, metadata } = await this.convert(fileType, file.bytes)
      return new Document<ReaderMetadata>({
        pageContent: normalizeText(text),
        metadata: { ...metadata, source: file.id, fileType },
      })
    } catch (error) {
      throw new LoadError(
        `Failed to read ${fileType} file ${file.id}: ${ErrorUtils.message(error)}`,
        file.id,
        'unreadable',
        ErrorUtils.toError(error)
      )
    }
  }

  private async convert(
    fileType: FileType,
    bytes: Uint8Array
  ): Promise<{ text: string; metadata: Record<string, unknown> }> {
    switch (fileType) {
      case 'pdf':
        return this.readPdf(bytes)
      case 'docx':
        return this.readDocx(bytes)
      case 'csv':
        return this.readCsv(bytes)
      case 'json':
        return { text: this.formatJson(this.decode(bytes)), metadata: {} }
      case 'html':
        return { text: this.stripHtml(this.decode(bytes)), metadata: {} }
      case 'xml':
        return { text: this.stripXml(this.decode(bytes)), metadata: {} }
      case 'md':
      case 'txt':
        return { text: this.decode(bytes), metadata: {} }
    }
  }

  /**
   * Strict utf-8; invalid byte sequences throw
   */
  private decode(bytes: Uint8Array): string {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  }

  private async readPdf(bytes: Uint8Array): Promise<{ text: string; metadata: Record<string, unknown> }> {
    // pdf.js takes ownership of the buffer it is given
    const pdf = await getDocumentProxy(new Uint8Array(bytes))
    const { totalPages, text } = await extractText(pdf, { mergePages: true })
    return { text: text.trim(), metadata: { pages: totalPages } }
  }

  private async readDocx(bytes: Uint8Array): Promise<{ text: string; metadata: Record<string, unknown> }> {
    const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) })
    return { text: result.value.trim(), metadata: { warnings: result.messages.length } }
  }

  private readCsv(bytes: Uint8Array): Promise<{ text: string; metadata: Record<string, unknown> }> {
    const content = this.decode(bytes)
    const rows: Record<string, string>[] = []

    return new Promise((resolve, reject) => {
      Readable.from([content])
        .pipe(csv())
        .on('data', (row: Record<string, string>) => rows.push(row))
        .on('end', () => {
          resolve({
            text: this.formatCsvData(rows),
            metadata: { rowCount: rows.length, columns: rows.length > 0 ? Object.keys(rows[0] ?? {}) : [] },
          })
        })
        .on('error', reject)
    })
  }

  // One "column: value" line per cell, rows separated by a blank line
  private formatCsvData(rows: Record<string, string>[]): string {
    return rows
      .map((row) =>
        Object.entries(row)
          .map(([key, value]) => `${key}: ${value}`)
          .join('\n')
      )
      .join('\n\n')
  }

  private formatJson(content: string): string {
    try {
      const parsed: unknown = JSON.parse(content)
      return JSON.stringify(parsed, null, 2)
    } catch {
      return content
    }
  }

  private stripHtml(content: string): string {
    const text = content
      .replace(/<script[\s\S]*?<\/script>/gi, '')
      .replace(/<style[\s\S]*?<\/style>/gi, '')
      .replace(/<!--[\s\S]*?-->/g, '')
      .replace(/<br\s*\/?>/gi, '\n')
      .replace(/<\/(p|div|h[1-6]|li|tr|section|article)>/gi, '\n\n')
      .replace(/<[^>]*>/g, '')
    return this.decodeEntities(text)
      .replace(/[ \t]+\n/g, '\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim()
  }

  private stripXml(content: string): string {
    const text = content
      .replace(/<\?xml[\s\S]*?\?>/gi, '')
      .replace(/<!--[\s\S]*?-->/g, '')
      .replace(/<[^>]*>/g, '')
    return this.decodeEntities(text).trim()
  }

  private decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
      if (entity.startsWith('#x') || entity.startsWith('#X')) {
        return String.fromCodePoint(Number.parseInt(entity.slice(2), 16))
      }
      if (entity.startsWith('#')) {
        return String.fromCodePoint(Number.parseInt(entity.slice(1), 10))
      }
      return ENTITIES[entity.toLowerCase()] ?? match
    })
  }
}
