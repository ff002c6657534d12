import { createHash } from 'crypto'

/**
 * sha256 of raw content, hex encoded
 */
export function calculateContentHash(content: Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex')
}

export function calculateStringHash(input: string): string {
  return calculateContentHash(Buffer.from(input, 'utf8'))
}
