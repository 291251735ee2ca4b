import { rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileExtension } from '../constants'

/**
 * Generate a unique test file path with a prefix.
 */
export function createTestPath(prefix: string): string {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
  return join(tmpdir(), `test-${prefix}-${id}${fileExtension}`)
}

/**
 * Clean up test files and directories.
 */
export async function cleanup(paths: string[]): Promise<void> {
  for (const path of paths) {
    await rm(path, { force: true, recursive: true })
  }
}

/**
 * Flip a single byte in a byte array at the specified index.
 */
export function flipByte(data: Uint8Array, index: number): void {
  if (index >= 0 && index < data.length) {
    data[index] = data[index] ^ 0xff
  }
}

const decoder = new TextDecoder()

export function text(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}

export function texts(values: Uint8Array[]): string[] {
  return values.map(text)
}
