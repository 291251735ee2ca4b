/**
 * Formatting helpers shared by the CLI commands.
 */

import { lossyString, Reader } from '../cdb'
import type { CdbItem } from '../cdb'

export const defaultCount = 10

/**
 * Render bytes as a quoted string, replacing invalid UTF-8.
 */
export function quote(bytes: Uint8Array | string): string {
  return JSON.stringify(typeof bytes === 'string' ? bytes : lossyString(bytes))
}

export function formatItem(item: CdbItem): string {
  return `${quote(item.key)}: ${quote(item.value)}`
}

/**
 * Lines printed by `get` for the values found under a key.
 */
export function formatValues(key: string, values: Uint8Array[]): string[] {
  if (values.length === 0) {
    return [`There're no values under ${quote(key)}`]
  }
  if (values.length === 1) {
    return [`${quote(key)}: ${quote(values[0])}`]
  }
  return [
    `Values under key ${quote(key)}`,
    ...values.map((value) => `    ${quote(value)}`)
  ]
}

/**
 * COUNT argument of `top` and `tail`. Missing or 0 means the default.
 */
export function parseCount(input: string | undefined): number {
  if (input === undefined) {
    return defaultCount
  }
  if (!/^\d+$/.test(input)) {
    throw new Error(`COUNT must be a non-negative integer, got "${input}"`)
  }
  const count = Number(input)
  return count === 0 ? defaultCount : count
}

/**
 * How many records `tail` skips before printing.
 */
export function tailSkip(size: number, count: number): number {
  return size - Math.min(size, count)
}

/**
 * Decode a hex-encoded key as given to `get --encoded`.
 */
export function decodeHexKey(input: string): Uint8Array {
  if (input.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(input)) {
    throw new Error(`Encoded key must be an even-length hex string, got "${input}"`)
  }
  const bytes = new Uint8Array(input.length / 2)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(input.slice(i * 2, i * 2 + 2), 16)
  }
  return bytes
}

/**
 * Items from `skip` up to `skip + count` in storage order.
 */
export function* slice(
  items: Iterable<CdbItem>,
  skip: number,
  count: number = Infinity
): Generator<CdbItem> {
  let index = 0
  for (const item of items) {
    if (index >= skip + count) {
      return
    }
    if (index >= skip) {
      yield item
    }
    index++
  }
}

/**
 * Open a database for reading, or report why not and exit.
 */
export function openReader(file: string): Reader {
  try {
    return Reader.openFile(file)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`Could not use ${quote(file)} as a readonly CDB: ${message}`)
    process.exit(1)
  }
}
