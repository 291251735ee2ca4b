/**
 * Encoding and decoding of the cdb on-disk structures.
 *
 * All integers are little-endian u32:
 * header   [position:4][slotCount:4] x 256
 * record   [keyLen:4][dataLen:4][key][data]
 * slot     [hash:4][position:4]
 */

import {
  bucketCount,
  headerSize,
  pairSize,
  recordHeaderSize,
  slotSize,
  wordSize
} from './constants'
import type {
  Bytes,
  HeaderEntry,
  RecordHeader,
  SlotEntry
} from './types'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Encode a u32 as 4 little-endian bytes.
 */
export function pack(value: number): Uint8Array {
  const buffer = new Uint8Array(wordSize)
  new DataView(buffer.buffer).setUint32(0, value, true)
  return buffer
}

/**
 * Decode a little-endian u32 at `offset`.
 */
export function unpack(data: Uint8Array, offset = 0): number {
  return new DataView(data.buffer, data.byteOffset).getUint32(offset, true)
}

function writePair(
  view: DataView,
  offset: number,
  first: number,
  second: number
): void {
  view.setUint32(offset, first, true)
  view.setUint32(offset + wordSize, second, true)
}

/**
 * Serialize the 256 header entries into the 2048-byte header.
 */
export function serializeHeader(entries: HeaderEntry[]): Uint8Array {
  const buffer = new Uint8Array(headerSize)
  const view = new DataView(buffer.buffer)
  entries.forEach((entry, i) => {
    writePair(view, i * pairSize, entry.position, entry.slotCount)
  })
  return buffer
}

/**
 * Deserialize the 2048-byte header.
 */
export function deserializeHeader(data: Uint8Array): HeaderEntry[] {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const entries: HeaderEntry[] = []
  for (let i = 0; i < bucketCount; i++) {
    entries.push({
      position: view.getUint32(i * pairSize, true),
      slotCount: view.getUint32(i * pairSize + wordSize, true)
    })
  }
  return entries
}

export function serializeRecordHeader(
  keyLength: number,
  dataLength: number
): Uint8Array {
  const buffer = new Uint8Array(recordHeaderSize)
  writePair(new DataView(buffer.buffer), 0, keyLength, dataLength)
  return buffer
}

export function deserializeRecordHeader(data: Uint8Array): RecordHeader {
  return {
    keyLength: unpack(data, 0),
    dataLength: unpack(data, wordSize)
  }
}

/**
 * Serialize a whole record: header, key and value back to back, no padding.
 */
export function serializeRecord(key: Uint8Array, value: Uint8Array): Uint8Array {
  const buffer = new Uint8Array(recordHeaderSize + key.length + value.length)
  buffer.set(serializeRecordHeader(key.length, value.length), 0)
  buffer.set(key, recordHeaderSize)
  buffer.set(value, recordHeaderSize + key.length)
  return buffer
}

/**
 * Serialize a hash table. `null` entries become empty (0, 0) slots.
 */
export function serializeSlots(table: (SlotEntry | null)[]): Uint8Array {
  const buffer = new Uint8Array(table.length * slotSize)
  const view = new DataView(buffer.buffer)
  table.forEach((slot, i) => {
    if (slot) {
      writePair(view, i * slotSize, slot.hash, slot.position)
    }
  })
  return buffer
}

/**
 * Deserialize consecutive slots. Trailing bytes short of a full slot are
 * ignored.
 */
export function deserializeSlots(data: Uint8Array): SlotEntry[] {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const slots: SlotEntry[] = []
  for (let offset = 0; offset + slotSize <= data.length; offset += slotSize) {
    slots.push({
      hash: view.getUint32(offset, true),
      position: view.getUint32(offset + wordSize, true)
    })
  }
  return slots
}

export function deserializeSlot(data: Uint8Array): SlotEntry {
  return { hash: unpack(data, 0), position: unpack(data, wordSize) }
}

/**
 * Strings are stored as their UTF-8 bytes.
 */
export function toBytes(input: Bytes): Uint8Array {
  return typeof input === 'string' ? encoder.encode(input) : input
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false
    }
  }
  return true
}

/**
 * Decode bytes as UTF-8, replacing invalid sequences with U+FFFD.
 */
export function lossyString(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}
