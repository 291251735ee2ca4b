/**
 * Reading records back from a resource.
 */

import { headerSize, recordHeaderSize } from './constants'
import { CorruptDatabaseError } from './errors'
import { deserializeRecordHeader } from './format'
import type { Resource } from './resource'
import type { CdbItem, RecordHeader } from './types'

/**
 * Read the (keyLen, dataLen) prefix of the record at `position`.
 * With `validate`, the whole record must end at or before `limit`.
 */
export function readRecordHeader(
  resource: Resource,
  position: number,
  limit: number,
  validate: boolean
): RecordHeader {
  if (validate && (position < headerSize || position + recordHeaderSize > limit)) {
    throw new CorruptDatabaseError(
      `record at ${position} lies outside ${headerSize}..${limit}`
    )
  }
  const header = deserializeRecordHeader(
    resource.read(position, recordHeaderSize)
  )
  if (
    validate &&
    position + recordHeaderSize + header.keyLength + header.dataLength > limit
  ) {
    throw new CorruptDatabaseError(
      `record at ${position} (key ${header.keyLength} bytes, data ${header.dataLength} bytes) runs past ${limit}`
    )
  }
  return header
}

/**
 * Total on-disk size of a record.
 */
export function recordSize(header: RecordHeader): number {
  return recordHeaderSize + header.keyLength + header.dataLength
}

export function readKey(
  resource: Resource,
  position: number,
  header: RecordHeader
): Uint8Array {
  return resource.read(position + recordHeaderSize, header.keyLength)
}

export function readValue(
  resource: Resource,
  position: number,
  header: RecordHeader
): Uint8Array {
  return resource.read(
    position + recordHeaderSize + header.keyLength,
    header.dataLength
  )
}

/**
 * Read a whole record in a single call.
 */
export function readItem(
  resource: Resource,
  position: number,
  header: RecordHeader
): CdbItem {
  const body = resource.read(
    position + recordHeaderSize,
    header.keyLength + header.dataLength
  )
  return {
    key: body.slice(0, header.keyLength),
    value: body.slice(header.keyLength)
  }
}
