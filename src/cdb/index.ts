/**
 * Constant database module - reader, writer and on-disk format.
 */

// Main classes
export { Reader } from './reader'
export { Writer, buildHashTable } from './writer'
export { ItemIterator } from './item-iterator'
export { FileResource, MemoryResource } from './resource'
export type { Resource } from './resource'

// Errors
export {
  CdbError,
  CdbTooSmallError,
  KeyNotFoundError,
  CdbIoError,
  CorruptDatabaseError,
  CdbTooLargeError,
  ReadOnlyError,
  WriterFinalizedError,
  ReleasedError
} from './errors'
export type { CdbErrorKind } from './errors'

// Types
export type {
  Bytes,
  HeaderEntry,
  SlotEntry,
  BucketIndex,
  RecordHeader,
  CdbItem,
  ReaderOptions,
  OpenFileOptions,
  FileMode,
  WriterState
} from './types'

// Constants
export {
  bucketCount,
  headerSize,
  slotSize,
  recordHeaderSize,
  maxOffset,
  fileExtension
} from './constants'

// Hashing and serialization utilities
export { hash, bucketOf, initialSlot } from './hash'
export {
  pack,
  unpack,
  serializeHeader,
  deserializeHeader,
  serializeRecord,
  serializeRecordHeader,
  deserializeRecordHeader,
  serializeSlots,
  deserializeSlots,
  toBytes,
  bytesEqual,
  lossyString
} from './format'
