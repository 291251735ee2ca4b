/**
 * Types for the constant database reader and writer.
 */

/**
 * Keys and values may be given as raw bytes or as strings (UTF-8 encoded).
 */
export type Bytes = Uint8Array | string

/**
 * One of the 256 header entries.
 * Describes where a bucket's hash table lives and how many slots it has.
 */
export interface HeaderEntry {
  /** Byte offset of the bucket's hash table */
  position: number
  /** Number of 8-byte slots in the table (always even) */
  slotCount: number
}

/**
 * A (hash, record position) pair, as kept by the writer before finalize
 * and as stored in a hash table slot.
 */
export interface SlotEntry {
  /** Full 32-bit hash of the record key */
  hash: number
  /** Byte offset of the record, 0 for an empty slot */
  position: number
}

/**
 * Per-bucket lists of slot entries, 256 of them, in insertion order.
 */
export type BucketIndex = SlotEntry[][]

/**
 * (keyLen, dataLen) prefix of a stored record.
 */
export interface RecordHeader {
  keyLength: number
  dataLength: number
}

/**
 * A stored (key, value) record.
 */
export interface CdbItem {
  key: Uint8Array
  value: Uint8Array
}

/**
 * Options for opening a reader.
 */
export interface ReaderOptions {
  /**
   * Check every decoded length and pointer against the resource size
   * before reading (default: true). Out of range values raise
   * CorruptDatabaseError instead of being trusted.
   */
  validate?: boolean
}

/**
 * Options for opening a database file for reading.
 */
export interface OpenFileOptions extends ReaderOptions {
  /** Open the file read-write so the reader can be turned into a writer (default: false) */
  writable?: boolean
}

/**
 * How a file resource is opened.
 * - read: read-only, must exist
 * - write: read-write, created or truncated
 * - update: read-write, must exist, contents kept
 */
export type FileMode = 'read' | 'write' | 'update'

/**
 * Lifecycle of a writer.
 */
export type WriterState = 'building' | 'finalized' | 'released'
