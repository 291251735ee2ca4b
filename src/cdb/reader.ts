/**
 * Read-only access to a constant database.
 *
 * A lookup costs one read of the in-memory header, a probe through the
 * bucket's hash table, and one read per candidate record.
 */

import invariant from 'tiny-invariant'
import {
  bucketCount,
  emptySlotPosition,
  headerSize,
  slotSize
} from './constants'
import {
  CdbTooSmallError,
  CorruptDatabaseError,
  KeyNotFoundError,
  ReadOnlyError,
  ReleasedError
} from './errors'
import {
  bytesEqual,
  deserializeHeader,
  deserializeSlot,
  deserializeSlots,
  toBytes
} from './format'
import { bucketOf, hash, initialSlot } from './hash'
import { ItemIterator } from './item-iterator'
import { readKey, readRecordHeader, readValue } from './records'
import { FileResource } from './resource'
import type { Resource } from './resource'
import { Writer } from './writer'
import type {
  BucketIndex,
  Bytes,
  CdbItem,
  HeaderEntry,
  OpenFileOptions,
  ReaderOptions,
  RecordHeader
} from './types'

interface MatchedRecord {
  position: number
  header: RecordHeader
}

export class Reader implements Iterable<CdbItem> {
  private resource: Resource | null

  private constructor(
    resource: Resource,
    private readonly header: HeaderEntry[],
    private readonly tableStart: number,
    private readonly length: number,
    private readonly resourceSize: number,
    private readonly validate: boolean
  ) {
    this.resource = resource
  }

  /**
   * Parse the header of the database held by `resource`.
   * The reader takes ownership of the resource.
   */
  static open(resource: Resource, options: ReaderOptions = {}): Reader {
    const validate = options.validate ?? true

    const size = resource.size()
    if (size < headerSize) {
      throw new CdbTooSmallError(size)
    }

    const header = deserializeHeader(resource.read(0, headerSize))
    if (validate) {
      checkHeader(header, size)
    }

    const tableStart = Math.min(...header.map((entry) => entry.position))
    const length = header.reduce(
      (sum, entry) => sum + (entry.slotCount >>> 1),
      0
    )

    return new Reader(resource, header, tableStart, length, size, validate)
  }

  /**
   * Open a database file. Pass `writable: true` to be able to call
   * asWriter() later.
   */
  static openFile(filePath: string, options: OpenFileOptions = {}): Reader {
    const resource = FileResource.open(
      filePath,
      options.writable ? 'update' : 'read'
    )
    try {
      return Reader.open(resource, options)
    } catch (error) {
      resource.close()
      throw error
    }
  }

  /**
   * Number of records, duplicates included.
   */
  size(): number {
    return this.length
  }

  isEmpty(): boolean {
    return this.length === 0
  }

  /**
   * Offset where the records end and the hash tables begin.
   */
  getTableStart(): number {
    return this.tableStart
  }

  /**
   * All values stored under `key`, in insertion order. Empty if the key
   * is not in the database.
   */
  get(key: Bytes): Uint8Array[] {
    const resource = this.owned()
    const values: Uint8Array[] = []
    for (const match of this.matches(resource, toBytes(key))) {
      values.push(readValue(resource, match.position, match.header))
    }
    return values
  }

  /**
   * Value of the first record stored under `key`.
   * Throws KeyNotFoundError if there is none.
   */
  getFirst(key: Bytes): Uint8Array {
    return this.getFromPos(key, 0)
  }

  /**
   * Value of the `occurrence`-th (0-based) record stored under `key`.
   * Throws KeyNotFoundError if the key has fewer records.
   */
  getFromPos(key: Bytes, occurrence: number): Uint8Array {
    invariant(
      Number.isInteger(occurrence) && occurrence >= 0,
      'occurrence must be a non-negative integer'
    )
    const resource = this.owned()

    let seen = 0
    for (const match of this.matches(resource, toBytes(key), occurrence)) {
      if (seen === occurrence) {
        return readValue(resource, match.position, match.header)
      }
      seen++
    }

    throw new KeyNotFoundError(occurrence)
  }

  has(key: Bytes): boolean {
    const { done } = this.matches(this.owned(), toBytes(key)).next()
    return done !== true
  }

  /**
   * Every stored key in storage order, duplicates included.
   */
  keys(): Uint8Array[] {
    return Array.from(this.iterate(), (item) => item.key)
  }

  /**
   * Start a fresh pass over all records from the first one.
   */
  iterate(): ItemIterator {
    return new ItemIterator(
      this.owned(),
      this.tableStart,
      this.validate,
      () => {
        this.owned()
      }
    )
  }

  [Symbol.iterator](): ItemIterator {
    return this.iterate()
  }

  /**
   * Hand the resource over to a Writer so more records can be appended.
   *
   * The hash tables are read back into memory and cut off the end of the
   * resource; the writer writes new ones when it is finalized. This
   * reader cannot be used afterwards.
   */
  asWriter(): Writer {
    const resource = this.owned()
    if (!resource.writable) {
      throw new ReadOnlyError(
        'Cannot turn a reader into a writer: resource was opened read-only'
      )
    }
    if (this.tableStart < headerSize) {
      throw new CorruptDatabaseError(
        `hash tables start at ${this.tableStart}, inside the header`
      )
    }

    const size = resource.size()
    const tables = resource.read(this.tableStart, size - this.tableStart)
    if (this.validate && tables.length % slotSize !== 0) {
      throw new CorruptDatabaseError(
        `hash table region of ${tables.length} bytes is not a whole number of slots`
      )
    }

    const buckets: BucketIndex = Array.from({ length: bucketCount }, () => [])
    for (const slot of deserializeSlots(tables)) {
      if (slot.position === emptySlotPosition) {
        continue
      }
      buckets[bucketOf(slot.hash)].push(slot)
    }
    // Records are appended in put order, so position order is insertion order
    for (const bucket of buckets) {
      bucket.sort((a, b) => a.position - b.position)
    }

    resource.truncate(this.tableStart)
    this.resource = null

    return Writer.withIndex(resource, buckets)
  }

  close(): void {
    if (this.resource === null) {
      return
    }
    const resource = this.resource
    this.resource = null
    resource.close()
  }

  /**
   * Probe the key's bucket and yield every record whose key matches, in
   * the order the writer inserted them.
   */
  private *matches(
    resource: Resource,
    key: Uint8Array,
    occurrence = 0
  ): Generator<MatchedRecord> {
    const h = hash(key)
    const { position: start, slotCount } = this.header[bucketOf(h)]

    // A bucket can't hold more matches than it has slots
    if (occurrence >= slotCount) {
      return
    }

    const first = initialSlot(h, slotCount)
    for (let i = 0; i < slotCount; i++) {
      const slotPosition = start + ((first + i) % slotCount) * slotSize
      const slot = deserializeSlot(resource.read(slotPosition, slotSize))

      if (slot.position === emptySlotPosition) {
        return
      }
      if (slot.hash !== h) {
        continue
      }

      const header = readRecordHeader(
        resource,
        slot.position,
        this.resourceSize,
        this.validate
      )
      if (header.keyLength !== key.length) {
        continue
      }
      if (bytesEqual(readKey(resource, slot.position, header), key)) {
        yield { position: slot.position, header }
      }
    }
  }

  private owned(): Resource {
    if (this.resource === null) {
      throw new ReleasedError('Reader')
    }
    return this.resource
  }
}

/**
 * Every non-empty bucket table must sit between the header and the end of
 * the resource.
 */
function checkHeader(header: HeaderEntry[], size: number): void {
  header.forEach((entry, bucket) => {
    if (entry.slotCount === 0) {
      return
    }
    const end = entry.position + entry.slotCount * slotSize
    if (entry.position < headerSize || end > size) {
      throw new CorruptDatabaseError(
        `bucket ${bucket} table ${entry.position}..${end} lies outside ${headerSize}..${size}`
      )
    }
  })
}
