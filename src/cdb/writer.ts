/**
 * Builds a constant database.
 *
 * Records are appended as they are put; their (hash, position) pairs are
 * kept per bucket in memory. finalize() lays the pairs out as 256 open
 * addressed hash tables after the records and then fills in the header.
 */

import invariant from 'tiny-invariant'
import { bucketCount, headerSize, maxOffset, slotSize } from './constants'
import {
  CdbTooLargeError,
  CdbTooSmallError,
  ReadOnlyError,
  ReleasedError,
  WriterFinalizedError
} from './errors'
import {
  serializeHeader,
  serializeRecord,
  serializeSlots,
  toBytes
} from './format'
import { bucketOf, hash, initialSlot } from './hash'
import { Reader } from './reader'
import { FileResource } from './resource'
import type { Resource } from './resource'
import type {
  BucketIndex,
  Bytes,
  HeaderEntry,
  ReaderOptions,
  SlotEntry,
  WriterState
} from './types'

export class Writer {
  private resource: Resource | null
  private state: WriterState = 'building'
  private buckets: BucketIndex
  private offset: number
  private count: number

  private constructor(resource: Resource, buckets: BucketIndex, offset: number) {
    this.resource = resource
    this.buckets = buckets
    this.offset = offset
    this.count = buckets.reduce((sum, bucket) => sum + bucket.length, 0)
  }

  /**
   * Start a new database in `resource`, discarding anything already in it.
   * The writer takes ownership of the resource.
   */
  static create(resource: Resource): Writer {
    if (!resource.writable) {
      throw new ReadOnlyError('Cannot create a CDB in a read-only resource')
    }
    if (resource.size() > 0) {
      resource.truncate(0)
    }
    // Placeholder header, overwritten by finalize()
    resource.write(0, new Uint8Array(headerSize))

    return new Writer(resource, emptyBuckets(), headerSize)
  }

  /**
   * Create (or overwrite) a database file.
   */
  static createFile(filePath: string): Writer {
    const resource = FileResource.open(filePath, 'write')
    try {
      return Writer.create(resource)
    } catch (error) {
      resource.close()
      throw error
    }
  }

  /**
   * Resume building a database whose records are already in `resource`
   * and whose hash tables have been removed. `buckets` holds the existing
   * (hash, position) pairs per bucket in insertion order. New records are
   * appended at the current end of the resource.
   */
  static withIndex(resource: Resource, buckets: BucketIndex): Writer {
    invariant(
      buckets.length === bucketCount,
      `buckets must have ${bucketCount} entries`
    )
    if (!resource.writable) {
      throw new ReadOnlyError('Cannot resume a CDB in a read-only resource')
    }
    const size = resource.size()
    if (size < headerSize) {
      throw new CdbTooSmallError(size)
    }

    return new Writer(
      resource,
      buckets.map((bucket) => [...bucket]),
      size
    )
  }

  /**
   * Append a record. Keys don't have to be unique; repeated keys keep
   * their values in put order.
   */
  put(key: Bytes, value: Bytes): void {
    const resource = this.building()
    const keyBytes = toBytes(key)
    const record = serializeRecord(keyBytes, toBytes(value))

    const position = this.offset
    const end = position + record.length
    if (end > maxOffset) {
      throw new CdbTooLargeError(end)
    }

    resource.write(position, record)
    this.offset = end

    const h = hash(keyBytes)
    this.buckets[bucketOf(h)].push({ hash: h, position })
    this.count++
  }

  /**
   * Number of records in the database, including the ones it was resumed
   * with.
   */
  size(): number {
    return this.count
  }

  getState(): WriterState {
    return this.state
  }

  /**
   * Write the hash tables and the header. Further puts are rejected.
   *
   * Must be called (directly, or through close() or asReader()) for the
   * database to be readable. Calling it again is a no-op.
   */
  finalize(): void {
    if (this.state !== 'building') {
      return
    }
    const resource = this.owned()

    const header: HeaderEntry[] = []
    let position = this.offset
    for (const bucket of this.buckets) {
      const table = buildHashTable(bucket)
      const end = position + table.length * slotSize
      if (end > maxOffset) {
        throw new CdbTooLargeError(end)
      }
      header.push({ position, slotCount: table.length })
      resource.write(position, serializeSlots(table))
      position = end
    }
    resource.write(0, serializeHeader(header))

    this.offset = position
    this.buckets = []
    this.state = 'finalized'
  }

  /**
   * Finalize and hand the resource over to a Reader. This writer cannot be
   * used afterwards.
   */
  asReader(options?: ReaderOptions): Reader {
    this.finalize()
    const resource = this.owned()
    this.resource = null
    this.state = 'released'
    return Reader.open(resource, options)
  }

  /**
   * Finalize and close the underlying resource.
   */
  close(): void {
    if (this.resource === null) {
      return
    }
    const resource = this.resource
    try {
      this.finalize()
    } finally {
      this.resource = null
      this.state = 'released'
      resource.close()
    }
  }

  private owned(): Resource {
    if (this.resource === null) {
      throw new ReleasedError('Writer')
    }
    return this.resource
  }

  private building(): Resource {
    const resource = this.owned()
    if (this.state !== 'building') {
      throw new WriterFinalizedError()
    }
    return resource
  }
}

function emptyBuckets(): BucketIndex {
  return Array.from({ length: bucketCount }, () => [])
}

/**
 * Lay out one bucket's entries in a table of twice as many slots, each at
 * its initial slot or the next free one after it (wrapping). Entries are
 * placed in insertion order so lookups see repeated keys in that order.
 */
export function buildHashTable(entries: SlotEntry[]): (SlotEntry | null)[] {
  const slotCount = entries.length * 2
  const table = new Array<SlotEntry | null>(slotCount).fill(null)

  for (const entry of entries) {
    let slot = initialSlot(entry.hash, slotCount)
    while (table[slot] !== null) {
      slot = (slot + 1) % slotCount
    }
    table[slot] = entry
  }

  return table
}
