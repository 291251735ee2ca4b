import { headerSize } from './constants'
import { readItem, readRecordHeader, recordSize } from './records'
import type { Resource } from './resource'
import type { CdbItem } from './types'

/**
 * Cursor over the stored records in storage order.
 *
 * Starts right after the header and stops at the first hash table. The
 * cursor is private to this iterator, so lookups on the owning reader
 * do not disturb it.
 */
export class ItemIterator implements IterableIterator<CdbItem> {
  private offset = headerSize

  constructor(
    private readonly resource: Resource,
    private readonly tableStart: number,
    private readonly validate: boolean,
    private readonly assertOwner: () => void
  ) {}

  next(): IteratorResult<CdbItem> {
    this.assertOwner()

    if (this.offset >= this.tableStart) {
      return { done: true, value: undefined }
    }

    const position = this.offset
    const header = readRecordHeader(
      this.resource,
      position,
      this.tableStart,
      this.validate
    )
    const item = readItem(this.resource, position, header)
    this.offset = position + recordSize(header)

    return { done: false, value: item }
  }

  /**
   * Move the cursor back to the first record.
   */
  rewind(): void {
    this.offset = headerSize
  }

  /**
   * Byte offset of the next record to be read.
   */
  getOffset(): number {
    return this.offset
  }

  [Symbol.iterator](): ItemIterator {
    return this
  }
}
