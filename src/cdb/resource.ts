/**
 * Seekable byte storage a reader or writer owns.
 *
 * All access is positional and synchronous: every call either completes or
 * throws before returning.
 */

import {
  closeSync,
  fstatSync,
  ftruncateSync,
  mkdirSync,
  openSync,
  readSync,
  writeSync
} from 'node:fs'
import { dirname } from 'node:path'
import invariant from 'tiny-invariant'
import { CdbIoError, ReadOnlyError } from './errors'
import type { FileMode } from './types'

export interface Resource {
  /** Whether write() and truncate() are allowed */
  readonly writable: boolean
  /** Current length in bytes */
  size(): number
  /** Read exactly `length` bytes at `position`, failing on a short read */
  read(position: number, length: number): Uint8Array
  /** Write all of `data` at `position`, growing the resource as needed */
  write(position: number, data: Uint8Array): void
  /** Cut the resource to `length` bytes */
  truncate(length: number): void
  close(): void
}

const fileFlags: Record<FileMode, string> = {
  read: 'r',
  write: 'w+',
  update: 'r+'
}

/**
 * Resource backed by a file descriptor.
 */
export class FileResource implements Resource {
  readonly writable: boolean
  private fd: number | null

  private constructor(
    private readonly filePath: string,
    fd: number,
    mode: FileMode
  ) {
    this.fd = fd
    this.writable = mode !== 'read'
  }

  static open(filePath: string, mode: FileMode = 'read'): FileResource {
    try {
      if (mode === 'write') {
        mkdirSync(dirname(filePath), { recursive: true })
      }
      const fd = openSync(filePath, fileFlags[mode])
      return new FileResource(filePath, fd, mode)
    } catch (error) {
      throw new CdbIoError(`Could not open ${filePath}`, error)
    }
  }

  getFilePath(): string {
    return this.filePath
  }

  size(): number {
    const fd = this.descriptor()
    try {
      return fstatSync(fd).size
    } catch (error) {
      throw new CdbIoError(`Could not stat ${this.filePath}`, error)
    }
  }

  read(position: number, length: number): Uint8Array {
    const fd = this.descriptor()
    const buffer = new Uint8Array(length)
    let filled = 0
    try {
      while (filled < length) {
        const bytesRead = readSync(
          fd,
          buffer,
          filled,
          length - filled,
          position + filled
        )
        if (bytesRead === 0) {
          break
        }
        filled += bytesRead
      }
    } catch (error) {
      throw new CdbIoError(
        `Could not read ${length} bytes at ${position} from ${this.filePath}`,
        error
      )
    }
    if (filled < length) {
      throw new CdbIoError(
        `Unexpected end of ${this.filePath}: wanted ${length} bytes at ${position}, got ${filled}`
      )
    }
    return buffer
  }

  write(position: number, data: Uint8Array): void {
    const fd = this.writableDescriptor()
    let written = 0
    try {
      while (written < data.length) {
        written += writeSync(
          fd,
          data,
          written,
          data.length - written,
          position + written
        )
      }
    } catch (error) {
      throw new CdbIoError(
        `Could not write ${data.length} bytes at ${position} to ${this.filePath}`,
        error
      )
    }
  }

  truncate(length: number): void {
    const fd = this.writableDescriptor()
    try {
      ftruncateSync(fd, length)
    } catch (error) {
      throw new CdbIoError(
        `Could not truncate ${this.filePath} to ${length} bytes`,
        error
      )
    }
  }

  close(): void {
    if (this.fd === null) {
      return
    }
    const fd = this.fd
    this.fd = null
    try {
      closeSync(fd)
    } catch (error) {
      throw new CdbIoError(`Could not close ${this.filePath}`, error)
    }
  }

  private descriptor(): number {
    if (this.fd === null) {
      throw new CdbIoError(`File ${this.filePath} is closed`)
    }
    return this.fd
  }

  private writableDescriptor(): number {
    if (!this.writable) {
      throw new ReadOnlyError(`File ${this.filePath} was opened read-only`)
    }
    return this.descriptor()
  }
}

const initialCapacity = 4096

/**
 * Resource held in memory. Grows by doubling as bytes are written.
 */
export class MemoryResource implements Resource {
  readonly writable: boolean
  private buffer: Uint8Array
  private length: number
  private closed = false

  constructor(initial?: Uint8Array, options: { writable?: boolean } = {}) {
    this.writable = options.writable ?? true
    this.length = initial?.length ?? 0
    this.buffer = new Uint8Array(Math.max(initialCapacity, this.length))
    if (initial) {
      this.buffer.set(initial)
    }
  }

  /**
   * Copy of the current contents.
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length)
  }

  size(): number {
    this.assertOpen()
    return this.length
  }

  read(position: number, length: number): Uint8Array {
    this.assertOpen()
    if (position + length > this.length) {
      const available = Math.max(0, this.length - position)
      throw new CdbIoError(
        `Unexpected end of buffer: wanted ${length} bytes at ${position}, got ${available}`
      )
    }
    return this.buffer.slice(position, position + length)
  }

  write(position: number, data: Uint8Array): void {
    this.assertWritable()
    const end = position + data.length
    this.ensureCapacity(end)
    this.buffer.set(data, position)
    this.length = Math.max(this.length, end)
  }

  truncate(length: number): void {
    this.assertWritable()
    invariant(length >= 0, 'length must not be negative')
    if (length < this.length) {
      this.buffer.fill(0, length, this.length)
    } else {
      this.ensureCapacity(length)
    }
    this.length = length
  }

  close(): void {
    this.closed = true
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) {
      return
    }
    let capacity = this.buffer.length
    while (capacity < required) {
      capacity *= 2
    }
    const grown = new Uint8Array(capacity)
    grown.set(this.buffer.subarray(0, this.length))
    this.buffer = grown
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new CdbIoError('Buffer is closed')
    }
  }

  private assertWritable(): void {
    this.assertOpen()
    if (!this.writable) {
      throw new ReadOnlyError('Buffer is read-only')
    }
  }
}
