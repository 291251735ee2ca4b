import { headerSize } from './constants'

export type CdbErrorKind =
  | 'tooSmall'
  | 'keyNotFound'
  | 'io'
  | 'corrupt'
  | 'tooLarge'
  | 'readOnly'
  | 'finalized'
  | 'released'

/**
 * Base class for every error raised by the reader and writer.
 * `kind` can be switched on without instanceof checks.
 */
export class CdbError extends Error {
  constructor(
    public readonly kind: CdbErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'CdbError'
  }
}

/**
 * Error thrown when a resource is too short to hold the 2048-byte header.
 */
export class CdbTooSmallError extends CdbError {
  constructor(public readonly size: number) {
    super(
      'tooSmall',
      `File too small to be a CDB: ${size} bytes, expected at least ${headerSize}`
    )
    this.name = 'CdbTooSmallError'
  }
}

/**
 * Error thrown when a lookup finds no record for the key,
 * or fewer occurrences than requested.
 */
export class KeyNotFoundError extends CdbError {
  constructor(public readonly occurrence: number = 0) {
    super(
      'keyNotFound',
      occurrence === 0
        ? 'The key is not in the CDB'
        : `The key has no occurrence ${occurrence} in the CDB`
    )
    this.name = 'KeyNotFoundError'
  }
}

/**
 * Error thrown when the underlying file or buffer cannot be read, written
 * or truncated. The original error is kept as `cause`.
 */
export class CdbIoError extends CdbError {
  constructor(message: string, cause?: unknown) {
    super(
      'io',
      cause instanceof Error ? `${message}: ${cause.message}` : message,
      { cause }
    )
    this.name = 'CdbIoError'
  }
}

/**
 * Error thrown when a length or pointer decoded from the database points
 * outside the resource.
 */
export class CorruptDatabaseError extends CdbError {
  constructor(message: string) {
    super('corrupt', `Corrupt CDB: ${message}`)
    this.name = 'CorruptDatabaseError'
  }
}

/**
 * Error thrown when a write would move an offset past the 4 GiB limit of
 * the format.
 */
export class CdbTooLargeError extends CdbError {
  constructor(public readonly offset: number) {
    super('tooLarge', `CDB would exceed 4 GiB (offset ${offset})`)
    this.name = 'CdbTooLargeError'
  }
}

/**
 * Error thrown when writing to a resource opened read-only.
 */
export class ReadOnlyError extends CdbError {
  constructor(message: string = 'Cannot write to a read-only resource') {
    super('readOnly', message)
    this.name = 'ReadOnlyError'
  }
}

/**
 * Error thrown when putting records into a writer whose hash tables have
 * already been written.
 */
export class WriterFinalizedError extends CdbError {
  constructor() {
    super('finalized', 'Cannot put into a finalized CDB writer')
    this.name = 'WriterFinalizedError'
  }
}

/**
 * Error thrown when using a reader or writer after it was closed or its
 * resource was handed over by asReader()/asWriter().
 */
export class ReleasedError extends CdbError {
  constructor(owner: 'Reader' | 'Writer') {
    super('released', `${owner} no longer owns its resource`)
    this.name = 'ReleasedError'
  }
}
