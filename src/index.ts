export {
  Reader,
  Writer,
  ItemIterator,
  FileResource,
  MemoryResource,
  CdbError,
  CdbTooSmallError,
  KeyNotFoundError,
  CdbIoError,
  CorruptDatabaseError,
  CdbTooLargeError,
  ReadOnlyError,
  WriterFinalizedError,
  ReleasedError,
  hash,
  pack,
  unpack,
  lossyString
} from './cdb'
export type {
  Resource,
  Bytes,
  CdbItem,
  CdbErrorKind,
  ReaderOptions,
  OpenFileOptions,
  BucketIndex,
  SlotEntry
} from './cdb'
