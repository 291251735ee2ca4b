/**
 * Constants for the constant database (cdb) on-disk format.
 *
 * Layout:
 * [header: 256 x (position:4, slotCount:4)][records][hash tables]
 */

// Number of first-level buckets, selected by the low byte of the hash
export const bucketCount = 256

// Every on-disk integer is a little-endian u32
export const wordSize = 4

// (position, slotCount) header pair and (hash, position) slot are both 8 bytes
export const pairSize = 8
export const slotSize = pairSize

// Header occupies the first 2048 bytes
export const headerSize = bucketCount * pairSize

// (keyLen, dataLen) prefix of every record
export const recordHeaderSize = pairSize

// Offsets are u32, so a database must fit in 4 GiB
export const maxOffset = 0xffffffff

// Starting value of the DJB hash accumulator
export const hashSeed = 5381

// Record position that marks an unused hash table slot
export const emptySlotPosition = 0

// Default file extension used by the CLI
export const fileExtension = '.cdb'
