import { hashSeed } from './constants'

/**
 * DJB hash as used by cdb: `h = ((h << 5) + h) ^ c`, starting at 5381,
 * wrapping at 32 bits.
 */
export function hash(bytes: Uint8Array): number {
  let h = hashSeed
  for (let i = 0; i < bytes.length; i++) {
    h = (((h << 5) + h) ^ bytes[i]) >>> 0
  }
  return h
}

/**
 * Bucket (first-level table) a hash belongs to.
 */
export function bucketOf(h: number): number {
  return h & 0xff
}

/**
 * Slot where probing for a hash starts in a table of `slotCount` slots.
 */
export function initialSlot(h: number, slotCount: number): number {
  return (h >>> 8) % slotCount
}
