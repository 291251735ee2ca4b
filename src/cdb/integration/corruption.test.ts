/**
 * Corruption handling tests.
 * Builds a single-record database and damages its bytes in place.
 *
 * Layout of the database: header 0..2048, record "key" -> "value" at
 * 2048..2064, bucket 50 table (2 slots) at 2064..2080 with the record in
 * slot 1.
 */

import { describe, it, expect } from 'vitest'
import { pack } from '../format'
import { Reader } from '../reader'
import { MemoryResource } from '../resource'
import { Writer } from '../writer'
import {
  CdbError,
  CdbIoError,
  CorruptDatabaseError,
  KeyNotFoundError
} from '../errors'
import { flipByte, text } from './helpers'

function buildBytes(): Uint8Array {
  const resource = new MemoryResource()
  const writer = Writer.create(resource)
  writer.put('key', 'value')
  writer.close()
  return resource.toUint8Array()
}

function corrupt(position: number, value: number): Uint8Array {
  const bytes = buildBytes()
  bytes.set(pack(value), position)
  return bytes
}

describe('corrupt databases', () => {
  it('opens the undamaged database', () => {
    const reader = Reader.open(new MemoryResource(buildBytes()))
    expect(text(reader.getFirst('key'))).toBe('value')
  })

  describe('header', () => {
    it('detects a table running past the end', () => {
      const bytes = corrupt(50 * 8 + 4, 200)

      expect(() => Reader.open(new MemoryResource(bytes))).toThrow(
        CorruptDatabaseError
      )
      expect(() => Reader.open(new MemoryResource(bytes))).toThrow(
        'Corrupt CDB: bucket 50 table 2064..3664 lies outside 2048..2080'
      )
    })

    it('detects a table inside the header', () => {
      const bytes = corrupt(50 * 8, 16)

      expect(() => Reader.open(new MemoryResource(bytes))).toThrow(
        CorruptDatabaseError
      )
    })

    it('trusts the header when validation is off', () => {
      const bytes = corrupt(50 * 8 + 4, 200)
      const reader = Reader.open(new MemoryResource(bytes), { validate: false })

      expect(reader.size()).toBe(100)
    })
  })

  describe('record lengths', () => {
    it('detects a key length running into the hash tables while iterating', () => {
      const reader = Reader.open(new MemoryResource(corrupt(2048, 0xffff)))

      expect(() => Array.from(reader)).toThrow(CorruptDatabaseError)
    })

    it('detects a key length running past the end on lookup', () => {
      const reader = Reader.open(new MemoryResource(corrupt(2048, 0xffff)))

      expect(() => reader.getFirst('key')).toThrow(
        'Corrupt CDB: record at 2048 (key 65535 bytes, data 5 bytes) runs past 2080'
      )
    })

    it('surfaces a short read when validation is off', () => {
      const reader = Reader.open(new MemoryResource(corrupt(2048, 0xffff)), {
        validate: false
      })

      expect(() => Array.from(reader)).toThrow(CdbIoError)
    })

    it('skips the record on lookup when validation is off', () => {
      const reader = Reader.open(new MemoryResource(corrupt(2048, 0xffff)), {
        validate: false
      })

      // The stored key length no longer matches, so the probe moves on
      expect(() => reader.getFirst('key')).toThrow(KeyNotFoundError)
    })
  })

  describe('slots', () => {
    it('detects a slot pointing into the header', () => {
      const reader = Reader.open(new MemoryResource(corrupt(2076, 16)))

      expect(() => reader.getFirst('key')).toThrow(
        'Corrupt CDB: record at 16 lies outside 2048..2080'
      )
    })

    it('finds nothing when the stored hash is damaged', () => {
      const bytes = buildBytes()
      flipByte(bytes, 2072)
      const reader = Reader.open(new MemoryResource(bytes))

      expect(reader.get('key')).toEqual([])
    })
  })

  describe('asWriter', () => {
    it('detects a hash table region that is not whole slots', () => {
      const bytes = buildBytes()
      const resource = new MemoryResource(bytes)
      resource.write(bytes.length, new Uint8Array(3))
      const reader = Reader.open(resource)

      expect(() => reader.asWriter()).toThrow(CorruptDatabaseError)
    })

    it('refuses to truncate into the header', () => {
      const reader = Reader.open(new MemoryResource(new Uint8Array(2048)))

      expect(() => reader.asWriter()).toThrow(
        'Corrupt CDB: hash tables start at 0, inside the header'
      )
    })
  })

  it('reports every failure as a CdbError', () => {
    const bytes = corrupt(50 * 8 + 4, 200)

    try {
      Reader.open(new MemoryResource(bytes))
      expect.unreachable('open should fail')
    } catch (error) {
      expect(error).toBeInstanceOf(CdbError)
      if (error instanceof CdbError) {
        expect(error.kind).toBe('corrupt')
        expect(error.name).toBe('CorruptDatabaseError')
      }
    }
  })
})
