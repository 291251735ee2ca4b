import { describe, it, expect } from 'vitest'
import {
  bytesEqual,
  deserializeHeader,
  deserializeRecordHeader,
  deserializeSlots,
  lossyString,
  pack,
  serializeHeader,
  serializeRecord,
  serializeSlots,
  toBytes,
  unpack
} from './format'
import type { HeaderEntry } from './types'

describe('pack and unpack', () => {
  it('packs little-endian', () => {
    expect(Array.from(pack(0x01020304))).toEqual([4, 3, 2, 1])
    expect(Array.from(pack(0xffffffff))).toEqual([255, 255, 255, 255])
    expect(Array.from(pack(0))).toEqual([0, 0, 0, 0])
  })

  it('unpacks little-endian', () => {
    expect(unpack(new Uint8Array([4, 3, 2, 1]))).toBe(0x01020304)
    expect(unpack(new Uint8Array([255, 255, 255, 255]))).toBe(4294967295)
  })

  it('unpacks at an offset and from a subarray', () => {
    const data = new Uint8Array([9, 9, 0, 8, 0, 0, 9])
    expect(unpack(data, 2)).toBe(2048)
    expect(unpack(data.subarray(2))).toBe(2048)
  })
})

describe('header', () => {
  it('serializes 256 entries into 2048 bytes', () => {
    const entries: HeaderEntry[] = Array.from({ length: 256 }, (_, i) => ({
      position: 2048 + i * 16,
      slotCount: i * 2
    }))
    const bytes = serializeHeader(entries)

    expect(bytes.length).toBe(2048)
    expect(unpack(bytes, 8)).toBe(2064)
    expect(unpack(bytes, 12)).toBe(2)
    expect(deserializeHeader(bytes)).toEqual(entries)
  })
})

describe('records', () => {
  it('writes lengths, key and value with no padding', () => {
    const record = serializeRecord(toBytes('ab'), toBytes('xyz'))
    expect(Array.from(record)).toEqual([
      2, 0, 0, 0, 3, 0, 0, 0, 97, 98, 120, 121, 122
    ])
  })

  it('reads the length prefix', () => {
    const record = serializeRecord(toBytes('ab'), toBytes('xyz'))
    expect(deserializeRecordHeader(record)).toEqual({
      keyLength: 2,
      dataLength: 3
    })
  })
})

describe('slots', () => {
  it('writes null entries as empty slots', () => {
    const bytes = serializeSlots([null, { hash: 1, position: 2048 }])
    expect(Array.from(bytes)).toEqual([
      0, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 8, 0, 0
    ])
  })

  it('ignores a trailing partial slot', () => {
    const bytes = new Uint8Array(20)
    bytes.set(pack(7), 8)
    bytes.set(pack(2048), 12)
    expect(deserializeSlots(bytes)).toEqual([
      { hash: 0, position: 0 },
      { hash: 7, position: 2048 }
    ])
  })
})

describe('byte helpers', () => {
  it('encodes strings as UTF-8', () => {
    expect(Array.from(toBytes('é'))).toEqual([0xc3, 0xa9])
  })

  it('passes byte arrays through', () => {
    const bytes = new Uint8Array([1, 2])
    expect(toBytes(bytes)).toBe(bytes)
  })

  it('compares bytes', () => {
    expect(bytesEqual(toBytes('abc'), toBytes('abc'))).toBe(true)
    expect(bytesEqual(toBytes('abc'), toBytes('abd'))).toBe(false)
    expect(bytesEqual(toBytes('abc'), toBytes('ab'))).toBe(false)
  })

  it('replaces invalid UTF-8', () => {
    expect(lossyString(new Uint8Array([0x68, 0xff]))).toBe('h\uFFFD')
  })
})
