import { describe, it, expect } from 'vitest'
import {
  decodeHexKey,
  defaultCount,
  formatItem,
  formatValues,
  parseCount,
  quote,
  slice,
  tailSkip
} from './display'
import type { CdbItem } from '../cdb'

const encode = (s: string) => new TextEncoder().encode(s)

function item(key: string, value: string): CdbItem {
  return { key: encode(key), value: encode(value) }
}

describe('quote', () => {
  it('quotes and escapes', () => {
    expect(quote('say "hi"')).toBe('"say \\"hi\\""')
    expect(quote(encode('tab\there'))).toBe('"tab\\there"')
  })

  it('replaces invalid UTF-8', () => {
    expect(quote(new Uint8Array([0x61, 0xff]))).toBe('"a\uFFFD"')
  })
})

describe('formatItem', () => {
  it('shows key and value', () => {
    expect(formatItem(item('hi', 'asdf'))).toBe('"hi": "asdf"')
  })
})

describe('formatValues', () => {
  it('reports a missing key', () => {
    expect(formatValues('nope', [])).toEqual([
      'There\'re no values under "nope"'
    ])
  })

  it('shows a single value on one line', () => {
    expect(formatValues('letmein', [encode('10')])).toEqual([
      '"letmein": "10"'
    ])
  })

  it('lists several values under a heading', () => {
    expect(formatValues('one', [encode('Hello'), encode(', World!')])).toEqual(
      ['Values under key "one"', '    "Hello"', '    ", World!"']
    )
  })
})

describe('parseCount', () => {
  it('defaults to 10', () => {
    expect(defaultCount).toBe(10)
    expect(parseCount(undefined)).toBe(10)
    expect(parseCount('0')).toBe(10)
  })

  it('parses a positive count', () => {
    expect(parseCount('25')).toBe(25)
  })

  it('rejects anything else', () => {
    expect(() => parseCount('-3')).toThrow(
      'COUNT must be a non-negative integer, got "-3"'
    )
    expect(() => parseCount('ten')).toThrow(
      'COUNT must be a non-negative integer, got "ten"'
    )
  })
})

describe('tailSkip', () => {
  it('skips all but the last COUNT records', () => {
    expect(tailSkip(250, 10)).toBe(240)
    expect(tailSkip(3, 10)).toBe(0)
    expect(tailSkip(0, 10)).toBe(0)
  })
})

describe('decodeHexKey', () => {
  it('decodes hex pairs', () => {
    expect(Array.from(decodeHexKey('6869'))).toEqual([0x68, 0x69])
    expect(Array.from(decodeHexKey('00FF'))).toEqual([0, 255])
    expect(decodeHexKey('').length).toBe(0)
  })

  it('rejects odd lengths and non-hex characters', () => {
    expect(() => decodeHexKey('abc')).toThrow(
      'Encoded key must be an even-length hex string, got "abc"'
    )
    expect(() => decodeHexKey('zz')).toThrow(
      'Encoded key must be an even-length hex string, got "zz"'
    )
  })
})

describe('slice', () => {
  const items = ['a', 'b', 'c', 'd'].map((key) => item(key, key))

  it('takes COUNT items after skipping', () => {
    const keys = Array.from(slice(items, 1, 2), (i) => new TextDecoder().decode(i.key))
    expect(keys).toEqual(['b', 'c'])
  })

  it('takes everything after skip by default', () => {
    expect(Array.from(slice(items, 3)).length).toBe(1)
    expect(Array.from(slice(items, 10)).length).toBe(0)
  })
})
