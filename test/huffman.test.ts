import { describe, it, expect } from 'vitest'
import {
  huffmanEncode,
  huffmanDecode,
  encodeSymbols,
  encodeBytes,
  encodeWithTable,
  decodeSymbols,
  decodeBytes,
} from '../src/index'
import { InvalidInputError, LookupFailureError } from '../src/errors'
import { buildCodeTable } from '../src/encode/code-table'
import { compressionRatio, compressionStats } from '../src/encode/ratio'
import { findTreeViolation } from '../src/model/tree'

describe('huffmanEncode', () => {
  it('encodes empty input to an empty stream and no tree', () => {
    const result = huffmanEncode('')
    expect(result.stream).toBe('')
    expect(result.tree).toBeNull()
    expect(result.table.size).toBe(0)
  })

  it('gives a single distinct symbol the one-digit code "0"', () => {
    const { stream, tree, table } = huffmanEncode('aaaaa')
    expect(stream).toBe('00000')
    expect(table.get('a')).toBe('0')
    expect(tree?.kind).toBe('single')
  })

  it('produces the tie-broken code table for "abracadabra"', () => {
    const { stream, table } = huffmanEncode('abracadabra')
    expect(Object.fromEntries(table)).toEqual({
      a: '0',
      c: '100',
      d: '101',
      b: '110',
      r: '111',
    })
    expect(stream).toBe('01101110100010101101110')
  })

  it('is deterministic across runs', () => {
    const text = 'the quick brown fox jumps over the lazy dog'
    const first = huffmanEncode(text)
    const second = huffmanEncode(text)
    expect(second.stream).toBe(first.stream)
    expect([...second.table]).toEqual([...first.table])
  })

  it('keeps the frequency sums consistent', () => {
    const text = 'this is an example for huffman encoding'
    const { tree } = huffmanEncode(text)
    expect(tree).not.toBeNull()
    if (tree === null) return
    expect(tree.freq).toBe(text.length)
    expect(findTreeViolation(tree)).toBeUndefined()
  })

  it('assigns 4- and 5-digit codes to a uniform 26-letter alphabet', () => {
    const { table } = huffmanEncode('abcdefghijklmnopqrstuvwxyz')
    const lengths = [...table.values()].map(code => code.length)
    expect(lengths).toHaveLength(26)
    expect(lengths.every(len => len === 4 || len === 5)).toBe(true)
    expect(lengths.filter(len => len === 4)).toHaveLength(6)
    expect(lengths.filter(len => len === 5)).toHaveLength(20)

    // Complete tree: the Kraft sum is exactly 1
    const kraft = lengths.reduce((sum, len) => sum + 2 ** -len, 0)
    expect(kraft).toBe(1)
  })

  it('treats surrogate pairs as one symbol', () => {
    const { table, stream, tree } = huffmanEncode('😀😀a')
    expect(table.size).toBe(2)
    expect(stream).toBe('110')
    expect(huffmanDecode(stream, tree)).toBe('😀😀a')
  })
})

describe('encodeWithTable', () => {
  it('concatenates codes in input order', () => {
    const table = new Map([['x', '0'], ['y', '10'], ['z', '11']])
    expect(encodeWithTable(['y', 'x', 'z', 'x'], table)).toBe('100110')
  })

  it('fails on a symbol missing from the table', () => {
    const { table } = huffmanEncode('aab')
    try {
      encodeWithTable(['a', 'z'], table)
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(LookupFailureError)
      if (!(e instanceof LookupFailureError)) return
      expect(e.symbol).toBe('z')
      expect(e.code).toBe('LOOKUP_FAILURE')
      expect(e.message).toBe('Symbol "z" is not in the code table')
    }
  })
})

describe('huffmanDecode', () => {
  it('decodes an empty stream to an empty string', () => {
    const { tree } = huffmanEncode('abc')
    expect(huffmanDecode('', tree)).toBe('')
    expect(huffmanDecode('', null)).toBe('')
  })

  it('requires a tree for a non-empty stream', () => {
    expect(() => huffmanDecode('0', null)).toThrow(InvalidInputError)
  })

  it('decodes every digit to the lone symbol of a single-symbol tree', () => {
    const { tree } = huffmanEncode('aaaaa')
    expect(huffmanDecode('00000', tree)).toBe('aaaaa')
    expect(huffmanDecode('0101', tree)).toBe('aaaa')
  })

  it('rejects characters other than 0 and 1', () => {
    const { tree } = huffmanEncode('aab')
    expect(() => huffmanDecode('012', tree)).toThrow('Invalid digit "2" at offset 2')

    const single = huffmanEncode('aaa').tree
    expect(() => huffmanDecode('0x0', single)).toThrow('Invalid digit "x" at offset 1')
  })

  it('rejects a stream that ends mid-code', () => {
    const { tree } = huffmanEncode('abracadabra')
    try {
      huffmanDecode('01', tree)
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidInputError)
      if (!(e instanceof InvalidInputError)) return
      expect(e.message).toBe('Stream ends mid-code: 1 trailing digits do not reach a leaf')
      expect(e.offset).toBe(1)
      expect(e.code).toBe('INVALID_INPUT')
    }
  })

  it('respects maxOutputSize', () => {
    const { stream, tree } = huffmanEncode('abracadabra')
    expect(huffmanDecode(stream, tree, { maxOutputSize: 11 })).toBe('abracadabra')
    expect(() => huffmanDecode(stream, tree, { maxOutputSize: 10 })).toThrow(
      'Decoded size 11 exceeds limit 10'
    )

    const single = huffmanEncode('aaaaa')
    expect(() => huffmanDecode(single.stream, single.tree, { maxOutputSize: 3 })).toThrow(
      'Decoded size 5 exceeds limit 3'
    )
  })
})

describe('generic symbols', () => {
  it('round-trips bytes', () => {
    const input = Uint8Array.of(1, 1, 2)
    const { stream, tree } = encodeBytes(input)
    expect(stream).toBe('110')
    expect(decodeBytes(stream, tree)).toEqual(input)
  })

  it('round-trips arbitrary map keys', () => {
    const input = ['north', 'east', 'north', 'south', 'north', 'west', 'east']
    const { stream, tree } = encodeSymbols(input)
    expect(decodeSymbols(stream, tree)).toEqual(input)
  })
})

describe('compression ratio', () => {
  it('measures against 8 bits per symbol', () => {
    const { stream } = huffmanEncode('aaaaa')
    expect(compressionRatio(5, stream.length)).toBe(12.5)
    expect(compressionStats('abracadabra', '01101110100010101101110')).toEqual({
      originalBits: 88,
      compressedBits: 23,
      ratio: (23 / 88) * 100,
    })
  })

  it('reports 0 for an empty original', () => {
    expect(compressionRatio(0, 0)).toBe(0)
    expect(compressionStats('', '').ratio).toBe(0)
  })
})

function makeXorshift32(seed: number): () => number {
  let x = seed | 0
  return () => {
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    return x >>> 0
  }
}

function randomText(len: number, alphabet: string, nextU32: () => number): string {
  let out = ''
  for (let i = 0; i < len; i++) out += alphabet[nextU32() % alphabet.length]
  return out
}

describe('fuzz', () => {
  it('round-trips random text with prefix-free tables', () => {
    const nextU32 = makeXorshift32(0xC0FFEE)
    const alphabets = ['ab', 'abc', 'etaoin shrdlu', 'abcdefghijklmnopqrstuvwxyz0123456789']
    const sizes = [1, 2, 3, 7, 31, 64, 257, 1024]

    for (const alphabet of alphabets) {
      for (const size of sizes) {
        const text = randomText(size, alphabet, nextU32)
        const { stream, tree, table } = huffmanEncode(text)
        expect(huffmanDecode(stream, tree)).toBe(text)

        const codes = [...table.values()]
        for (const a of codes) {
          for (const b of codes) {
            if (a !== b) expect(b.startsWith(a)).toBe(false)
          }
        }
        if (tree !== null) {
          expect(buildCodeTable(tree)).toEqual(table)
        }
      }
    }
  })
})
