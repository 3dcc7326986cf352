import { describe, it, expect } from 'vitest'
import { deserializeTree, serializeTree } from '../src/persist/model-format'
import { byteSymbolCodec } from '../src/persist/symbol-codec'
import { crc32 } from '../src/persist/crc32'
import { huffmanEncode, encodeBytes } from '../src/encode/encode'
import { huffmanDecode, decodeBytes } from '../src/decode/decode'
import { MalformedModelError } from '../src/errors'

const HEADER = [0x48, 0x55, 0x46, 0x54, 0x01] // "HUFT" v1

function withChecksum(body: number[]): Uint8Array {
  const crc = crc32(Uint8Array.from(body))
  return Uint8Array.from([...body, crc & 0xFF, (crc >>> 8) & 0xFF, (crc >>> 16) & 0xFF, (crc >>> 24) & 0xFF])
}

function expectMalformed(bytes: Uint8Array, message: string | RegExp): void {
  expect(() => deserializeTree(bytes)).toThrow(MalformedModelError)
  expect(() => deserializeTree(bytes)).toThrow(message)
}

describe('crc32', () => {
  it('matches the IEEE check value', () => {
    expect(crc32(new TextEncoder().encode('123456789'))).toBe(0xCBF43926)
  })
})

describe('serializeTree', () => {
  it('writes nodes in pre-order after the header', () => {
    const { tree } = huffmanEncode('aab')
    if (tree === null) throw new Error('expected a tree')
    const bytes = serializeTree(tree)
    expect(bytes).toEqual(withChecksum([
      ...HEADER, 0x03,
      0x01, 0x03,             // internal, freq 3
      0x00, 0x01, 0x01, 0x62, // leaf 'b', freq 1
      0x00, 0x02, 0x01, 0x61, // leaf 'a', freq 2
    ]))
  })

  it('writes a single root followed by its leaf', () => {
    const { tree } = huffmanEncode('aaaaa')
    if (tree === null) throw new Error('expected a tree')
    expect(serializeTree(tree)).toEqual(withChecksum([
      ...HEADER, 0x02,
      0x02, 0x05,
      0x00, 0x05, 0x01, 0x61,
    ]))
  })
})

describe('deserializeTree', () => {
  it('round-trips the pangram tree', () => {
    const text = 'the quick brown fox jumps over the lazy dog'
    const { stream, tree } = huffmanEncode(text)
    if (tree === null) throw new Error('expected a tree')
    const restored = deserializeTree(serializeTree(tree))
    expect(restored).toEqual(tree)
    expect(huffmanDecode(stream, restored)).toBe(huffmanDecode(stream, tree))
    expect(huffmanDecode(stream, restored)).toBe(text)
  })

  it('round-trips a single-symbol tree', () => {
    const { stream, tree } = huffmanEncode('aaaaa')
    if (tree === null) throw new Error('expected a tree')
    expect(huffmanDecode(stream, deserializeTree(serializeTree(tree)))).toBe('aaaaa')
  })

  it('round-trips multi-byte symbols', () => {
    const text = 'naïve café ☕ 😀😀'
    const { stream, tree } = huffmanEncode(text)
    if (tree === null) throw new Error('expected a tree')
    expect(huffmanDecode(stream, deserializeTree(serializeTree(tree)))).toBe(text)
  })

  it('round-trips byte symbols with the byte codec', () => {
    const input = Uint8Array.of(0, 255, 255, 7, 0, 0)
    const { stream, tree } = encodeBytes(input)
    if (tree === null) throw new Error('expected a tree')
    const restored = deserializeTree(serializeTree(tree, byteSymbolCodec), byteSymbolCodec)
    expect(decodeBytes(stream, restored)).toEqual(input)
  })

  it('rejects short input', () => {
    expectMalformed(Uint8Array.of(0x48, 0x55, 0x46, 0x54, 0x01), 'Model is truncated: 5 bytes')
  })

  it('rejects a bad magic number', () => {
    expectMalformed(withChecksum([0x58, 0x58, 0x58, 0x58, 0x01, 0x02, 0x02, 0x01]), 'Not a Huffman tree model (bad magic)')
  })

  it('rejects an unknown version', () => {
    expectMalformed(withChecksum([0x48, 0x55, 0x46, 0x54, 0x02, 0x02, 0x02, 0x01]), 'Unsupported model version 2')
  })

  it('detects corruption through the checksum', () => {
    const { tree } = huffmanEncode('abracadabra')
    if (tree === null) throw new Error('expected a tree')
    const bytes = serializeTree(tree)
    bytes[8] ^= 0x01
    expectMalformed(bytes, /^Model checksum mismatch/)
  })

  it('rejects truncated data', () => {
    const { tree } = huffmanEncode('abracadabra')
    if (tree === null) throw new Error('expected a tree')
    const bytes = serializeTree(tree)
    expect(() => deserializeTree(bytes.subarray(0, bytes.length - 3))).toThrow(MalformedModelError)
  })

  it('rejects an internal node whose frequency is not the sum of its children', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x03, 0x01, 0x04, 0x00, 0x01, 0x01, 0x62, 0x00, 0x02, 0x01, 0x61]),
      'internal frequency 4 is not the sum of its children (1 + 2)'
    )
  })

  it('rejects a leaf at the root', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x02, 0x00, 0x01, 0x01, 0x61]),
      'Root must be an internal or single node, found a leaf'
    )
  })

  it('rejects unknown tags', () => {
    expectMalformed(withChecksum([...HEADER, 0x03, 0x01, 0x03, 0x07]), 'Unknown node tag 7')
  })

  it('rejects a single node below the root', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x03, 0x01, 0x03, 0x02]),
      'A single-symbol node may only appear at the root'
    )
  })

  it('rejects a node count that does not match', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x04, 0x01, 0x03, 0x00, 0x01, 0x01, 0x62, 0x00, 0x02, 0x01, 0x61]),
      'Model declares 4 nodes but contains 3'
    )
  })

  it('rejects trailing bytes', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x03, 0x01, 0x03, 0x00, 0x01, 0x01, 0x62, 0x00, 0x02, 0x01, 0x61, 0x00]),
      '1 trailing bytes after the tree'
    )
  })

  it('rejects duplicate symbols', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x03, 0x01, 0x02, 0x00, 0x01, 0x01, 0x61, 0x00, 0x01, 0x01, 0x61]),
      'Invalid tree: symbol a appears in more than one leaf'
    )
  })

  it('rejects zero leaf frequencies', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x03, 0x01, 0x01, 0x00, 0x00, 0x01, 0x61, 0x00, 0x01, 0x01, 0x62]),
      'Invalid tree: leaf frequency 0 is not a positive integer'
    )
  })

  it('wraps symbol decoding failures', () => {
    expectMalformed(
      withChecksum([...HEADER, 0x02, 0x02, 0x01, 0x00, 0x01, 0x01, 0xFF]),
      /^Corrupt model: /
    )
  })
})
