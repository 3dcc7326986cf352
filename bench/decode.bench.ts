// Decode benchmark: tree walk vs. reloading the model first
// Usage: npm run bench
import { bench, describe } from 'vitest'
import { huffmanEncode } from '../src/encode/encode'
import { huffmanDecode } from '../src/decode/decode'
import { deserializeTree, serializeTree } from '../src/persist/model-format'
import { unpackBits } from '../src/decode/bit-reader'
import { packBits } from '../src/encode/bit-writer'

interface Fixture {
  name: string
  stream: string
  model: Uint8Array
}

function makeXorshift32(seed: number): () => number {
  let x = seed | 0
  return () => {
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    return x >>> 0
  }
}

// Skewed random text: low letters far more likely than high ones
function skewedText(len: number, seed: number): string {
  const next = makeXorshift32(seed)
  let out = ''
  for (let i = 0; i < len; i++) {
    const r = next() / 0x100000000
    out += String.fromCharCode(0x61 + Math.floor(26 * r * r))
  }
  return out
}

const fixtures: Fixture[] = []
for (const [name, text] of [
  ['prose (4.5 KB)', 'The quick brown fox jumps over the lazy dog. '.repeat(100)],
  ['skewed (64 KB)', skewedText(65536, 0x12345678)],
  ['single symbol (16 KB)', 'x'.repeat(16384)],
] as const) {
  const { stream, tree } = huffmanEncode(text)
  if (tree === null) continue
  fixtures.push({ name, stream, model: serializeTree(tree) })
}

describe('decode', () => {
  for (const { name, stream, model } of fixtures) {
    const tree = deserializeTree(model)

    bench(`huffmanDecode ${name}`, () => {
      huffmanDecode(stream, tree)
    })

    bench(`deserialize + huffmanDecode ${name}`, () => {
      huffmanDecode(stream, deserializeTree(model))
    })

    const packed = packBits(stream)
    bench(`unpackBits + huffmanDecode ${name}`, () => {
      huffmanDecode(unpackBits(packed), tree)
    })
  }
})
