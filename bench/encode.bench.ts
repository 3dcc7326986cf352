import { bench, describe } from 'vitest'
import { huffmanEncode } from '../src/encode/encode'
import { compressionStats } from '../src/encode/ratio'
import { packBits } from '../src/encode/bit-writer'

// Test data
const shortText = 'Hello, World!'
const mediumText = 'The quick brown fox jumps over the lazy dog. '.repeat(100)
const longText = mediumText.repeat(10)
const html = `<!DOCTYPE html><html><head><title>Test</title></head><body>${'<p>Content</p>'.repeat(500)}</body></html>`

const inputs = [
  { name: 'short (13 B)', text: shortText },
  { name: 'medium (4.5 KB)', text: mediumText },
  { name: 'long (45 KB)', text: longText },
  { name: 'html (8 KB)', text: html },
]

// Quick sanity check - print compression ratios
console.log('\nCompression ratios (vs 8 bits/symbol):')
for (const { name, text } of inputs) {
  const { stream } = huffmanEncode(text)
  const stats = compressionStats(text, stream)
  console.log(`${name}: ${stats.compressedBits} / ${stats.originalBits} bits (${stats.ratio.toFixed(2)}%)`)
}
console.log('')

describe('encode', () => {
  for (const { name, text } of inputs) {
    bench(`huffmanEncode ${name}`, () => {
      huffmanEncode(text)
    })
  }
})

describe('encode + pack', () => {
  for (const { name, text } of inputs) {
    bench(`huffmanEncode + packBits ${name}`, () => {
      packBits(huffmanEncode(text).stream)
    })
  }
})
