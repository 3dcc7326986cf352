// Bit reading for packed code streams and the serialized tree model

import { InvalidInputError } from '../errors'
import type { PackedBits } from '../encode/bit-writer'

// Reads bits LSB-first within each byte; inverse of BitWriter
export class BitReader {
  readonly buffer: Uint8Array
  private pos: number = 0 // bit position
  private readonly limit: number // bit length

  constructor(buffer: Uint8Array, bitLength: number = buffer.length * 8) {
    this.buffer = buffer
    this.limit = bitLength
  }

  get bitsRemaining(): number {
    return this.limit - this.pos
  }

  get bytePos(): number {
    return this.pos >>> 3
  }

  private require(nBits: number): void {
    if (this.pos + nBits > this.limit) {
      throw new InvalidInputError('Unexpected end of input', this.pos >>> 3)
    }
  }

  readBit(): number {
    this.require(1)
    const bit = (this.buffer[this.pos >>> 3] >>> (this.pos & 7)) & 1
    this.pos++
    return bit
  }

  // Must be byte-aligned
  readByte(): number {
    if ((this.pos & 7) !== 0) {
      throw new Error('BitReader not byte-aligned')
    }
    this.require(8)
    const byte = this.buffer[this.pos >>> 3]
    this.pos += 8
    return byte
  }

  // Must be byte-aligned; returns a view, not a copy
  readBytes(length: number): Uint8Array {
    if ((this.pos & 7) !== 0) {
      throw new Error('BitReader not byte-aligned')
    }
    this.require(length * 8)
    const start = this.pos >>> 3
    this.pos += length * 8
    return this.buffer.subarray(start, start + length)
  }

  readVarInt(): number {
    let value = 0
    let scale = 1
    for (;;) {
      const byte = this.readByte()
      value += (byte & 0x7F) * scale
      if (!Number.isSafeInteger(value)) {
        throw new InvalidInputError('Varint exceeds the safe integer range', this.bytePos)
      }
      if ((byte & 0x80) === 0) return value
      scale *= 0x80
    }
  }

  readUint32LE(): number {
    const b0 = this.readByte()
    const b1 = this.readByte()
    const b2 = this.readByte()
    const b3 = this.readByte()
    return (b0 | (b1 << 8) | (b2 << 16) | (b3 << 24)) >>> 0
  }
}

export function unpackBits(packed: PackedBits): string {
  const { bytes, bitLength } = packed
  if (!Number.isInteger(bitLength) || bitLength < 0 || bitLength > bytes.length * 8) {
    throw new InvalidInputError(`Bit length ${bitLength} does not fit in ${bytes.length} bytes`)
  }
  const reader = new BitReader(bytes, bitLength)
  const digits: string[] = new Array(bitLength)
  for (let i = 0; i < bitLength; i++) {
    digits[i] = reader.readBit() === 1 ? '1' : '0'
  }
  return digits.join('')
}
