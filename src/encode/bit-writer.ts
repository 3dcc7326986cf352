// Bit writing for packed code streams and the serialized tree model

import { InvalidInputError } from '../errors'

// Writes bits to a byte array in LSB-first order within each byte.
// Inverse of BitReader.
//
// Bits written to increasing byte addresses; within a byte, LSB first.
// Example: 3 bits 'RRR' written -> BYTE-0: 0000 0RRR
// Writing 5 more 'SSSSS' -> BYTE-0: SSRR RRRR, BYTE-1: 0000 0SSS
export class BitWriter {
  buffer: Uint8Array
  pos: number // bit position

  constructor(initialSize: number = 256) {
    this.buffer = new Uint8Array(Math.max(1, initialSize))
    this.pos = 0
  }

  private ensureCapacity(bits: number): void {
    const bytesNeeded = ((this.pos + bits + 7) >>> 3) + 1
    if (bytesNeeded > this.buffer.length) {
      const newSize = Math.max(this.buffer.length * 2, bytesNeeded)
      const newBuffer = new Uint8Array(newSize)
      newBuffer.set(this.buffer)
      this.buffer = newBuffer
    }
  }

  // Write up to 24 bits
  writeBits(nBits: number, value: number): void {
    this.ensureCapacity(nBits)

    const bytePos = this.pos >>> 3
    const bitOffset = this.pos & 7

    // Bits past pos are always zero, so OR-ing is enough for the first byte
    this.buffer[bytePos] = (this.buffer[bytePos] | (value << bitOffset)) & 0xFF

    let bitsWritten = 8 - bitOffset
    let remaining = value >>> bitsWritten
    let pos = bytePos + 1

    while (bitsWritten < nBits) {
      this.buffer[pos++] = remaining & 0xFF
      remaining >>>= 8
      bitsWritten += 8
    }

    this.pos += nBits
  }

  writeBit(bit: number): void {
    this.writeBits(1, bit & 1)
  }

  // Throws if not byte-aligned
  writeByte(byte: number): void {
    if ((this.pos & 7) !== 0) {
      throw new Error('BitWriter not byte-aligned')
    }
    this.ensureCapacity(8)
    this.buffer[this.pos >>> 3] = byte & 0xFF
    this.pos += 8
  }

  // Must be byte-aligned
  writeBytes(bytes: Uint8Array): void {
    if ((this.pos & 7) !== 0) {
      throw new Error('BitWriter not byte-aligned')
    }
    this.ensureCapacity(bytes.length * 8)
    this.buffer.set(bytes, this.pos >>> 3)
    this.pos += bytes.length * 8
  }

  finish(): Uint8Array {
    // Round up to include partial final byte
    const byteLength = (this.pos + 7) >>> 3
    return this.buffer.slice(0, byteLength)
  }
}

// LEB128; division instead of shifts keeps the full safe-integer range
export function writeVarInt(writer: BitWriter, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot write ${value} as a varint`)
  }
  while (value > 0x7F) {
    writer.writeByte((value % 0x80) | 0x80)
    value = Math.floor(value / 0x80)
  }
  writer.writeByte(value)
}

export function writeUint32LE(writer: BitWriter, value: number): void {
  writer.writeByte(value & 0xFF)
  writer.writeByte((value >>> 8) & 0xFF)
  writer.writeByte((value >>> 16) & 0xFF)
  writer.writeByte((value >>> 24) & 0xFF)
}

export interface PackedBits {
  bytes: Uint8Array
  bitLength: number
}

// Packs a '0'/'1' stream one bit per digit; the final byte is zero-padded
export function packBits(stream: string): PackedBits {
  const writer = new BitWriter((stream.length >>> 3) + 1)
  for (let i = 0; i < stream.length; i++) {
    const digit = stream.charCodeAt(i)
    if (digit === 0x30) {
      writer.writeBit(0)
    } else if (digit === 0x31) {
      writer.writeBit(1)
    } else {
      throw new InvalidInputError(`Invalid digit ${JSON.stringify(stream[i])} at offset ${i}`, i)
    }
  }
  return { bytes: writer.finish(), bitLength: stream.length }
}
