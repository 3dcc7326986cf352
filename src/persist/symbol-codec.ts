// Symbol <-> bytes conversion for the persisted model

import { InvalidInputError } from '../errors'

export interface SymbolCodec<S> {
  encode(symbol: S): Uint8Array
  decode(bytes: Uint8Array): S
}

const utf8Encoder = new TextEncoder()
const utf8Decoder = new TextDecoder('utf-8', { fatal: true })

export const stringSymbolCodec: SymbolCodec<string> = {
  encode(symbol) {
    return utf8Encoder.encode(symbol)
  },
  decode(bytes) {
    return utf8Decoder.decode(bytes)
  },
}

// Byte values 0-255, one byte each
export const byteSymbolCodec: SymbolCodec<number> = {
  encode(symbol) {
    if (!Number.isInteger(symbol) || symbol < 0 || symbol > 0xFF) {
      throw new InvalidInputError(`Byte symbol out of range: ${symbol}`)
    }
    return Uint8Array.of(symbol)
  },
  decode(bytes) {
    if (bytes.length !== 1) {
      throw new RangeError(`Byte symbol must be 1 byte, got ${bytes.length}`)
    }
    return bytes[0]
  },
}
