// Error types for Huffman coding and model persistence

export type HuffmanErrorCode =
  | 'INVALID_INPUT'
  | 'LOOKUP_FAILURE'
  | 'PERSISTENCE_IO'
  | 'MALFORMED_MODEL'

// Base class; every error thrown by this library extends it
export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode

  constructor(code: HuffmanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HuffmanError'
    this.code = code
  }
}

// Malformed bit stream (stray characters, stream ending mid-code) or
// unusable builder input
export class InvalidInputError extends HuffmanError {
  readonly offset?: number

  constructor(message: string, offset?: number) {
    super('INVALID_INPUT', message)
    this.name = 'InvalidInputError'
    this.offset = offset
  }
}

// Symbol missing from the code table used for encoding
export class LookupFailureError extends HuffmanError {
  readonly symbol: unknown

  constructor(symbol: unknown) {
    super('LOOKUP_FAILURE', `Symbol ${describeSymbol(symbol)} is not in the code table`)
    this.name = 'LookupFailureError'
    this.symbol = symbol
  }
}

export class PersistenceIOError extends HuffmanError {
  readonly path: string

  constructor(message: string, path: string, cause: unknown) {
    super('PERSISTENCE_IO', `${message}: ${path}`, { cause })
    this.name = 'PersistenceIOError'
    this.path = path
  }
}

// Serialized tree that fails to parse or breaks a structural invariant
export class MalformedModelError extends HuffmanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_MODEL', message, options)
    this.name = 'MalformedModelError'
  }
}

function describeSymbol(symbol: unknown): string {
  if (typeof symbol === 'string') return JSON.stringify(symbol)
  return String(symbol)
}
