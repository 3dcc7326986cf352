// Huffman decoding
//
// The decoder walks the tree, not the code table: one digit per edge,
// emitting a symbol and returning to the root at every leaf.

import { InvalidInputError } from '../errors'
import { debug } from '../logger'
import type { HuffmanNode, HuffmanTree } from '../model/tree'

export interface HuffmanDecodeOptions {
  maxOutputSize?: number  // symbols
}

const DIGIT_0 = 0x30
const DIGIT_1 = 0x31

export function decodeSymbols<S>(
  stream: string,
  tree: HuffmanTree<S> | null,
  options: HuffmanDecodeOptions = {}
): S[] {
  if (stream.length === 0) return []
  if (tree === null) {
    throw new InvalidInputError('Cannot decode a non-empty stream without a tree')
  }

  const { maxOutputSize } = options

  // One distinct symbol: every digit is a placeholder for it
  if (tree.kind === 'single') {
    assertDigits(stream)
    checkLimit(stream.length, maxOutputSize)
    return new Array<S>(stream.length).fill(tree.leaf.symbol)
  }

  const output: S[] = []
  let node: HuffmanNode<S> = tree
  let codeStart = 0
  for (let i = 0; i < stream.length; i++) {
    const digit = stream.charCodeAt(i)
    if (node.kind !== 'internal') {
      // Unreachable: the walk resets to the root at every leaf
      throw new InvalidInputError('Decoder left the tree', i)
    }
    if (digit === DIGIT_0) {
      node = node.left
    } else if (digit === DIGIT_1) {
      node = node.right
    } else {
      throw new InvalidInputError(`Invalid digit ${JSON.stringify(stream[i])} at offset ${i}`, i)
    }

    if (node.kind === 'leaf') {
      output.push(node.symbol)
      checkLimit(output.length, maxOutputSize)
      node = tree
      codeStart = i + 1
    }
  }

  if (node !== tree) {
    throw new InvalidInputError(
      `Stream ends mid-code: ${stream.length - codeStart} trailing digits do not reach a leaf`,
      codeStart
    )
  }

  debug('decoded stream', { digits: stream.length, symbols: output.length })
  return output
}

export function huffmanDecode(
  stream: string,
  tree: HuffmanTree<string> | null,
  options?: HuffmanDecodeOptions
): string {
  return decodeSymbols(stream, tree, options).join('')
}

export function decodeBytes(
  stream: string,
  tree: HuffmanTree<number> | null,
  options?: HuffmanDecodeOptions
): Uint8Array {
  return Uint8Array.from(decodeSymbols(stream, tree, options))
}

function assertDigits(stream: string): void {
  for (let i = 0; i < stream.length; i++) {
    const digit = stream.charCodeAt(i)
    if (digit !== DIGIT_0 && digit !== DIGIT_1) {
      throw new InvalidInputError(`Invalid digit ${JSON.stringify(stream[i])} at offset ${i}`, i)
    }
  }
}

function checkLimit(size: number, maxOutputSize: number | undefined): void {
  if (maxOutputSize !== undefined && size > maxOutputSize) {
    throw new InvalidInputError(`Decoded size ${size} exceeds limit ${maxOutputSize}`)
  }
}
