// Huffman encoding API

import { LookupFailureError } from '../errors'
import { countFrequencies, textSymbols } from '../model/frequency'
import type { HuffmanTree } from '../model/tree'
import { type CodeTable, buildCodeTable } from './code-table'
import { buildHuffmanTree } from './tree-builder'

export interface EncodeResult<S> {
  stream: string               // '0'/'1' digits
  tree: HuffmanTree<S> | null  // null for empty input
  table: CodeTable<S>
}

// Builds a model from the symbols themselves and encodes them with it
export function encodeSymbols<S>(symbols: Iterable<S>): EncodeResult<S> {
  const input = Array.from(symbols)
  if (input.length === 0) {
    return { stream: '', tree: null, table: new Map() }
  }

  const tree = buildHuffmanTree(countFrequencies(input))
  const table = buildCodeTable(tree)
  return { stream: encodeWithTable(input, table), tree, table }
}

export function huffmanEncode(text: string): EncodeResult<string> {
  return encodeSymbols(textSymbols(text))
}

export function encodeBytes(bytes: Uint8Array): EncodeResult<number> {
  return encodeSymbols(bytes)
}

// Throws LookupFailureError on the first symbol missing from the table
export function encodeWithTable<S>(symbols: Iterable<S>, table: ReadonlyMap<S, string>): string {
  const parts: string[] = []
  for (const symbol of symbols) {
    const code = table.get(symbol)
    if (code === undefined) {
      throw new LookupFailureError(symbol)
    }
    parts.push(code)
  }
  return parts.join('')
}
