// Huffman tree construction
//
// Nodes are merged lowest-frequency first. Equal frequencies are ordered by
// a sequence number: leaves get theirs in frequency-model key order and each
// merged node gets the next one, so the same model always yields the same
// tree.

import { InvalidInputError } from '../errors'
import { debug } from '../logger'
import { totalCount } from '../model/frequency'
import { PriorityQueue } from '../model/priority-queue'
import {
  type HuffmanNode,
  type HuffmanTree,
  createInternal,
  createLeaf,
  createSingle,
} from '../model/tree'

export interface QueuedNode<S> {
  node: HuffmanNode<S>
  seq: number
}

// Frequency ascending, then sequence ascending
export function compareQueued<S>(a: QueuedNode<S>, b: QueuedNode<S>): number {
  if (a.node.freq !== b.node.freq) return a.node.freq - b.node.freq
  return a.seq - b.seq
}

export function buildHuffmanTree<S>(frequencies: ReadonlyMap<S, number>): HuffmanTree<S> {
  if (frequencies.size === 0) {
    throw new InvalidInputError('Cannot build a Huffman tree from an empty frequency model')
  }

  // Every internal frequency is bounded by the root's
  const total = totalCount(frequencies)
  if (!Number.isSafeInteger(total)) {
    throw new InvalidInputError(`Total frequency ${total} exceeds the safe integer range`)
  }

  const queue = new PriorityQueue<QueuedNode<S>>(compareQueued)
  let seq = 0
  for (const [symbol, freq] of frequencies) {
    if (!Number.isSafeInteger(freq) || freq < 1) {
      throw new InvalidInputError(`Frequency of ${String(symbol)} must be a positive integer, got ${freq}`)
    }
    queue.push({ node: createLeaf(symbol, freq), seq: seq++ })
  }

  if (queue.size === 1) {
    const only = queue.pop()
    if (only === undefined || only.node.kind !== 'leaf') {
      throw new InvalidInputError('Single-symbol model did not produce a leaf')
    }
    debug('built single-symbol tree', { freq: only.node.freq })
    return createSingle(only.node)
  }

  while (queue.size > 1) {
    const a = queue.pop()
    const b = queue.pop()
    if (a === undefined || b === undefined) break
    queue.push({ node: createInternal(a.node, b.node), seq: seq++ })
  }

  const root = queue.pop()
  if (root === undefined || root.node.kind !== 'internal') {
    throw new InvalidInputError('Tree construction did not converge on an internal root')
  }
  debug('built Huffman tree', { symbols: frequencies.size, freq: root.node.freq })
  return root.node
}
