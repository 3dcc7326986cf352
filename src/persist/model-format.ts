// Binary wire format for Huffman trees, version 1
//
//   magic      "HUFT"
//   version    u8
//   nodeCount  varint
//   nodes      pre-order; each: tag u8, freq varint,
//              leaves also: symbol length varint + symbol bytes
//   crc32      u32 LE over every preceding byte
//
// Varints are LEB128. Tags: 0 leaf, 1 internal, 2 single (root only).

import { MalformedModelError } from '../errors'
import { debug } from '../logger'
import { BitWriter, writeUint32LE, writeVarInt } from '../encode/bit-writer'
import { BitReader } from '../decode/bit-reader'
import {
  type HuffmanInternal,
  type HuffmanLeaf,
  type HuffmanNode,
  type HuffmanTree,
  createInternal,
  createLeaf,
  createSingle,
  findTreeViolation,
} from '../model/tree'
import { crc32 } from './crc32'
import { type SymbolCodec, stringSymbolCodec } from './symbol-codec'

export const MODEL_MAGIC = Uint8Array.of(0x48, 0x55, 0x46, 0x54) // "HUFT"
export const MODEL_VERSION = 1

// Far deeper than any tree the builder produces for safe-integer counts
export const MAX_TREE_DEPTH = 512

export const TAG_LEAF = 0
export const TAG_INTERNAL = 1
export const TAG_SINGLE = 2

const HEADER_SIZE = MODEL_MAGIC.length + 1
const CHECKSUM_SIZE = 4

type AnyNode<S> = HuffmanNode<S> | HuffmanTree<S>

export function serializeTree(tree: HuffmanTree<string>): Uint8Array
export function serializeTree<S>(tree: HuffmanTree<S>, codec: SymbolCodec<S>): Uint8Array
export function serializeTree(
  tree: HuffmanTree<unknown>,
  codec: SymbolCodec<unknown> = stringSymbolCodec
): Uint8Array {
  // Pre-order, left subtree first
  const order: AnyNode<unknown>[] = []
  const stack: AnyNode<unknown>[] = [tree]
  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined) break
    order.push(node)
    if (node.kind === 'internal') {
      stack.push(node.right, node.left)
    } else if (node.kind === 'single') {
      stack.push(node.leaf)
    }
  }

  const writer = new BitWriter()
  writer.writeBytes(MODEL_MAGIC)
  writer.writeByte(MODEL_VERSION)
  writeVarInt(writer, order.length)

  for (const node of order) {
    switch (node.kind) {
      case 'leaf': {
        const bytes = codec.encode(node.symbol)
        writer.writeByte(TAG_LEAF)
        writeVarInt(writer, node.freq)
        writeVarInt(writer, bytes.length)
        writer.writeBytes(bytes)
        break
      }
      case 'internal':
        writer.writeByte(TAG_INTERNAL)
        writeVarInt(writer, node.freq)
        break
      case 'single':
        writer.writeByte(TAG_SINGLE)
        writeVarInt(writer, node.freq)
        break
    }
  }

  const body = writer.finish()
  writeUint32LE(writer, crc32(body))
  const out = writer.finish()
  debug('serialized tree', { nodes: order.length, bytes: out.length })
  return out
}

export function deserializeTree(bytes: Uint8Array): HuffmanTree<string>
export function deserializeTree<S>(bytes: Uint8Array, codec: SymbolCodec<S>): HuffmanTree<S>
export function deserializeTree(
  bytes: Uint8Array,
  codec: SymbolCodec<unknown> = stringSymbolCodec
): HuffmanTree<unknown> {
  if (bytes.length < HEADER_SIZE + 1 + CHECKSUM_SIZE) {
    throw new MalformedModelError(`Model is truncated: ${bytes.length} bytes`)
  }
  for (let i = 0; i < MODEL_MAGIC.length; i++) {
    if (bytes[i] !== MODEL_MAGIC[i]) {
      throw new MalformedModelError('Not a Huffman tree model (bad magic)')
    }
  }
  const version = bytes[MODEL_MAGIC.length]
  if (version !== MODEL_VERSION) {
    throw new MalformedModelError(`Unsupported model version ${version}`)
  }

  const bodyLength = bytes.length - CHECKSUM_SIZE
  const body = bytes.subarray(0, bodyLength)
  const stored = new BitReader(bytes.subarray(bodyLength)).readUint32LE()
  const actual = crc32(body)
  if (stored !== actual) {
    throw new MalformedModelError(
      `Model checksum mismatch: stored ${hex32(stored)}, computed ${hex32(actual)}`
    )
  }

  let tree: HuffmanTree<unknown>
  try {
    tree = new ModelParser(new BitReader(body), codec).parse()
  } catch (e) {
    if (e instanceof MalformedModelError) throw e
    const reason = e instanceof Error ? e.message : String(e)
    throw new MalformedModelError(`Corrupt model: ${reason}`, { cause: e })
  }

  const violation = findTreeViolation(tree)
  if (violation !== undefined) {
    throw new MalformedModelError(`Invalid tree: ${violation}`)
  }
  return tree
}

class ModelParser<S> {
  private readonly reader: BitReader
  private readonly codec: SymbolCodec<S>
  private nodesRead = 0
  private declaredNodes = 0

  constructor(reader: BitReader, codec: SymbolCodec<S>) {
    this.reader = reader
    this.codec = codec
  }

  parse(): HuffmanTree<S> {
    this.reader.readBytes(HEADER_SIZE)
    this.declaredNodes = this.reader.readVarInt()
    if (this.declaredNodes < 2) {
      throw new MalformedModelError(`Model declares ${this.declaredNodes} nodes; a tree has at least 2`)
    }

    const tag = this.readTag()
    let root: HuffmanTree<S>
    if (tag === TAG_SINGLE) {
      const freq = this.reader.readVarInt()
      const leaf = this.readLeaf()
      if (leaf.freq !== freq) {
        throw new MalformedModelError(`single root frequency ${freq} does not match leaf frequency ${leaf.freq}`)
      }
      root = createSingle(leaf)
    } else if (tag === TAG_INTERNAL) {
      root = this.readInternalBody(0)
    } else {
      throw new MalformedModelError('Root must be an internal or single node, found a leaf')
    }

    if (this.nodesRead !== this.declaredNodes) {
      throw new MalformedModelError(`Model declares ${this.declaredNodes} nodes but contains ${this.nodesRead}`)
    }
    if (this.reader.bitsRemaining !== 0) {
      throw new MalformedModelError(`${this.reader.bitsRemaining >>> 3} trailing bytes after the tree`)
    }
    return root
  }

  private readTag(): number {
    if (this.nodesRead >= this.declaredNodes) {
      throw new MalformedModelError(`Model contains more than the declared ${this.declaredNodes} nodes`)
    }
    this.nodesRead++
    return this.reader.readByte()
  }

  private readNode(depth: number): HuffmanNode<S> {
    if (depth > MAX_TREE_DEPTH) {
      throw new MalformedModelError(`Tree is deeper than ${MAX_TREE_DEPTH} levels`)
    }
    const tag = this.readTag()
    switch (tag) {
      case TAG_LEAF:
        return this.readLeafBody()
      case TAG_INTERNAL:
        return this.readInternalBody(depth)
      case TAG_SINGLE:
        throw new MalformedModelError('A single-symbol node may only appear at the root')
      default:
        throw new MalformedModelError(`Unknown node tag ${tag}`)
    }
  }

  // The internal node's tag has already been read
  private readInternalBody(depth: number): HuffmanInternal<S> {
    const freq = this.reader.readVarInt()
    const left = this.readNode(depth + 1)
    const right = this.readNode(depth + 1)
    const node = createInternal(left, right)
    if (node.freq !== freq) {
      throw new MalformedModelError(
        `internal frequency ${freq} is not the sum of its children (${left.freq} + ${right.freq})`
      )
    }
    return node
  }

  private readLeaf(): HuffmanLeaf<S> {
    const tag = this.readTag()
    if (tag !== TAG_LEAF) {
      throw new MalformedModelError(`Expected a leaf under the single root, found tag ${tag}`)
    }
    return this.readLeafBody()
  }

  private readLeafBody(): HuffmanLeaf<S> {
    const freq = this.reader.readVarInt()
    const length = this.reader.readVarInt()
    const symbol = this.codec.decode(this.reader.readBytes(length))
    return createLeaf(symbol, freq)
  }
}

function hex32(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`
}
