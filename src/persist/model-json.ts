// JSON document form of a Huffman tree
//
// Symbols are stored as base64 of their codec bytes so any symbol type
// survives the trip. Documents are validated with zod, then with the same
// structural checks as the binary format.

import { z } from 'zod'
import { MalformedModelError } from '../errors'
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
import { MAX_TREE_DEPTH, MODEL_VERSION } from './model-format'
import { type SymbolCodec, stringSymbolCodec } from './symbol-codec'

export const TREE_DOCUMENT_FORMAT = 'huffcode-tree'

export interface JsonLeaf {
  type: 'leaf'
  symbol: string // base64
  freq: number
}

export interface JsonInternal {
  type: 'internal'
  freq: number
  left: JsonNode
  right: JsonNode
}

export interface JsonSingle {
  type: 'single'
  freq: number
  leaf: JsonLeaf
}

export type JsonNode = JsonLeaf | JsonInternal

export interface TreeDocument {
  format: typeof TREE_DOCUMENT_FORMAT
  version: typeof MODEL_VERSION
  root: JsonInternal | JsonSingle
}

const freqSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER)

const leafSchema = z.object({
  type: z.literal('leaf'),
  symbol: z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'symbol must be base64'),
  freq: freqSchema,
})

const internalSchema: z.ZodType<JsonInternal> = z.lazy(() =>
  z.object({
    type: z.literal('internal'),
    freq: freqSchema,
    left: nodeSchema,
    right: nodeSchema,
  })
)

const nodeSchema: z.ZodType<JsonNode> = z.lazy(() => z.union([leafSchema, internalSchema]))

const singleSchema = z.object({
  type: z.literal('single'),
  freq: freqSchema,
  leaf: leafSchema,
})

export const treeDocumentSchema = z.object({
  format: z.literal(TREE_DOCUMENT_FORMAT),
  version: z.literal(MODEL_VERSION),
  root: z.union([internalSchema, singleSchema]),
})

export function treeToJson(tree: HuffmanTree<string>): TreeDocument
export function treeToJson<S>(tree: HuffmanTree<S>, codec: SymbolCodec<S>): TreeDocument
export function treeToJson(
  tree: HuffmanTree<unknown>,
  codec: SymbolCodec<unknown> = stringSymbolCodec
): TreeDocument {
  const leafToJson = (leaf: HuffmanLeaf<unknown>): JsonLeaf => ({
    type: 'leaf',
    symbol: Buffer.from(codec.encode(leaf.symbol)).toString('base64'),
    freq: leaf.freq,
  })
  const nodeToJson = (node: HuffmanNode<unknown>): JsonNode =>
    node.kind === 'leaf'
      ? leafToJson(node)
      : { type: 'internal', freq: node.freq, left: nodeToJson(node.left), right: nodeToJson(node.right) }

  const root: JsonInternal | JsonSingle =
    tree.kind === 'single'
      ? { type: 'single', freq: tree.freq, leaf: leafToJson(tree.leaf) }
      : { type: 'internal', freq: tree.freq, left: nodeToJson(tree.left), right: nodeToJson(tree.right) }

  return { format: TREE_DOCUMENT_FORMAT, version: MODEL_VERSION, root }
}

export function treeFromJson(value: unknown): HuffmanTree<string>
export function treeFromJson<S>(value: unknown, codec: SymbolCodec<S>): HuffmanTree<S>
export function treeFromJson(
  value: unknown,
  codec: SymbolCodec<unknown> = stringSymbolCodec
): HuffmanTree<unknown> {
  // zod parses recursively; bound the nesting before it sees the document
  checkNesting(value, MAX_TREE_DEPTH + 1)
  const parsed = treeDocumentSchema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    throw new MalformedModelError(`Invalid tree document${where}: ${issue.message}`, { cause: parsed.error })
  }

  const decodeSymbol = (encoded: string): unknown => {
    try {
      return codec.decode(Buffer.from(encoded, 'base64'))
    } catch (e) {
      throw new MalformedModelError(`Cannot decode symbol ${JSON.stringify(encoded)}`, { cause: e })
    }
  }
  const leafFromJson = (leaf: JsonLeaf): HuffmanLeaf<unknown> => createLeaf(decodeSymbol(leaf.symbol), leaf.freq)
  const nodeFromJson = (node: JsonNode, depth: number): HuffmanNode<unknown> => {
    if (depth > MAX_TREE_DEPTH) {
      throw new MalformedModelError(`Tree is deeper than ${MAX_TREE_DEPTH} levels`)
    }
    if (node.type === 'leaf') return leafFromJson(node)
    return checkedInternal(node, nodeFromJson(node.left, depth + 1), nodeFromJson(node.right, depth + 1))
  }

  const { root } = parsed.data
  let tree: HuffmanTree<unknown>
  if (root.type === 'single') {
    if (root.freq !== root.leaf.freq) {
      throw new MalformedModelError(
        `single root frequency ${root.freq} does not match leaf frequency ${root.leaf.freq}`
      )
    }
    tree = createSingle(leafFromJson(root.leaf))
  } else {
    const left = nodeFromJson(root.left, 1)
    const right = nodeFromJson(root.right, 1)
    tree = checkedInternal(root, left, right)
  }

  const violation = findTreeViolation(tree)
  if (violation !== undefined) {
    throw new MalformedModelError(`Invalid tree: ${violation}`)
  }
  return tree
}

function checkedInternal(
  json: JsonInternal,
  left: HuffmanNode<unknown>,
  right: HuffmanNode<unknown>
): HuffmanInternal<unknown> {
  const node = createInternal(left, right)
  if (node.freq !== json.freq) {
    throw new MalformedModelError(
      `internal frequency ${json.freq} is not the sum of its children (${left.freq} + ${right.freq})`
    )
  }
  return node
}

// Iterative, so arbitrarily deep input cannot exhaust the stack
function checkNesting(value: unknown, maxDepth: number): void {
  const stack: Array<{ value: unknown; depth: number }> = [{ value, depth: 0 }]
  while (stack.length > 0) {
    const top = stack.pop()
    if (top === undefined) break
    if (typeof top.value !== 'object' || top.value === null) continue
    if (top.depth > maxDepth) {
      throw new MalformedModelError(`Tree is deeper than ${MAX_TREE_DEPTH} levels`)
    }
    for (const child of Object.values(top.value)) {
      stack.push({ value: child, depth: top.depth + 1 })
    }
  }
}
