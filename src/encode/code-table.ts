// Code table derivation: symbol → root-to-leaf path ('0' left, '1' right)

import type { HuffmanNode, HuffmanTree } from '../model/tree'

export type CodeTable<S> = Map<S, string>

export function buildCodeTable<S>(tree: HuffmanTree<S>): CodeTable<S> {
  const table: CodeTable<S> = new Map()

  // A lone symbol sits one level below the synthetic root
  if (tree.kind === 'single') {
    table.set(tree.leaf.symbol, '0')
    return table
  }

  // Explicit stack; right is pushed first so the left subtree is visited first
  const stack: Array<{ node: HuffmanNode<S>; code: string }> = [{ node: tree, code: '' }]
  while (stack.length > 0) {
    const top = stack.pop()
    if (top === undefined) break
    const { node, code } = top
    if (node.kind === 'leaf') {
      table.set(node.symbol, code)
      continue
    }
    stack.push({ node: node.right, code: code + '1' })
    stack.push({ node: node.left, code: code + '0' })
  }
  return table
}

export function codeLengths<S>(table: ReadonlyMap<S, string>): Map<S, number> {
  const lengths = new Map<S, number>()
  for (const [symbol, code] of table) {
    lengths.set(symbol, code.length)
  }
  return lengths
}
