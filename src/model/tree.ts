// Huffman tree node types
//
// Only leaves carry symbols and only internal nodes carry children. A
// one-symbol alphabet gets a 'single' root wrapping its leaf so that every
// symbol still has a code of at least one digit.

export interface HuffmanLeaf<S> {
  readonly kind: 'leaf'
  readonly symbol: S
  readonly freq: number
}

export interface HuffmanInternal<S> {
  readonly kind: 'internal'
  readonly freq: number
  readonly left: HuffmanNode<S>
  readonly right: HuffmanNode<S>
}

export interface HuffmanSingle<S> {
  readonly kind: 'single'
  readonly freq: number
  readonly leaf: HuffmanLeaf<S>
}

export type HuffmanNode<S> = HuffmanLeaf<S> | HuffmanInternal<S>

// What the builder returns and the decoder consumes
export type HuffmanTree<S> = HuffmanInternal<S> | HuffmanSingle<S>

export function createLeaf<S>(symbol: S, freq: number): HuffmanLeaf<S> {
  return { kind: 'leaf', symbol, freq }
}

export function createInternal<S>(left: HuffmanNode<S>, right: HuffmanNode<S>): HuffmanInternal<S> {
  return { kind: 'internal', freq: left.freq + right.freq, left, right }
}

export function createSingle<S>(leaf: HuffmanLeaf<S>): HuffmanSingle<S> {
  return { kind: 'single', freq: leaf.freq, leaf }
}

// First structural violation found, or undefined for a valid tree.
// Checks leaf frequencies, internal sums and symbol uniqueness.
export function findTreeViolation<S>(tree: HuffmanTree<S>): string | undefined {
  if (tree.kind === 'single') {
    if (tree.freq !== tree.leaf.freq) {
      return `single root frequency ${tree.freq} does not match leaf frequency ${tree.leaf.freq}`
    }
    return checkLeaf(tree.leaf)
  }

  const seen = new Set<S>()
  const stack: HuffmanNode<S>[] = [tree]
  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined) break
    if (node.kind === 'leaf') {
      const problem = checkLeaf(node)
      if (problem !== undefined) return problem
      if (seen.has(node.symbol)) return `symbol ${String(node.symbol)} appears in more than one leaf`
      seen.add(node.symbol)
      continue
    }
    if (node.freq !== node.left.freq + node.right.freq) {
      return `internal frequency ${node.freq} is not the sum of its children (${node.left.freq} + ${node.right.freq})`
    }
    stack.push(node.right, node.left)
  }
  return undefined
}

function checkLeaf<S>(leaf: HuffmanLeaf<S>): string | undefined {
  if (!Number.isSafeInteger(leaf.freq) || leaf.freq < 1) {
    return `leaf frequency ${leaf.freq} is not a positive integer`
  }
  return undefined
}

export function leafCount<S>(tree: HuffmanTree<S>): number {
  if (tree.kind === 'single') return 1
  let count = 0
  const stack: HuffmanNode<S>[] = [tree]
  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined) break
    if (node.kind === 'leaf') {
      count++
    } else {
      stack.push(node.right, node.left)
    }
  }
  return count
}
