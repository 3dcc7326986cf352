// Binary min-heap with an explicit comparator

export type Comparator<T> = (a: T, b: T) => number

export class PriorityQueue<T> {
  private readonly heap: T[] = []
  private readonly compare: Comparator<T>

  constructor(compare: Comparator<T>) {
    this.compare = compare
  }

  get size(): number {
    return this.heap.length
  }

  push(item: T): void {
    const heap = this.heap
    heap.push(item)

    // Sift up
    let i = heap.length - 1
    while (i > 0) {
      const parent = (i - 1) >>> 1
      if (this.compare(heap[i], heap[parent]) >= 0) break
      this.swap(i, parent)
      i = parent
    }
  }

  // Smallest item, or undefined when empty
  pop(): T | undefined {
    const heap = this.heap
    if (heap.length === 0) return undefined

    const top = heap[0]
    const last = heap.pop()
    if (heap.length === 0 || last === undefined) return top
    heap[0] = last

    // Sift down
    let i = 0
    const n = heap.length
    while (true) {
      const left = 2 * i + 1
      const right = left + 1
      let smallest = i
      if (left < n && this.compare(heap[left], heap[smallest]) < 0) smallest = left
      if (right < n && this.compare(heap[right], heap[smallest]) < 0) smallest = right
      if (smallest === i) break
      this.swap(i, smallest)
      i = smallest
    }
    return top
  }

  peek(): T | undefined {
    return this.heap[0]
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i]
    this.heap[i] = this.heap[j]
    this.heap[j] = tmp
  }
}
