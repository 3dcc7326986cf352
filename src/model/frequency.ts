// Symbol frequency counting

// Keys keep first-occurrence order, which the tree builder uses as its
// tie-break sequence
export type FrequencyModel<S> = Map<S, number>

export function countFrequencies<S>(symbols: Iterable<S>): FrequencyModel<S> {
  const counts: FrequencyModel<S> = new Map()
  for (const symbol of symbols) {
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1)
  }
  return counts
}

// Splits text into code points (surrogate pairs stay together)
export function textSymbols(text: string): string[] {
  return Array.from(text)
}

export function totalCount<S>(model: ReadonlyMap<S, number>): number {
  let total = 0
  for (const count of model.values()) {
    total += count
  }
  return total
}
