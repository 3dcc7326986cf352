// Compression ratio against a fixed 8-bits-per-symbol baseline

export const BASELINE_BITS_PER_SYMBOL = 8

export interface CompressionStats {
  originalBits: number
  compressedBits: number
  ratio: number  // percent
}

// 0 for an empty original, where the ratio is undefined
export function compressionRatio(originalSymbolCount: number, encodedBitCount: number): number {
  if (originalSymbolCount === 0) return 0
  return (encodedBitCount / (originalSymbolCount * BASELINE_BITS_PER_SYMBOL)) * 100
}

// Text is measured in code points, matching how it is encoded
export function compressionStats(text: string, stream: string): CompressionStats {
  const symbols = Array.from(text).length
  return {
    originalBits: symbols * BASELINE_BITS_PER_SYMBOL,
    compressedBits: stream.length,
    ratio: compressionRatio(symbols, stream.length),
  }
}
