// Model
export { countFrequencies, textSymbols, totalCount } from './model/frequency'
export type { FrequencyModel } from './model/frequency'
export { createInternal, createLeaf, createSingle, findTreeViolation, leafCount } from './model/tree'
export type { HuffmanInternal, HuffmanLeaf, HuffmanNode, HuffmanSingle, HuffmanTree } from './model/tree'
export { PriorityQueue } from './model/priority-queue'
export type { Comparator } from './model/priority-queue'

// Encode
export { buildHuffmanTree, compareQueued } from './encode/tree-builder'
export type { QueuedNode } from './encode/tree-builder'
export { buildCodeTable, codeLengths } from './encode/code-table'
export type { CodeTable } from './encode/code-table'
export { encodeBytes, encodeSymbols, encodeWithTable, huffmanEncode } from './encode/encode'
export type { EncodeResult } from './encode/encode'
export { compressionRatio, compressionStats } from './encode/ratio'
export type { CompressionStats } from './encode/ratio'
export { packBits } from './encode/bit-writer'
export type { PackedBits } from './encode/bit-writer'

// Decode
export { decodeBytes, decodeSymbols, huffmanDecode } from './decode/decode'
export type { HuffmanDecodeOptions } from './decode/decode'
export { unpackBits } from './decode/bit-reader'

// Persistence
export { deserializeTree, serializeTree, MODEL_VERSION } from './persist/model-format'
export { treeFromJson, treeToJson } from './persist/model-json'
export type { TreeDocument } from './persist/model-json'
export { loadTree, saveTree } from './persist/storage'
export type { TreeFileFormat, TreeStorageOptions } from './persist/storage'
export { byteSymbolCodec, stringSymbolCodec } from './persist/symbol-codec'
export type { SymbolCodec } from './persist/symbol-codec'

// Errors and logging
export {
  HuffmanError,
  InvalidInputError,
  LookupFailureError,
  MalformedModelError,
  PersistenceIOError,
} from './errors'
export type { HuffmanErrorCode } from './errors'
export { onLog, setLogLevel } from './logger'
export type { LogEntry, LogLevel } from './logger'
