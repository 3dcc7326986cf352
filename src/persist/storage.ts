// Reading and writing tree models on disk
//
// The file handle is opened inside a scope and closed on every exit path.
// I/O failures surface as PersistenceIOError with the original error as
// cause; nothing is retried.

import { open } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { extname } from 'node:path'
import { MalformedModelError, PersistenceIOError } from '../errors'
import { error as logError, timer } from '../logger'
import type { HuffmanTree } from '../model/tree'
import { deserializeTree, serializeTree } from './model-format'
import { treeFromJson, treeToJson } from './model-json'
import { type SymbolCodec, stringSymbolCodec } from './symbol-codec'

export type TreeFileFormat = 'binary' | 'json'

export interface TreeStorageOptions<S> {
  codec?: SymbolCodec<S>
  format?: TreeFileFormat  // default: 'json' for *.json paths, else 'binary'
}

export function formatForPath(path: string): TreeFileFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'binary'
}

export function saveTree(tree: HuffmanTree<string>, path: string, options?: TreeStorageOptions<string>): Promise<void>
export function saveTree<S>(
  tree: HuffmanTree<S>,
  path: string,
  options: TreeStorageOptions<S> & { codec: SymbolCodec<S> }
): Promise<void>
export async function saveTree(
  tree: HuffmanTree<unknown>,
  path: string,
  options: TreeStorageOptions<unknown> = {}
): Promise<void> {
  const codec = options.codec ?? stringSymbolCodec
  const format = options.format ?? formatForPath(path)
  const t = timer('saveTree')
  const data =
    format === 'json'
      ? new TextEncoder().encode(`${JSON.stringify(treeToJson(tree, codec), null, 2)}\n`)
      : serializeTree(tree, codec)

  await withFile(path, 'w', async (handle) => {
    await handle.writeFile(data)
  })
  t.end({ path, format, bytes: data.length })
}

export function loadTree(path: string, options?: TreeStorageOptions<string>): Promise<HuffmanTree<string>>
export function loadTree<S>(
  path: string,
  options: TreeStorageOptions<S> & { codec: SymbolCodec<S> }
): Promise<HuffmanTree<S>>
export async function loadTree(
  path: string,
  options: TreeStorageOptions<unknown> = {}
): Promise<HuffmanTree<unknown>> {
  const codec = options.codec ?? stringSymbolCodec
  const format = options.format ?? formatForPath(path)
  const t = timer('loadTree')
  const data = await withFile(path, 'r', (handle) => handle.readFile())

  let tree: HuffmanTree<unknown>
  if (format === 'binary') {
    tree = deserializeTree(data, codec)
  } else {
    let document: unknown
    try {
      document = JSON.parse(data.toString('utf8'))
    } catch (e) {
      throw new MalformedModelError(`Tree file is not valid JSON: ${path}`, { cause: e })
    }
    tree = treeFromJson(document, codec)
  }
  t.end({ path, format, bytes: data.length })
  return tree
}

async function withFile<T>(
  path: string,
  flags: 'r' | 'w',
  body: (handle: FileHandle) => Promise<T>
): Promise<T> {
  const action = flags === 'r' ? 'read' : 'write'

  let handle: FileHandle
  try {
    handle = await open(path, flags)
  } catch (e) {
    logError(`cannot open tree file for ${action}`, { path, reason: describe(e) })
    throw new PersistenceIOError(`Cannot open tree file for ${action}`, path, e)
  }

  // A close failure is reported only when the body succeeded; otherwise the
  // body's error is the one that propagates
  let bodyFailed = false
  try {
    return await body(handle)
  } catch (e) {
    bodyFailed = true
    logError(`tree file ${action} failed`, { path, reason: describe(e) })
    throw new PersistenceIOError(`Tree file ${action} failed`, path, e)
  } finally {
    try {
      await handle.close()
    } catch (e) {
      logError('cannot close tree file', { path, reason: describe(e) })
      if (!bodyFailed) {
        throw new PersistenceIOError('Cannot close tree file', path, e)
      }
    }
  }
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
