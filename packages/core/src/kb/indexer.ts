/**
 * Indexer: one incremental scan cycle over a knowledge base.
 *
 * Removed files are purged from the vector store. Added and changed files are
 * chunked, only the windows the store has no vector for are embedded, and the
 * file's references are swapped in one transaction. The manifest entry is
 * written last, so a file that fails anywhere along the way stays stale and
 * is retried on the next cycle. A missing store, or one holding vectors from
 * another embedding model, resets the manifest and every file is indexed again.
 */

import { readFile } from 'node:fs/promises'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage } from '../common/index.js'
import { chunkLines } from './chunker.js'
import type { ChunkerOptions } from './chunker.js'
import { knowledgeBaseExists, resolveKnowledgeBaseDir, vectorStoreExists } from './layout.js'
import type { ManifestStore } from './manifest.js'
import { hashContent, scanKnowledgeBase } from './scanner.js'
import type { FileReader } from './scanner.js'
import type { FileIndexFailure, IndexReport, Manifest, ScannedFile } from './schemas.js'
import type { VectorStoreRegistry } from './store-registry.js'
import type { ChunkVector, VectorStore } from './vector-store.js'

/** The part of the embedder the indexer needs. */
export interface DocumentEmbedder {
  readonly modelName: string
  embedDocuments(texts: string[]): Promise<number[][]>
}

export interface IndexerContext {
  baseDir: string
  manifests: ManifestStore
  stores: VectorStoreRegistry
  embedder: DocumentEmbedder
  chunking?: ChunkerOptions
  readFile?: FileReader
}

interface FileOutcome {
  hash: string
  chunksWritten: number
  embeddedTexts: number
}

function toFailure(relativePath: string, error: KnowledgeError): FileIndexFailure {
  return { relativePath, code: error.code, message: error.message }
}

async function indexFile(
  ctx: IndexerContext,
  store: VectorStore,
  file: ScannedFile,
  read: FileReader,
): Promise<Result<FileOutcome, KnowledgeError>> {
  let content: Buffer
  try {
    content = await read(file.absolutePath)
  } catch (err) {
    return Err(KnowledgeError.scanIO(`Failed to read ${file.relativePath}: ${errorMessage(err)}`, err))
  }

  const chunks = chunkLines(file.relativePath, content.toString('utf-8'), ctx.chunking)

  const uniqueChunks = new Map(chunks.map((chunk) => [chunk.id, chunk]))
  const missing = store.missingIds([...uniqueChunks.keys()], ctx.embedder.modelName)
  if (!missing.ok) return missing

  const toEmbed = missing.value.map((id) => ({ id, text: uniqueChunks.get(id)?.text ?? '' }))
  let embeddings: number[][] = []
  if (toEmbed.length > 0) {
    try {
      embeddings = await ctx.embedder.embedDocuments(toEmbed.map((item) => item.text))
    } catch (err) {
      const error = err instanceof KnowledgeError
        ? err
        : KnowledgeError.embedding(`Embedding failed for ${file.relativePath}: ${errorMessage(err)}`, err)
      return Err(error)
    }
    if (embeddings.length !== toEmbed.length) {
      return Err(KnowledgeError.embedding(
        `Expected ${toEmbed.length} vectors for ${file.relativePath}, got ${embeddings.length}`,
      ))
    }
  }

  const vectors: ChunkVector[] = toEmbed.map((item, i) => ({
    id: item.id,
    content: item.text,
    modelName: ctx.embedder.modelName,
    embedding: embeddings[i],
  }))

  const replaced = store.replaceSource(file.relativePath, chunks, vectors)
  if (!replaced.ok) return replaced

  return Ok({
    hash: hashContent(content),
    chunksWritten: replaced.value.written,
    embeddedTexts: vectors.length,
  })
}

export async function indexKnowledgeBase(
  ctx: IndexerContext,
  kbName: string,
  signal?: AbortSignal,
): Promise<Result<IndexReport, KnowledgeError>> {
  const startTime = Date.now()
  const runId = uuidv4()
  const read = ctx.readFile ?? ((path: string) => readFile(path))

  const kbDir = resolveKnowledgeBaseDir(ctx.baseDir, kbName)
  if (!kbDir.ok) return kbDir
  if (!(await knowledgeBaseExists(kbDir.value))) {
    return Err(KnowledgeError.notFound('Knowledge base', kbName))
  }

  const loaded = await ctx.manifests.load(kbName)
  if (!loaded.ok) return loaded
  let manifest: Manifest = loaded.value

  if (Object.keys(manifest).length > 0 && !(await vectorStoreExists(kbDir.value))) {
    console.warn(`[indexer] ${kbName}: vector store is missing, rebuilding from scratch`)
    manifest = {}
    const reset = await ctx.manifests.save(kbName, manifest)
    if (!reset.ok) return reset
  }

  const storeResult = ctx.stores.get(kbDir.value)
  if (!storeResult.ok) return storeResult
  const store = storeResult.value

  const models = store.modelNames()
  if (!models.ok) return models
  const staleModels = models.value.filter((name) => name !== ctx.embedder.modelName)
  if (staleModels.length > 0 && Object.keys(manifest).length > 0) {
    console.warn(
      `[indexer] ${kbName}: vectors were built with ${staleModels.join(', ')}, re-embedding with ${ctx.embedder.modelName}`,
    )
    manifest = {}
    const reset = await ctx.manifests.save(kbName, manifest)
    if (!reset.ok) return reset
  }

  const diff = await scanKnowledgeBase(kbDir.value, manifest, { readFile: read })
  if (!diff.ok) return diff

  const report: IndexReport = {
    runId,
    knowledgeBase: kbName,
    added: 0,
    changed: 0,
    removed: 0,
    unchanged: diff.value.unchanged.length,
    failed: diff.value.failed.map((f) => toFailure(f.relativePath, f.error)),
    chunksWritten: 0,
    embeddedTexts: 0,
    durationMs: 0,
    status: 'completed',
  }

  const persist = async (relativePath: string): Promise<void> => {
    const saved = await ctx.manifests.save(kbName, manifest)
    if (!saved.ok) {
      console.warn(`[indexer] ${kbName}: ${saved.error.message}`)
      report.failed.push(toFailure(relativePath, saved.error))
    }
  }

  for (const relativePath of diff.value.removed) {
    if (signal?.aborted) {
      report.status = 'cancelled'
      break
    }
    const deleted = store.deleteBySource(relativePath)
    if (!deleted.ok) {
      console.warn(`[indexer] ${kbName}: failed to purge ${relativePath}: ${deleted.error.message}`)
      report.failed.push(toFailure(relativePath, deleted.error))
      continue
    }
    delete manifest[relativePath]
    report.removed++
    await persist(relativePath)
  }

  const pending: Array<{ file: ScannedFile; kind: 'added' | 'changed' }> = [
    ...diff.value.added.map((file) => ({ file, kind: 'added' as const })),
    ...diff.value.changed.map((file) => ({ file, kind: 'changed' as const })),
  ]

  for (const { file, kind } of pending) {
    if (report.status === 'cancelled' || signal?.aborted) {
      report.status = 'cancelled'
      break
    }

    const outcome = await indexFile(ctx, store, file, read)
    if (!outcome.ok) {
      console.warn(`[indexer] ${kbName}: ${file.relativePath} not indexed: ${outcome.error.message}`)
      report.failed.push(toFailure(file.relativePath, outcome.error))
      continue
    }

    manifest[file.relativePath] = outcome.value.hash
    report[kind]++
    report.chunksWritten += outcome.value.chunksWritten
    report.embeddedTexts += outcome.value.embeddedTexts
    await persist(file.relativePath)
  }

  report.durationMs = Date.now() - startTime
  if (report.added + report.changed + report.removed + report.failed.length > 0 || report.status === 'cancelled') {
    console.log(
      `[indexer] ${kbName}: ${report.status} run=${runId.slice(0, 8)} added=${report.added} changed=${report.changed} ` +
        `removed=${report.removed} failed=${report.failed.length} chunks=${report.chunksWritten} ` +
        `embedded=${report.embeddedTexts} in ${report.durationMs}ms`,
    )
  }
  return Ok(report)
}
