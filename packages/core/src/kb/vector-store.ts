/**
 * Vector store: one SQLite database per knowledge base holding chunk vectors
 * keyed by content-addressed chunk id, plus the (source, line) references that
 * attribute each chunk to the files it appears in.
 *
 * Follows the repository pattern: constructor(db), methods return Result<T>.
 */

import { mkdirSync } from 'node:fs'
import type Database from 'better-sqlite3'
import { Ok, Err, attempt } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage } from '../common/index.js'
import { openDatabase } from '../storage/index.js'
import { vectorDbPath, vectorDir } from './layout.js'
import type { TextChunk } from './schemas.js'
import { cosineDistance, l2Normalize, packFloat32, unpackFloat32 } from './vector-search.js'

interface ChunkSearchRow {
  id: string
  content: string
  dimensions: number
  embedding: Buffer
  source: string
  start_line: number
}

/** A chunk vector, independent of where the text appears. */
export interface ChunkVector {
  id: string
  content: string
  modelName: string
  embedding: ArrayLike<number>
}

/** A chunk vector together with one source attribution. */
export interface VectorEntry extends ChunkVector {
  source: string
  startLine: number
}

export interface VectorQueryOptions {
  /** Case-insensitive substring the source path must contain. */
  sourceKeyword?: string
  /** Only consider vectors produced by this model. */
  modelName?: string
}

export interface VectorMatch {
  chunkId: string
  source: string
  startLine: number
  content: string
  /** `1 - cosine similarity`. */
  distance: number
}

export interface ReplaceSourceResult {
  /** References written for the source. */
  written: number
  /** Chunks deleted because nothing referenced them any more. */
  orphansRemoved: number
}

function toStoreError(action: string): (err: unknown) => KnowledgeError {
  return (err) => KnowledgeError.vectorStore(`Failed to ${action}: ${errorMessage(err)}`, err)
}

export class VectorStore {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  /** Open (creating if needed) the store under `<kbDir>/vectors/`. */
  static open(kbDir: string): Result<VectorStore, KnowledgeError> {
    return attempt(() => {
      mkdirSync(vectorDir(kbDir), { recursive: true })
      return new VectorStore(openDatabase(vectorDbPath(kbDir)))
    }, toStoreError('open vector store'))
  }

  close(): void {
    this.db.close()
  }

  private writeVectors(vectors: ChunkVector[], now: string): void {
    const stmt = this.db.prepare(`
      INSERT INTO chunks (id, content, model_name, dimensions, embedding, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        content = excluded.content,
        model_name = excluded.model_name,
        dimensions = excluded.dimensions,
        embedding = excluded.embedding,
        updated_at = excluded.updated_at
    `)
    for (const vector of vectors) {
      const normalized = l2Normalize(vector.embedding)
      stmt.run(vector.id, vector.content, vector.modelName, normalized.length, packFloat32(normalized), now, now)
    }
  }

  private writeReference(chunkId: string, source: string, startLine: number): void {
    this.db
      .prepare('INSERT OR IGNORE INTO chunk_sources (chunk_id, source, start_line) VALUES (?, ?, ?)')
      .run(chunkId, source, startLine)
  }

  private removeOrphans(): number {
    return this.db
      .prepare('DELETE FROM chunks WHERE id NOT IN (SELECT DISTINCT chunk_id FROM chunk_sources)')
      .run().changes
  }

  /** Insert or replace vectors and their references. Re-running with the same entries changes nothing. */
  upsert(entries: VectorEntry[]): Result<number, KnowledgeError> {
    return attempt(() => {
      const now = new Date().toISOString()
      this.db.transaction(() => {
        this.writeVectors(entries, now)
        for (const entry of entries) {
          this.writeReference(entry.id, entry.source, entry.startLine)
        }
      })()
      return entries.length
    }, toStoreError('upsert vectors'))
  }

  /**
   * Swap a file's references for `chunks` in one transaction. `vectors` holds
   * the embeddings the store did not have yet; every chunk must either be in
   * `vectors` or already stored.
   */
  replaceSource(source: string, chunks: TextChunk[], vectors: ChunkVector[]): Result<ReplaceSourceResult, KnowledgeError> {
    return attempt(() => {
      const now = new Date().toISOString()
      let orphansRemoved = 0
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM chunk_sources WHERE source = ?').run(source)
        this.writeVectors(vectors, now)
        for (const chunk of chunks) {
          this.writeReference(chunk.id, source, chunk.startLine)
        }
        orphansRemoved = this.removeOrphans()
      })()
      return { written: chunks.length, orphansRemoved }
    }, toStoreError(`replace chunks of ${source}`))
  }

  /** Drop every reference from `source`, then any chunk left unreferenced. */
  deleteBySource(source: string): Result<number, KnowledgeError> {
    return attempt(() => {
      let removed = 0
      this.db.transaction(() => {
        removed = this.db.prepare('DELETE FROM chunk_sources WHERE source = ?').run(source).changes
        this.removeOrphans()
      })()
      return removed
    }, toStoreError(`delete chunks of ${source}`))
  }

  /** Ids from `ids` that have no stored vector for `modelName`. Order and duplicates follow the input. */
  missingIds(ids: string[], modelName: string): Result<string[], KnowledgeError> {
    return attempt(() => {
      const stmt = this.db.prepare('SELECT 1 FROM chunks WHERE id = ? AND model_name = ?')
      return ids.filter((id) => stmt.get(id, modelName) === undefined)
    }, toStoreError('look up stored vectors'))
  }

  /**
   * Nearest chunks by cosine distance, closest first. A chunk shared by
   * several sources appears once, under its first matching (source, line).
   */
  query(vector: ArrayLike<number>, k: number, options?: VectorQueryOptions): Result<VectorMatch[], KnowledgeError> {
    if (k <= 0) return Ok([])
    if (vector.length === 0) {
      return Err(KnowledgeError.validation('Query vector is empty'))
    }

    return attempt(() => {
      const clauses: string[] = []
      const params: Array<string | number> = []
      const keyword = options?.sourceKeyword?.trim().toLowerCase()
      if (keyword) {
        clauses.push('instr(lower(s.source), ?) > 0')
        params.push(keyword)
      }
      if (options?.modelName) {
        clauses.push('c.model_name = ?')
        params.push(options.modelName)
      }
      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''

      const rows = this.db
        .prepare(`
          SELECT c.id, c.content, c.dimensions, c.embedding, s.source, s.start_line
          FROM chunks c
          JOIN chunk_sources s ON s.chunk_id = c.id
          ${where}
          ORDER BY s.source, s.start_line
        `)
        .all(...params) as ChunkSearchRow[]

      const queryVec = l2Normalize(vector)
      const seen = new Set<string>()
      const matches: VectorMatch[] = []

      for (const row of rows) {
        if (seen.has(row.id)) continue
        seen.add(row.id)
        if (row.dimensions !== queryVec.length) continue
        const stored = unpackFloat32(row.embedding, row.dimensions)
        if (!stored) continue
        matches.push({
          chunkId: row.id,
          source: row.source,
          startLine: row.start_line,
          content: row.content,
          distance: cosineDistance(queryVec, stored),
        })
      }

      matches.sort((a, b) => a.distance - b.distance)
      return matches.slice(0, k)
    }, toStoreError('query vectors'))
  }

  /** Reference counts per source path. */
  countBySource(): Result<Record<string, number>, KnowledgeError> {
    return attempt(() => {
      const rows = this.db
        .prepare('SELECT source, COUNT(*) as count FROM chunk_sources GROUP BY source ORDER BY source')
        .all() as Array<{ source: string; count: number }>
      const counts: Record<string, number> = {}
      for (const row of rows) counts[row.source] = row.count
      return counts
    }, toStoreError('count chunks'))
  }

  /** Embedding models that produced the stored vectors, sorted. */
  modelNames(): Result<string[], KnowledgeError> {
    return attempt(() => {
      const rows = this.db
        .prepare('SELECT DISTINCT model_name FROM chunks ORDER BY model_name')
        .all() as Array<{ model_name: string }>
      return rows.map((row) => row.model_name)
    }, toStoreError('list embedding models'))
  }

  /** Number of distinct stored chunks. */
  count(): Result<number, KnowledgeError> {
    return attempt(() => {
      const row = this.db.prepare('SELECT COUNT(*) as count FROM chunks').get() as { count: number }
      return row.count
    }, toStoreError('count chunks'))
  }
}
