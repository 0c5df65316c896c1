/**
 * Zod schemas and types for the knowledge base module.
 */

import { z } from 'zod'
import type { KnowledgeError } from '../common/index.js'

/** Persisted manifest: relative file path → SHA-256 of the file's bytes. */
export const ManifestSchema = z.record(z.string().min(1), z.string().min(1))

export type Manifest = z.infer<typeof ManifestSchema>

export const ScannedFileSchema = z.object({
  relativePath: z.string().min(1),
  absolutePath: z.string().min(1),
  hash: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
})

export type ScannedFile = z.infer<typeof ScannedFileSchema>

export interface ScanFailure {
  relativePath: string
  error: KnowledgeError
}

/** Result of comparing the text tree against the manifest. */
export interface ScanDiff {
  added: ScannedFile[]
  changed: ScannedFile[]
  unchanged: ScannedFile[]
  /** Manifest entries whose file no longer exists. */
  removed: string[]
  /** Files that could not be read; their manifest entries are kept as-is. */
  failed: ScanFailure[]
}

export const TextChunkSchema = z.object({
  id: z.string().length(16),
  source: z.string().min(1),
  startLine: z.number().int().positive(),
  text: z.string().min(1),
})

export type TextChunk = z.infer<typeof TextChunkSchema>

export interface FileIndexFailure {
  relativePath: string
  code: KnowledgeError['code']
  message: string
}

export interface IndexReport {
  runId: string
  knowledgeBase: string
  added: number
  changed: number
  removed: number
  unchanged: number
  failed: FileIndexFailure[]
  /** Chunks written to the vector store (new or re-attributed). */
  chunksWritten: number
  /** Texts sent to the embedding service. */
  embeddedTexts: number
  durationMs: number
  status: 'completed' | 'cancelled'
}

export const KnowledgeBaseInfoSchema = z.object({
  name: z.string().min(1),
  intro: z.string(),
  hasIntro: z.boolean(),
})

export type KnowledgeBaseInfo = z.infer<typeof KnowledgeBaseInfoSchema>
