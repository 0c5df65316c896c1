/**
 * Sliding-window line chunker with content-addressed chunk identity.
 *
 * Whitespace-only lines are dropped before windowing. Windows of `chunkSize`
 * lines advance by `chunkSize - chunkOverlap`; the last window may be short,
 * and windowing stops once a window reaches the final line.
 */

import { createHash } from 'node:crypto'
import type { TextChunk } from './schemas.js'

export interface ChunkerOptions {
  chunkSize?: number
  chunkOverlap?: number
}

export interface NumberedLine {
  /** 1-based physical line number in the source file. */
  lineNumber: number
  text: string
}

const DEFAULT_CHUNK_SIZE = 10
const DEFAULT_CHUNK_OVERLAP = 2
const CHUNK_ID_LENGTH = 16

export function splitNonEmptyLines(content: string): NumberedLine[] {
  const lines: NumberedLine[] = []
  const raw = content.split(/\r\n|\r|\n/)
  for (let i = 0; i < raw.length; i++) {
    if (raw[i].trim().length === 0) continue
    lines.push({ lineNumber: i + 1, text: raw[i] })
  }
  return lines
}

/** First 16 hex chars of SHA-256 over the exact window text. */
export function computeChunkId(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, CHUNK_ID_LENGTH)
}

/**
 * Clamp window parameters into a usable range. Out-of-range values are a
 * constraint violation: they are corrected and reported, never thrown.
 */
export function resolveWindow(options?: ChunkerOptions): { chunkSize: number; chunkOverlap: number } {
  let chunkSize = Math.floor(options?.chunkSize ?? DEFAULT_CHUNK_SIZE)
  let chunkOverlap = Math.floor(options?.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP)

  if (!Number.isFinite(chunkSize) || chunkSize < 1) {
    console.warn(`[chunker] chunkSize=${options?.chunkSize} is not a positive integer, using 1`)
    chunkSize = 1
  }
  if (!Number.isFinite(chunkOverlap) || chunkOverlap < 0) {
    console.warn(`[chunker] chunkOverlap=${options?.chunkOverlap} is negative, using 0`)
    chunkOverlap = 0
  }
  if (chunkOverlap >= chunkSize) {
    console.warn(`[chunker] chunkOverlap=${chunkOverlap} must be less than chunkSize=${chunkSize}, using ${chunkSize - 1}`)
    chunkOverlap = chunkSize - 1
  }

  return { chunkSize, chunkOverlap }
}

export function chunkLines(source: string, content: string, options?: ChunkerOptions): TextChunk[] {
  const lines = splitNonEmptyLines(content)
  if (lines.length === 0) return []

  const { chunkSize, chunkOverlap } = resolveWindow(options)
  const step = chunkSize - chunkOverlap
  const chunks: TextChunk[] = []

  for (let start = 0; start < lines.length; start += step) {
    const window = lines.slice(start, start + chunkSize)
    const text = window.map((line) => line.text).join('\n')
    chunks.push({
      id: computeChunkId(text),
      source,
      startLine: window[0].lineNumber,
      text,
    })
    if (start + chunkSize >= lines.length) break
  }

  return chunks
}
