/**
 * Zod schemas and types for keyword and semantic retrieval.
 */

import { z } from 'zod'

export const KeywordSearchOptionsSchema = z.object({
  maxLines: z.number().int().positive().default(20),
  maxChars: z.number().int().positive().default(2000),
  caseSensitive: z.boolean().default(false),
  sourceKeyword: z.string().optional(),
})

export type KeywordSearchOptions = z.input<typeof KeywordSearchOptionsSchema>

export interface KeywordHit {
  source: string
  /** 1-based physical line number. */
  line: number
  text: string
}

/**
 * Per-query retrieval settings. Unset `topK`, `enableRerank` and
 * `rerankTopK` fall back to the knowledge settings. Fractional sizes are
 * rounded down at search time.
 */
export const RetrievalConfigSchema = z.object({
  topK: z.number().finite().optional(),
  enableRerank: z.boolean().optional(),
  rerankTopK: z.number().finite().optional(),
  minRelevance: z.number().min(0).max(1).default(0),
  sourceKeyword: z.string().optional(),
  deduplicate: z.boolean().default(true),
})

export type RetrievalConfig = z.input<typeof RetrievalConfigSchema>

export interface RetrievalDefaults {
  topK: number
  enableRerank: boolean
  rerankTopK: number
}

export interface SemanticHit {
  source: string
  startLine: number
  text: string
  /** `1 - distance`, clamped to [0, 1] and rounded to 4 decimals. */
  relevance: number
  rerankScore?: number
}

export type RerankPlan =
  | { rerank: false }
  | { rerank: true; rerankTopK: number }
