/**
 * Zod schemas for tool arguments.
 *
 * Models send loosely typed JSON: numbers as strings, booleans as
 * "yes"/"off"/1. Values are coerced where the meaning is unambiguous;
 * an unrecognized boolean falls back to the default.
 */

import { z } from 'zod'

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on'])
const FALSE_WORDS = new Set(['false', '0', 'no', 'off'])

function toBoolean(value: unknown): unknown {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') {
    if (value === 1) return true
    if (value === 0) return false
    return undefined
  }
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase()
    if (TRUE_WORDS.has(lowered)) return true
    if (FALSE_WORDS.has(lowered)) return false
  }
  return undefined
}

function blankToUndefined(value: unknown): unknown {
  if (value === null || value === undefined) return undefined
  if (typeof value === 'string' && value.trim() === '') return undefined
  return value
}

function toTrimmedString(value: unknown): unknown {
  if (value === null || value === undefined) return ''
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return typeof value === 'string' ? value.trim() : value
}

export function flag(defaultValue: boolean) {
  return z.preprocess(toBoolean, z.boolean().default(defaultValue))
}

export function optionalFlag() {
  return z.preprocess(toBoolean, z.boolean().optional())
}

export function intInRange(min: number, max: number, defaultValue: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(defaultValue))
}

export function optionalIntInRange(min: number, max: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).optional())
}

export function text() {
  return z.preprocess(toTrimmedString, z.string())
}

export const KnowledgeListArgsSchema = z.object({
  intro_max_chars: intInRange(1, 2000, 120),
  max_items: intInRange(1, 500, 50),
  only_ready: flag(true),
  include_intro: flag(true),
  include_has_intro: flag(false),
  name_keyword: text(),
})

export type KnowledgeListArgs = z.infer<typeof KnowledgeListArgsSchema>

export const TextSearchArgsSchema = z.object({
  knowledge_base: text().pipe(z.string().min(1, 'knowledge_base is required')),
  keyword: text().pipe(z.string().min(1, 'keyword is required')),
  max_lines: intInRange(1, 500, 20),
  max_chars: intInRange(100, 20000, 2000),
  max_chars_per_item: intInRange(20, 5000, 180),
  case_sensitive: flag(false),
  include_line: flag(true),
  include_source: flag(true),
  source_keyword: text(),
})

export type TextSearchArgs = z.infer<typeof TextSearchArgsSchema>

export const SemanticSearchArgsSchema = z.object({
  knowledge_base: text().pipe(z.string().min(1, 'knowledge_base is required')),
  query: text().pipe(z.string().min(1, 'query is required')),
  top_k: optionalIntInRange(1, 500),
  enable_rerank: optionalFlag(),
  rerank_top_k: optionalIntInRange(1, 200),
  max_chars_per_item: intInRange(20, 8000, 220),
  min_relevance: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(0)),
  source_keyword: text(),
  deduplicate: flag(true),
  include_rerank_score: flag(true),
})

export type SemanticSearchArgs = z.infer<typeof SemanticSearchArgsSchema>
