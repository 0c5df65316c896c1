/**
 * Two-stage semantic search: vector recall, then an optional rerank pass.
 *
 * Cross-parameter constraints are checked before the rerank call. A request
 * that cannot be reranked as asked is corrected or falls back to stage-1
 * results, always with a warning; it never fails. Recall failures do fail.
 */

import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage } from '../common/index.js'
import type { RerankResult } from '../dispatch/index.js'
import type { VectorMatch, VectorStore } from '../kb/index.js'
import type { QueryVectorCache } from './query-cache.js'
import { RetrievalConfigSchema } from './schemas.js'
import type { RerankPlan, RetrievalConfig, RetrievalDefaults, SemanticHit } from './schemas.js'

export interface QueryEmbedder {
  readonly modelName: string
  embedQuery(text: string): Promise<number[]>
}

export interface DocumentReranker {
  rerank(query: string, documents: string[], topN?: number): Promise<RerankResult[]>
}

/** The recall half of the vector store. */
export type RecallStore = Pick<VectorStore, 'query'>

export interface SemanticSearchDeps {
  embedder: QueryEmbedder
  reranker?: DocumentReranker | null
  cache?: QueryVectorCache
  defaults: RetrievalDefaults
}

interface Candidate {
  match: VectorMatch
  rerankScore?: number
}

/** Round a fractional size down, with a warning. */
function wholeSize(name: string, value: number): number {
  if (Number.isInteger(value)) return value
  const floored = Math.floor(value)
  console.warn(`[retrieval] ${name} must be an integer (got ${value}), using ${floored}`)
  return floored
}

/**
 * Decide whether, and how deep, to rerank `topK` recalled results.
 * Every downgrade of an explicit or configured request is logged.
 */
export function resolveRerankPlan(
  topK: number,
  config: Pick<RetrievalConfig, 'enableRerank' | 'rerankTopK'>,
  deps: Pick<SemanticSearchDeps, 'reranker' | 'defaults'>,
): RerankPlan {
  const enabled = config.enableRerank ?? deps.defaults.enableRerank
  if (!enabled) return { rerank: false }

  if (!deps.reranker) {
    console.warn('[retrieval] rerank requested but no rerank model is configured, using recall results')
    return { rerank: false }
  }
  if (topK <= 1) {
    console.warn(`[retrieval] rerank needs topK > 1 (got ${topK}), using recall results`)
    return { rerank: false }
  }

  let rerankTopK = wholeSize('rerankTopK', config.rerankTopK ?? deps.defaults.rerankTopK)
  if (rerankTopK <= 0) {
    console.warn(`[retrieval] rerankTopK must be positive (got ${rerankTopK}), using recall results`)
    return { rerank: false }
  }
  if (rerankTopK >= topK) {
    console.warn(`[retrieval] rerankTopK=${rerankTopK} must be less than topK=${topK}, using ${topK - 1}`)
    rerankTopK = topK - 1
  }
  return { rerank: true, rerankTopK }
}

/**
 * Reorder by rerank score, best first. Indices outside the recall list or
 * already used are dropped. When nothing usable comes back, the first
 * `rerankTopK` recall results stand in.
 */
export function applyRerankOrder(matches: VectorMatch[], reranked: RerankResult[], rerankTopK: number): Candidate[] {
  const ordered = [...reranked].sort((a, b) => b.relevanceScore - a.relevanceScore)
  const used = new Set<number>()
  const out: Candidate[] = []

  for (const item of ordered) {
    if (!Number.isInteger(item.index) || item.index < 0 || item.index >= matches.length) continue
    if (used.has(item.index)) continue
    used.add(item.index)
    out.push({ match: matches[item.index], rerankScore: item.relevanceScore })
    if (out.length >= rerankTopK) break
  }

  if (out.length === 0) {
    return matches.slice(0, rerankTopK).map((match) => ({ match }))
  }
  return out
}

export function distanceToRelevance(distance: number): number {
  const value = Number.isFinite(distance) ? 1 - distance : 0
  const clamped = Math.min(1, Math.max(0, value))
  return Math.round(clamped * 10000) / 10000
}

async function embedQuery(query: string, deps: SemanticSearchDeps): Promise<Result<number[], KnowledgeError>> {
  const cached = deps.cache?.get(deps.embedder.modelName, query)
  if (cached) return Ok(cached)

  try {
    const vector = await deps.embedder.embedQuery(query)
    deps.cache?.set(deps.embedder.modelName, query, vector)
    return Ok(vector)
  } catch (err) {
    if (err instanceof KnowledgeError && err.code === 'EMBEDDING_ERROR') return Err(err)
    return Err(KnowledgeError.embedding(`Query embedding failed: ${errorMessage(err)}`, err))
  }
}

export async function semanticSearch(
  store: RecallStore,
  query: string,
  config: RetrievalConfig,
  deps: SemanticSearchDeps,
): Promise<Result<SemanticHit[], KnowledgeError>> {
  if (query.trim().length === 0) {
    return Err(KnowledgeError.validation('Query cannot be empty'))
  }
  const parsed = RetrievalConfigSchema.safeParse(config)
  if (!parsed.success) {
    return Err(KnowledgeError.validation(`Invalid retrieval options: ${parsed.error.issues[0]?.message ?? 'unknown'}`))
  }
  const options = parsed.data

  const requestedTopK = options.topK !== undefined ? wholeSize('topK', options.topK) : 0
  const topK = requestedTopK > 0 ? requestedTopK : deps.defaults.topK

  const vector = await embedQuery(query, deps)
  if (!vector.ok) return vector

  const recalled = store.query(vector.value, topK, {
    sourceKeyword: options.sourceKeyword,
    modelName: deps.embedder.modelName,
  })
  if (!recalled.ok) return recalled
  if (recalled.value.length === 0) return Ok([])

  let candidates: Candidate[] = recalled.value.map((match) => ({ match }))

  const plan = resolveRerankPlan(topK, options, deps)
  if (plan.rerank && deps.reranker) {
    const documents = recalled.value.map((match) => match.content)
    try {
      const reranked = await deps.reranker.rerank(query, documents, Math.min(plan.rerankTopK, documents.length))
      candidates = applyRerankOrder(recalled.value, reranked, plan.rerankTopK)
    } catch (err) {
      console.warn(`[retrieval] rerank failed, using recall results: ${errorMessage(err)}`)
    }
  }

  const hits: SemanticHit[] = []
  const seen = new Set<string>()
  for (const { match, rerankScore } of candidates) {
    const relevance = distanceToRelevance(match.distance)
    if (relevance < options.minRelevance) continue
    if (options.deduplicate) {
      const marker = `${match.source}\u0000${match.content}`
      if (seen.has(marker)) continue
      seen.add(marker)
    }
    hits.push({
      source: match.source,
      startLine: match.startLine,
      text: match.content,
      relevance,
      ...(rerankScore !== undefined ? { rerankScore } : {}),
    })
  }

  return Ok(hits)
}
