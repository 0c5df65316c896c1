/**
 * HTTP requester for OpenAI-compatible embedding and rerank endpoints.
 *
 * Embeddings go through the SDK's typed `embeddings.create`; rerank has no
 * typed resource, so it is sent with the client's generic `post` and the
 * response is validated here. SDK retries are off: the dispatch queue owns
 * pacing, and a failed call surfaces to the caller as a KnowledgeError.
 */

import OpenAI from 'openai'
import { z } from 'zod'
import { KnowledgeError, errorMessage } from '../common/index.js'
import type { EmbeddingModelConfig, RerankModelConfig } from '../config/index.js'
import { UsageLedger, estimateTokens } from './usage.js'
import type { CallType } from './usage.js'

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

export interface RerankResult {
  /** Position of the document in the request's `documents`. */
  index: number
  relevanceScore: number
}

/** The embedding half of the requester, as the embedder sees it. */
export interface EmbeddingRequester {
  embed(config: EmbeddingModelConfig, texts: string[]): Promise<number[][]>
}

export interface RerankRequester {
  rerank(config: RerankModelConfig, query: string, documents: string[], topN?: number): Promise<RerankResult[]>
}

const UsageSchema = z
  .object({
    prompt_tokens: z.number(),
    input_tokens: z.number(),
    completion_tokens: z.number(),
    output_tokens: z.number(),
    total_tokens: z.number(),
  })
  .partial()

const RerankItemSchema = z.object({
  index: z.number().int(),
  relevance_score: z.number().optional(),
  score: z.number().optional(),
  similarity: z.number().optional(),
})

const RerankResponseSchema = z.union([
  z.array(RerankItemSchema),
  z.object({ results: z.array(RerankItemSchema), usage: UsageSchema.optional() }),
  z.object({ data: z.array(RerankItemSchema), usage: UsageSchema.optional() }),
])

type ReportedUsage = z.infer<typeof UsageSchema>

interface TokenCounts {
  promptTokens: number
  completionTokens: number
  totalTokens: number
  estimated: boolean
}

function resolveUsage(reported: ReportedUsage | undefined, requestText: string, responseText: string): TokenCounts {
  const promptTokens = reported?.prompt_tokens ?? reported?.input_tokens ?? 0
  const completionTokens = reported?.completion_tokens ?? reported?.output_tokens ?? 0
  const totalTokens = reported?.total_tokens ?? promptTokens + completionTokens
  if (totalTokens > 0) {
    return { promptTokens, completionTokens, totalTokens, estimated: false }
  }

  const estimatedPrompt = estimateTokens(requestText)
  const estimatedCompletion = responseText ? estimateTokens(responseText) : 0
  return {
    promptTokens: estimatedPrompt,
    completionTokens: estimatedCompletion,
    totalTokens: estimatedPrompt + estimatedCompletion,
    estimated: true,
  }
}

export interface ModelRequesterOptions {
  /** Replaces the global fetch for every SDK client this requester creates. */
  fetch?: FetchLike
  ledger?: UsageLedger
}

export class ModelRequester implements EmbeddingRequester, RerankRequester {
  readonly ledger: UsageLedger
  private readonly fetchImpl?: FetchLike
  private clients = new Map<string, OpenAI>()

  constructor(options?: ModelRequesterOptions) {
    this.ledger = options?.ledger ?? new UsageLedger()
    this.fetchImpl = options?.fetch
  }

  private client(apiUrl: string, apiKey: string): OpenAI {
    const key = `${apiUrl}\n${apiKey}`
    let client = this.clients.get(key)
    if (!client) {
      client = new OpenAI({
        apiKey: apiKey || 'not-needed',
        baseURL: apiUrl.replace(/\/+$/, ''),
        maxRetries: 0,
        ...(this.fetchImpl ? { fetch: this.fetchImpl } : {}),
      })
      this.clients.set(key, client)
    }
    return client
  }

  private track(callType: CallType, modelName: string, startedAt: number, counts: TokenCounts): void {
    this.ledger.record({
      timestamp: new Date().toISOString(),
      callType,
      modelName,
      durationMs: Date.now() - startedAt,
      ...counts,
    })
  }

  async embed(config: EmbeddingModelConfig, texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return []

    const startedAt = Date.now()
    let response: OpenAI.CreateEmbeddingResponse
    try {
      response = await this.client(config.apiUrl, config.apiKey).embeddings.create(
        {
          model: config.modelName,
          input: texts,
          encoding_format: 'float',
          ...(config.dimensions !== undefined ? { dimensions: config.dimensions } : {}),
        },
        { timeout: config.timeoutSeconds * 1000 },
      )
    } catch (err) {
      throw KnowledgeError.embedding(`Embedding request to ${config.modelName} failed: ${errorMessage(err)}`, err)
    }

    const data = Array.isArray(response.data) ? [...response.data] : []
    if (data.length !== texts.length) {
      throw KnowledgeError.embedding(
        `Embedding response from ${config.modelName} has ${data.length} vectors for ${texts.length} inputs`,
      )
    }
    data.sort((a, b) => a.index - b.index)

    const usage = UsageSchema.safeParse(response.usage ?? {})
    this.track('embedding', config.modelName, startedAt, resolveUsage(usage.success ? usage.data : undefined, texts.join(''), ''))

    return data.map((item) => item.embedding)
  }

  async rerank(config: RerankModelConfig, query: string, documents: string[], topN?: number): Promise<RerankResult[]> {
    if (documents.length === 0) return []

    const startedAt = Date.now()
    let raw: unknown
    try {
      raw = await this.client(config.apiUrl, config.apiKey).post('/rerank', {
        body: {
          model: config.modelName,
          query,
          documents,
          ...(topN !== undefined ? { top_n: topN } : {}),
        },
        timeout: config.timeoutSeconds * 1000,
      })
    } catch (err) {
      throw KnowledgeError.rerank(`Rerank request to ${config.modelName} failed: ${errorMessage(err)}`, err)
    }

    const parsed = RerankResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw KnowledgeError.rerank(`Rerank response from ${config.modelName} has an unexpected shape`)
    }

    const payload = parsed.data
    const items = Array.isArray(payload) ? payload : 'results' in payload ? payload.results : payload.data
    const reported = Array.isArray(payload) ? undefined : payload.usage

    const results: RerankResult[] = items.map((item) => ({
      index: item.index,
      relevanceScore: item.relevance_score ?? item.score ?? item.similarity ?? 0,
    }))

    const requestText = query + documents.join('')
    this.track('rerank', config.modelName, startedAt, resolveUsage(reported, requestText, JSON.stringify(results)))

    return results
  }
}
