/**
 * Dispatch: paced, serialized access to the embedding and rerank services.
 */

export { DispatchQueue, abortableSleep } from './queue.js'
export type { DispatchQueueOptions, Sleep } from './queue.js'
export { ModelRequester } from './requester.js'
export type {
  FetchLike,
  RerankResult,
  EmbeddingRequester,
  RerankRequester,
  ModelRequesterOptions,
} from './requester.js'
export { Embedder } from './embedder.js'
export { Reranker } from './reranker.js'
export { UsageLedger, estimateTokens } from './usage.js'
export type { CallType, UsageRecord, UsageSummary } from './usage.js'
