/**
 * Retrieval: keyword search over raw text and two-stage semantic search.
 */

export { KeywordSearchOptionsSchema, RetrievalConfigSchema } from './schemas.js'
export type {
  KeywordSearchOptions,
  KeywordHit,
  RetrievalConfig,
  RetrievalDefaults,
  SemanticHit,
  RerankPlan,
} from './schemas.js'
export { keywordSearch } from './keyword-search.js'
export {
  semanticSearch,
  resolveRerankPlan,
  applyRerankOrder,
  distanceToRelevance,
} from './semantic-search.js'
export type { QueryEmbedder, DocumentReranker, RecallStore, SemanticSearchDeps } from './semantic-search.js'
export { QueryVectorCache } from './query-cache.js'
