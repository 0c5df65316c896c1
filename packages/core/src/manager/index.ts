export { KnowledgeManager } from './knowledge-manager.js'
export type {
  KnowledgeEmbedder,
  KnowledgeReranker,
  KnowledgeManagerOptions,
  ListKnowledgeBasesOptions,
} from './knowledge-manager.js'
