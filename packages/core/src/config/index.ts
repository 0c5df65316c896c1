export {
  KnowledgeConfigSchema,
  KnowledgeSettingsSchema,
  EmbeddingModelConfigSchema,
  RerankModelConfigSchema,
} from './schemas.js'
export type {
  KnowledgeConfig,
  KnowledgeSettings,
  EmbeddingModelConfig,
  RerankModelConfig,
} from './schemas.js'
export { parseKnowledgeConfig, loadKnowledgeConfig } from './loader.js'
