/**
 * Zod schemas for engine configuration.
 *
 * The embedding and rerank sections describe an OpenAI-compatible service.
 * `queryInstruction` / `documentInstruction` are the optional prefixes some
 * models are trained with (e.g. `query: ` / `passage: `); both default to empty.
 */

import { z } from 'zod'

export const EmbeddingModelConfigSchema = z.object({
  apiUrl: z.string().url(),
  apiKey: z.string().default(''),
  modelName: z.string().min(1),
  intervalSeconds: z.number().nonnegative().default(1),
  batchSize: z.number().int().positive().default(64),
  timeoutSeconds: z.number().positive().default(30),
  dimensions: z.number().int().positive().optional(),
  queryInstruction: z.string().default(''),
  documentInstruction: z.string().default(''),
})

export type EmbeddingModelConfig = z.infer<typeof EmbeddingModelConfigSchema>

export const RerankModelConfigSchema = z.object({
  apiUrl: z.string().url(),
  apiKey: z.string().default(''),
  modelName: z.string().min(1),
  intervalSeconds: z.number().nonnegative().default(1),
  timeoutSeconds: z.number().positive().default(30),
  queryInstruction: z.string().default(''),
})

export type RerankModelConfig = z.infer<typeof RerankModelConfigSchema>

export const KnowledgeSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  baseDir: z.string().min(1).default('knowledge'),
  autoScan: z.boolean().default(false),
  scanIntervalSeconds: z.number().positive().default(60),
  chunkSize: z.number().int().positive().default(10),
  chunkOverlap: z.number().int().nonnegative().default(2),
  defaultTopK: z.number().int().positive().default(5),
  enableRerank: z.boolean().default(false),
  rerankTopK: z.number().int().positive().default(3),
})

export type KnowledgeSettings = z.infer<typeof KnowledgeSettingsSchema>

export const KnowledgeConfigSchema = z.object({
  knowledge: KnowledgeSettingsSchema.default({}),
  embedding: EmbeddingModelConfigSchema,
  rerank: RerankModelConfigSchema.optional(),
})

export type KnowledgeConfig = z.infer<typeof KnowledgeConfigSchema>
