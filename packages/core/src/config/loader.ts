/**
 * Config parsing with load-time correction of cross-field constraints.
 *
 * Field-level problems (wrong types, negative sizes) are validation errors.
 * Cross-field conflicts are corrected with a warning.
 */

import { readFile } from 'node:fs/promises'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage } from '../common/index.js'
import { KnowledgeConfigSchema } from './schemas.js'
import type { KnowledgeConfig, KnowledgeSettings } from './schemas.js'

function normalizeSettings(settings: KnowledgeSettings, hasReranker: boolean): KnowledgeSettings {
  const next = { ...settings }

  if (next.chunkOverlap >= next.chunkSize) {
    const fallback = next.chunkSize - 1
    console.warn(
      `[config] knowledge.chunkOverlap must be less than knowledge.chunkSize, using ${fallback} (was ${next.chunkOverlap}, chunkSize=${next.chunkSize})`,
    )
    next.chunkOverlap = fallback
  }

  if (next.enableRerank && !hasReranker) {
    console.warn('[config] knowledge.enableRerank is set but no rerank model is configured, rerank disabled')
    next.enableRerank = false
  }

  if (next.rerankTopK >= next.defaultTopK) {
    const fallback = next.defaultTopK - 1
    if (fallback <= 0) {
      if (next.enableRerank) {
        console.warn(
          `[config] knowledge.defaultTopK=${next.defaultTopK} cannot satisfy rerankTopK < defaultTopK, rerank disabled`,
        )
      }
      next.enableRerank = false
    } else {
      console.warn(
        `[config] knowledge.rerankTopK must be less than knowledge.defaultTopK, using ${fallback} (was ${next.rerankTopK}, defaultTopK=${next.defaultTopK})`,
      )
      next.rerankTopK = fallback
    }
  }

  return next
}

export function parseKnowledgeConfig(raw: unknown): Result<KnowledgeConfig, KnowledgeError> {
  const parsed = KnowledgeConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    return Err(KnowledgeError.validation(`Invalid knowledge config: ${detail}`))
  }

  const config = parsed.data
  return Ok({
    ...config,
    knowledge: normalizeSettings(config.knowledge, config.rerank !== undefined),
  })
}

/** Read and parse a JSON config file. */
export async function loadKnowledgeConfig(path: string): Promise<Result<KnowledgeConfig, KnowledgeError>> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    return Err(KnowledgeError.scanIO(`Failed to read config ${path}: ${errorMessage(err)}`, err))
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    return Err(KnowledgeError.validation(`Config ${path} is not valid JSON: ${errorMessage(err)}`))
  }

  return parseKnowledgeConfig(raw)
}
