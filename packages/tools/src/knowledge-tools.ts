/**
 * Knowledge tool definitions and executors for LLM tool-use.
 *
 * 3 read-only tools over the local knowledge bases:
 * - knowledge_list: names and intros of the available knowledge bases
 * - knowledge_text_search: keyword match over raw lines
 * - knowledge_semantic_search: vector recall with optional rerank
 *
 * Every executor returns a JSON string. Failures come back as
 * `{ ok: false, error }` rather than throwing, so the agent loop can hand
 * them straight to the model.
 */

import type { ZodError } from 'zod'
import { errorMessage, trimText } from '@textbase/core'
import type { KnowledgeManager } from '@textbase/core'
import type { ToolDefinition } from './types.js'
import { KnowledgeListArgsSchema, SemanticSearchArgsSchema, TextSearchArgsSchema } from './args.js'

/** The manager surface the tools read from. */
export type KnowledgeToolHost = Pick<KnowledgeManager, 'listKnowledgeBases' | 'keywordSearch' | 'semanticSearch'>

export const KNOWLEDGE_DISABLED_MESSAGE = 'knowledge base feature is disabled'

// ── Tool Definitions ──

export const KNOWLEDGE_TOOLS: ToolDefinition[] = [
  {
    name: 'knowledge_list',
    description:
      'List the local knowledge bases with a short intro for each. Call this first to pick a knowledge_base for the search tools.',
    inputSchema: {
      type: 'object',
      properties: {
        intro_max_chars: { type: 'integer', minimum: 1, maximum: 2000, description: 'Intro length cap. Default 120.' },
        max_items: { type: 'integer', minimum: 1, maximum: 500, description: 'Max knowledge bases returned. Default 50.' },
        only_ready: { type: 'boolean', description: 'Only list knowledge bases that have an intro. Default true.' },
        include_intro: { type: 'boolean', description: 'Include the intro text. Default true.' },
        include_has_intro: { type: 'boolean', description: 'Include a has_intro flag. Default false.' },
        name_keyword: { type: 'string', description: 'Case-insensitive filter on the name.' },
      },
      required: [],
    },
  },
  {
    name: 'knowledge_text_search',
    description:
      'Find lines containing a keyword in one knowledge base. Returns source file, line number and line text. Use for exact names, codes and phrases.',
    inputSchema: {
      type: 'object',
      properties: {
        knowledge_base: { type: 'string', description: 'Knowledge base name from knowledge_list.' },
        keyword: { type: 'string', description: 'Text to look for.' },
        max_lines: { type: 'integer', minimum: 1, maximum: 500, description: 'Max matching lines. Default 20.' },
        max_chars: { type: 'integer', minimum: 100, maximum: 20000, description: 'Stop after this many characters of matches. Default 2000.' },
        max_chars_per_item: { type: 'integer', minimum: 20, maximum: 5000, description: 'Truncate each line to this length. Default 180.' },
        case_sensitive: { type: 'boolean', description: 'Default false.' },
        include_line: { type: 'boolean', description: 'Include line numbers. Default true.' },
        include_source: { type: 'boolean', description: 'Include source paths. Default true.' },
        source_keyword: { type: 'string', description: 'Only search files whose path contains this text.' },
      },
      required: ['knowledge_base', 'keyword'],
    },
  },
  {
    name: 'knowledge_semantic_search',
    description:
      'Search one knowledge base by meaning. Returns the most relevant passages with a relevance score in [0, 1], optionally reranked.',
    inputSchema: {
      type: 'object',
      properties: {
        knowledge_base: { type: 'string', description: 'Knowledge base name from knowledge_list.' },
        query: { type: 'string', description: 'Natural-language question or description.' },
        top_k: { type: 'integer', minimum: 1, maximum: 500, description: 'Passages to recall. Defaults to the configured value.' },
        enable_rerank: { type: 'boolean', description: 'Rerank recalled passages. Defaults to the configured value.' },
        rerank_top_k: { type: 'integer', minimum: 1, maximum: 200, description: 'Passages kept after rerank; must be below top_k.' },
        max_chars_per_item: { type: 'integer', minimum: 20, maximum: 8000, description: 'Truncate each passage to this length. Default 220.' },
        min_relevance: { type: 'number', minimum: 0, maximum: 1, description: 'Drop passages below this relevance. Default 0.' },
        source_keyword: { type: 'string', description: 'Only return passages whose source path contains this text.' },
        deduplicate: { type: 'boolean', description: 'Collapse identical passages from the same source. Default true.' },
        include_rerank_score: { type: 'boolean', description: 'Include rerank_score when reranked. Default true.' },
      },
      required: ['knowledge_base', 'query'],
    },
  },
]

// ── Executor ──

function failure(error: string, code?: string): string {
  return JSON.stringify(code ? { ok: false, error, code } : { ok: false, error })
}

function invalidArgs(err: ZodError): string {
  const issue = err.issues[0]
  const field = issue?.path.join('.') ?? ''
  return failure(`Invalid arguments${field ? ` (${field})` : ''}: ${issue?.message ?? 'unknown'}`, 'VALIDATION_ERROR')
}

async function execList(host: KnowledgeToolHost, input: Record<string, unknown>): Promise<string> {
  const parsed = KnowledgeListArgsSchema.safeParse(input)
  if (!parsed.success) return invalidArgs(parsed.error)
  const args = parsed.data

  const infos = await host.listKnowledgeBases({
    introMaxChars: args.intro_max_chars,
    onlyReady: args.only_ready,
    nameKeyword: args.name_keyword || undefined,
  })

  const truncated = infos.length > args.max_items
  const items = infos.slice(0, args.max_items).map((info) => ({
    name: info.name,
    ...(args.include_intro ? { intro: info.intro } : {}),
    ...(args.include_has_intro ? { has_intro: info.hasIntro } : {}),
  }))

  return JSON.stringify({ ok: true, count: items.length, truncated, items })
}

async function execTextSearch(host: KnowledgeToolHost, input: Record<string, unknown>): Promise<string> {
  const parsed = TextSearchArgsSchema.safeParse(input)
  if (!parsed.success) return invalidArgs(parsed.error)
  const args = parsed.data

  const result = await host.keywordSearch(args.knowledge_base, args.keyword, {
    maxLines: args.max_lines,
    maxChars: args.max_chars,
    caseSensitive: args.case_sensitive,
    sourceKeyword: args.source_keyword || undefined,
  })
  if (!result.ok) return failure(result.error.message, result.error.code)

  const items = result.value.map((hit) => ({
    ...(args.include_source ? { source: hit.source } : {}),
    ...(args.include_line ? { line: hit.line } : {}),
    text: trimText(hit.text, args.max_chars_per_item),
  }))

  return JSON.stringify({
    ok: true,
    knowledge_base: args.knowledge_base,
    keyword: args.keyword,
    count: items.length,
    items,
  })
}

async function execSemanticSearch(host: KnowledgeToolHost, input: Record<string, unknown>): Promise<string> {
  const parsed = SemanticSearchArgsSchema.safeParse(input)
  if (!parsed.success) return invalidArgs(parsed.error)
  const args = parsed.data

  const result = await host.semanticSearch(args.knowledge_base, args.query, {
    topK: args.top_k,
    enableRerank: args.enable_rerank,
    rerankTopK: args.rerank_top_k,
    minRelevance: args.min_relevance,
    sourceKeyword: args.source_keyword || undefined,
    deduplicate: args.deduplicate,
  })
  if (!result.ok) return failure(result.error.message, result.error.code)

  const seen = new Set<string>()
  const items: Array<{ source: string; text: string; relevance: number; rerank_score?: number }> = []
  for (const hit of result.value) {
    const text = trimText(hit.text, args.max_chars_per_item)
    if (args.deduplicate) {
      // passages that only differ past the cut read the same to the model
      const marker = `${hit.source}\u0000${text}`
      if (seen.has(marker)) continue
      seen.add(marker)
    }
    items.push({
      source: hit.source,
      text,
      relevance: hit.relevance,
      ...(args.include_rerank_score && hit.rerankScore !== undefined
        ? { rerank_score: Math.round(hit.rerankScore * 1e6) / 1e6 }
        : {}),
    })
  }

  return JSON.stringify({
    ok: true,
    knowledge_base: args.knowledge_base,
    query: args.query,
    count: items.length,
    items,
  })
}

/**
 * Run a knowledge tool by name. `host` is null when the knowledge feature is
 * switched off in configuration.
 */
export async function executeKnowledgeTool(
  host: KnowledgeToolHost | null,
  toolName: string,
  input: Record<string, unknown>,
): Promise<string> {
  if (!host) return failure(KNOWLEDGE_DISABLED_MESSAGE)
  try {
    switch (toolName) {
      case 'knowledge_list':
        return await execList(host, input)
      case 'knowledge_text_search':
        return await execTextSearch(host, input)
      case 'knowledge_semantic_search':
        return await execSemanticSearch(host, input)
      default:
        return failure(`Unknown tool ${toolName}`)
    }
  } catch (e) {
    console.error(`[knowledge-tools] ${toolName} failed: ${errorMessage(e)}`)
    return failure(errorMessage(e))
  }
}

export function isKnowledgeTool(toolName: string): boolean {
  return KNOWLEDGE_TOOLS.some((tool) => tool.name === toolName)
}
