/**
 * @textbase/tools: agent-facing tool surface over @textbase/core.
 */

export {
  KNOWLEDGE_TOOLS,
  KNOWLEDGE_DISABLED_MESSAGE,
  executeKnowledgeTool,
  isKnowledgeTool,
} from './knowledge-tools.js'
export type { KnowledgeToolHost } from './knowledge-tools.js'
export type { ToolDefinition } from './types.js'
export {
  KnowledgeListArgsSchema,
  TextSearchArgsSchema,
  SemanticSearchArgsSchema,
} from './args.js'
export type { KnowledgeListArgs, TextSearchArgs, SemanticSearchArgs } from './args.js'
