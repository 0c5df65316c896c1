/**
 * @textbase/core
 *
 * Local knowledge base engine: incremental indexing of plain-text trees,
 * paced embedding and rerank dispatch, keyword and semantic retrieval.
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './storage/index.js'
export * from './kb/index.js'
export * from './dispatch/index.js'
export * from './retrieval/index.js'
export * from './manager/index.js'
