/**
 * Knowledge base: on-disk layout, manifest, scanning, chunking, vector
 * storage and the incremental indexing cycle.
 */

export {
  ManifestSchema,
  ScannedFileSchema,
  TextChunkSchema,
  KnowledgeBaseInfoSchema,
} from './schemas.js'
export type {
  Manifest,
  ScannedFile,
  ScanFailure,
  ScanDiff,
  TextChunk,
  FileIndexFailure,
  IndexReport,
  KnowledgeBaseInfo,
} from './schemas.js'

export {
  TEXTS_DIR,
  VECTORS_DIR,
  VECTOR_DB_FILE,
  MANIFEST_FILE,
  INTRO_FILE,
  resolveKnowledgeBaseDir,
  vectorDir,
  vectorDbPath,
  listKnowledgeBaseNames,
  knowledgeBaseExists,
  vectorStoreExists,
  readIntro,
} from './layout.js'

export { ManifestStore } from './manifest.js'
export {
  SUPPORTED_TEXT_EXTENSIONS,
  isSupportedTextFile,
  listTextFiles,
  hashContent,
  scanKnowledgeBase,
} from './scanner.js'
export type { TextFileRef, FileReader, ScanOptions } from './scanner.js'

export { chunkLines, splitNonEmptyLines, computeChunkId, resolveWindow } from './chunker.js'
export type { ChunkerOptions, NumberedLine } from './chunker.js'

export { packFloat32, unpackFloat32, l2Normalize, cosineSimilarity, cosineDistance } from './vector-search.js'
export { VectorStore } from './vector-store.js'
export type { ChunkVector, VectorEntry, VectorQueryOptions, VectorMatch, ReplaceSourceResult } from './vector-store.js'
export { VectorStoreRegistry } from './store-registry.js'

export { indexKnowledgeBase } from './indexer.js'
export type { DocumentEmbedder, IndexerContext } from './indexer.js'
