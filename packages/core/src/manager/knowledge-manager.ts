/**
 * Knowledge manager: ties the on-disk layout, the indexer, retrieval and the
 * dispatch queues together behind one object per process.
 *
 * Scans of one knowledge base are coalesced: asking for a scan while one is
 * running returns the running scan. Different knowledge bases scan in
 * parallel; their embedding requests still share one paced queue.
 */

import { resolve } from 'node:path'
import { Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage } from '../common/index.js'
import type { KnowledgeConfig, KnowledgeSettings } from '../config/index.js'
import { Embedder, ModelRequester, Reranker, abortableSleep } from '../dispatch/index.js'
import type { FetchLike, UsageLedger } from '../dispatch/index.js'
import {
  ManifestStore,
  VectorStoreRegistry,
  indexKnowledgeBase,
  knowledgeBaseExists,
  listKnowledgeBaseNames,
  readIntro,
  resolveKnowledgeBaseDir,
} from '../kb/index.js'
import type { DocumentEmbedder, FileReader, IndexReport, KnowledgeBaseInfo } from '../kb/index.js'
import { QueryVectorCache, keywordSearch, semanticSearch } from '../retrieval/index.js'
import type {
  DocumentReranker,
  KeywordHit,
  KeywordSearchOptions,
  QueryEmbedder,
  RetrievalConfig,
  SemanticHit,
} from '../retrieval/index.js'

/** An embedder usable for both indexing and queries. */
export type KnowledgeEmbedder = DocumentEmbedder & QueryEmbedder & { stop?(): Promise<void> }

export type KnowledgeReranker = DocumentReranker & { stop?(): Promise<void> }

export interface KnowledgeManagerOptions {
  settings: KnowledgeSettings
  embedder: KnowledgeEmbedder
  reranker?: KnowledgeReranker | null
  readFile?: FileReader
}

export interface ListKnowledgeBasesOptions {
  introMaxChars?: number
  /** Only knowledge bases that have a non-empty intro. */
  onlyReady?: boolean
  /** Case-insensitive substring of the name. */
  nameKeyword?: string
}

export class KnowledgeManager {
  readonly settings: KnowledgeSettings
  readonly baseDir: string
  private readonly manifests: ManifestStore
  private readonly stores = new VectorStoreRegistry()
  private readonly queryCache = new QueryVectorCache()
  private readonly embedder: KnowledgeEmbedder
  private readonly reranker: KnowledgeReranker | null
  private readonly readFile?: FileReader
  private readonly running = new Map<string, Promise<Result<IndexReport, KnowledgeError>>>()
  private readonly controller = new AbortController()
  private autoScanLoop: Promise<void> | null = null
  private initialScan: Promise<void> | null = null

  constructor(options: KnowledgeManagerOptions) {
    this.settings = options.settings
    this.baseDir = resolve(options.settings.baseDir)
    this.manifests = new ManifestStore(this.baseDir)
    this.embedder = options.embedder
    this.reranker = options.reranker ?? null
    this.readFile = options.readFile
  }

  /**
   * Build a manager with HTTP-backed embedder and reranker from parsed config.
   * Returns null when `knowledge.enabled` is off; the tool layer reports that
   * as the feature being disabled.
   */
  static fromConfig(
    config: KnowledgeConfig,
    options?: { fetch?: FetchLike; ledger?: UsageLedger },
  ): KnowledgeManager | null {
    if (!config.knowledge.enabled) return null
    const requester = new ModelRequester({ fetch: options?.fetch, ledger: options?.ledger })
    return new KnowledgeManager({
      settings: config.knowledge,
      embedder: new Embedder(requester, config.embedding),
      reranker: config.rerank ? new Reranker(requester, config.rerank) : null,
    })
  }

  async listKnowledgeBases(options?: ListKnowledgeBasesOptions): Promise<KnowledgeBaseInfo[]> {
    const introMaxChars = options?.introMaxChars ?? 300
    const keyword = options?.nameKeyword?.trim().toLowerCase() ?? ''
    const infos: KnowledgeBaseInfo[] = []

    for (const name of await listKnowledgeBaseNames(this.baseDir)) {
      if (keyword && !name.toLowerCase().includes(keyword)) continue
      const intro = await readIntro(resolve(this.baseDir, name), introMaxChars)
      const hasIntro = intro.length > 0
      if (options?.onlyReady && !hasIntro) continue
      infos.push({ name, intro, hasIntro })
    }
    return infos
  }

  isIndexing(kbName: string): boolean {
    return this.running.has(kbName)
  }

  /** Run (or join) the scan cycle of one knowledge base. */
  index(kbName: string): Promise<Result<IndexReport, KnowledgeError>> {
    const existing = this.running.get(kbName)
    if (existing) return existing

    const run = indexKnowledgeBase(
      {
        baseDir: this.baseDir,
        manifests: this.manifests,
        stores: this.stores,
        embedder: this.embedder,
        chunking: { chunkSize: this.settings.chunkSize, chunkOverlap: this.settings.chunkOverlap },
        readFile: this.readFile,
      },
      kbName,
      this.controller.signal,
    ).finally(() => {
      this.running.delete(kbName)
    })
    this.running.set(kbName, run)
    return run
  }

  /** Scan every knowledge base in parallel. Failures are logged and left out of the result. */
  async indexAll(): Promise<IndexReport[]> {
    const names = await listKnowledgeBaseNames(this.baseDir)
    const settled = await Promise.allSettled(names.map((name) => this.index(name)))

    const reports: IndexReport[] = []
    settled.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        console.error(`[knowledge] scan of ${names[i]} crashed: ${errorMessage(outcome.reason)}`)
      } else if (!outcome.value.ok) {
        console.error(`[knowledge] scan of ${names[i]} failed: ${outcome.value.error.message}`)
      } else {
        reports.push(outcome.value.value)
      }
    })
    return reports
  }

  private async resolveExisting(kbName: string): Promise<Result<string, KnowledgeError>> {
    const kbDir = resolveKnowledgeBaseDir(this.baseDir, kbName)
    if (!kbDir.ok) return kbDir
    if (!(await knowledgeBaseExists(kbDir.value))) {
      return Err(KnowledgeError.notFound('Knowledge base', kbName))
    }
    return kbDir
  }

  async keywordSearch(
    kbName: string,
    keyword: string,
    options?: KeywordSearchOptions,
  ): Promise<Result<KeywordHit[], KnowledgeError>> {
    const kbDir = await this.resolveExisting(kbName)
    if (!kbDir.ok) return kbDir
    return keywordSearch(kbDir.value, keyword, options)
  }

  async semanticSearch(
    kbName: string,
    query: string,
    config: RetrievalConfig = {},
  ): Promise<Result<SemanticHit[], KnowledgeError>> {
    const kbDir = await this.resolveExisting(kbName)
    if (!kbDir.ok) return kbDir

    const store = this.stores.existing(kbDir.value)
    if (!store.ok) return store
    if (!store.value) return Err(KnowledgeError.notIndexed(kbName))

    const models = store.value.modelNames()
    if (!models.ok) return models
    if (models.value.length > 0 && !models.value.includes(this.embedder.modelName)) {
      return Err(
        KnowledgeError.notIndexed(kbName, `vectors were built with ${models.value.join(', ')}, not ${this.embedder.modelName}`),
      )
    }

    return semanticSearch(store.value, query, config, {
      embedder: this.embedder,
      reranker: this.reranker,
      cache: this.queryCache,
      defaults: {
        topK: this.settings.defaultTopK,
        enableRerank: this.settings.enableRerank,
        rerankTopK: this.settings.rerankTopK,
      },
    })
  }

  /** Begin background scanning as configured: a recurring scan with `autoScan`, one initial pass without. */
  start(): void {
    if (this.settings.autoScan) {
      this.startAutoScan()
    } else {
      this.startInitialScan()
    }
  }

  /** One scan of every knowledge base, in the background. */
  startInitialScan(): void {
    if (this.initialScan || this.controller.signal.aborted) return
    this.initialScan = this.indexAll()
      .then((reports) => {
        const embedded = reports.reduce((sum, r) => sum + r.embeddedTexts, 0)
        if (embedded > 0) console.log(`[knowledge] initial scan embedded ${embedded} chunk(s)`)
      })
      .catch((err: unknown) => {
        console.error(`[knowledge] initial scan failed: ${errorMessage(err)}`)
      })
      .finally(() => {
        this.initialScan = null
      })
  }

  /** Rescan every knowledge base every `intervalSeconds`, measured from the end of the previous cycle. */
  startAutoScan(intervalSeconds = this.settings.scanIntervalSeconds): void {
    if (this.autoScanLoop || this.controller.signal.aborted) return
    const intervalMs = Math.max(1, intervalSeconds) * 1000
    const signal = this.controller.signal

    const loop = async (): Promise<void> => {
      while (!signal.aborted) {
        try {
          const reports = await this.indexAll()
          const embedded = reports.reduce((sum, r) => sum + r.embeddedTexts, 0)
          if (embedded > 0) console.log(`[knowledge] auto scan embedded ${embedded} chunk(s)`)
        } catch (err) {
          console.error(`[knowledge] auto scan failed: ${errorMessage(err)}`)
        }
        await abortableSleep(intervalMs, signal)
      }
    }
    this.autoScanLoop = loop()
  }

  /** Cancel scheduled and running scans, drain the dispatch queues, and close stores. */
  async stop(): Promise<void> {
    this.controller.abort()
    await Promise.allSettled([
      ...(this.autoScanLoop ? [this.autoScanLoop] : []),
      ...(this.initialScan ? [this.initialScan] : []),
      ...this.running.values(),
    ])
    this.autoScanLoop = null
    await this.embedder.stop?.()
    await this.reranker?.stop?.()
    this.stores.closeAll()
  }
}
