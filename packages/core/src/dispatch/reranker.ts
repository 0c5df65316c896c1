/**
 * Reranker: one rerank request per call, paced by the rerank dispatch queue.
 */

import type { RerankModelConfig } from '../config/index.js'
import { DispatchQueue } from './queue.js'
import type { RerankRequester, RerankResult } from './requester.js'

export class Reranker {
  private readonly queue: DispatchQueue

  constructor(
    private readonly requester: RerankRequester,
    private readonly config: RerankModelConfig,
    queue?: DispatchQueue,
  ) {
    this.queue = queue ?? new DispatchQueue({ name: 'rerank', intervalSeconds: config.intervalSeconds })
  }

  get modelName(): string {
    return this.config.modelName
  }

  async rerank(query: string, documents: string[], topN?: number): Promise<RerankResult[]> {
    if (documents.length === 0) return []
    const input = this.config.queryInstruction + query
    return this.queue.submit(() => this.requester.rerank(this.config, input, documents, topN))
  }

  async stop(): Promise<void> {
    await this.queue.stop()
  }
}
