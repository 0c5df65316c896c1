/**
 * Embedder: batches texts, applies instruction prefixes, and submits each
 * batch to the embedding dispatch queue in order.
 */

import type { EmbeddingModelConfig } from '../config/index.js'
import { DispatchQueue } from './queue.js'
import type { EmbeddingRequester } from './requester.js'

export class Embedder {
  private readonly queue: DispatchQueue

  constructor(
    private readonly requester: EmbeddingRequester,
    private readonly config: EmbeddingModelConfig,
    queue?: DispatchQueue,
  ) {
    this.queue = queue ?? new DispatchQueue({ name: 'embedding', intervalSeconds: config.intervalSeconds })
  }

  get modelName(): string {
    return this.config.modelName
  }

  /** Vectors for corpus texts, prefixed with `documentInstruction`. */
  async embedDocuments(texts: string[]): Promise<number[][]> {
    return this.embedBatches(texts.map((text) => this.config.documentInstruction + text))
  }

  /** Vector for a search query, prefixed with `queryInstruction`. */
  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedBatches([this.config.queryInstruction + text])
    return vector
  }

  async stop(): Promise<void> {
    await this.queue.stop()
  }

  private async embedBatches(inputs: string[]): Promise<number[][]> {
    if (inputs.length === 0) return []
    const batchSize = Math.max(1, this.config.batchSize)
    const vectors: number[][] = []
    for (let i = 0; i < inputs.length; i += batchSize) {
      const batch = inputs.slice(i, i + batchSize)
      const result = await this.queue.submit(() => this.requester.embed(this.config, batch))
      vectors.push(...result)
    }
    return vectors
  }
}
