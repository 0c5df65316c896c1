/** LRU cache of query vectors keyed by model and query text. */

const DEFAULT_CAPACITY = 128

export class QueryVectorCache {
  private entries = new Map<string, number[]>()
  private readonly capacity: number

  constructor(capacity = DEFAULT_CAPACITY) {
    this.capacity = Math.max(1, capacity)
  }

  private key(modelName: string, query: string): string {
    return `${modelName}\n${query}`
  }

  get(modelName: string, query: string): number[] | undefined {
    const key = this.key(modelName, query)
    const vector = this.entries.get(key)
    if (vector === undefined) return undefined
    // refresh recency
    this.entries.delete(key)
    this.entries.set(key, vector)
    return vector
  }

  set(modelName: string, query: string, vector: number[]): void {
    const key = this.key(modelName, query)
    this.entries.delete(key)
    this.entries.set(key, vector)
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
  }
}
