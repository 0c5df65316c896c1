/**
 * Open vector stores, one per knowledge base. A handle whose database file
 * has been deleted from disk is closed and reopened on next use.
 */

import { existsSync } from 'node:fs'
import { Ok } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { KnowledgeError } from '../common/index.js'
import { vectorDbPath } from './layout.js'
import { VectorStore } from './vector-store.js'

export class VectorStoreRegistry {
  private stores = new Map<string, VectorStore>()

  /** Open or reuse the store for `kbDir`, creating `vectors/` when absent. */
  get(kbDir: string): Result<VectorStore, KnowledgeError> {
    const cached = this.stores.get(kbDir)
    if (cached) {
      if (existsSync(vectorDbPath(kbDir))) return Ok(cached)
      cached.close()
      this.stores.delete(kbDir)
    }

    const opened = VectorStore.open(kbDir)
    if (opened.ok) this.stores.set(kbDir, opened.value)
    return opened
  }

  /** The store for `kbDir` if one exists on disk; never creates it. */
  existing(kbDir: string): Result<VectorStore | null, KnowledgeError> {
    if (!existsSync(vectorDbPath(kbDir))) return Ok(null)
    return this.get(kbDir)
  }

  close(kbDir: string): void {
    this.stores.get(kbDir)?.close()
    this.stores.delete(kbDir)
  }

  closeAll(): void {
    for (const store of this.stores.values()) store.close()
    this.stores.clear()
  }
}
