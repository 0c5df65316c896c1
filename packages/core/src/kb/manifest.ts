/**
 * Manifest store: the per-knowledge-base record of which file contents have
 * been indexed. An entry is written only after the file's chunks are in the
 * vector store, so a crash in between costs a redundant re-embed, never a
 * missed update.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage } from '../common/index.js'
import { MANIFEST_FILE, resolveKnowledgeBaseDir } from './layout.js'
import { ManifestSchema } from './schemas.js'
import type { Manifest } from './schemas.js'

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class ManifestStore {
  constructor(private readonly baseDir: string) {}

  private path(kbName: string): Result<string, KnowledgeError> {
    const dir = resolveKnowledgeBaseDir(this.baseDir, kbName)
    return dir.ok ? Ok(join(dir.value, MANIFEST_FILE)) : dir
  }

  /** Current mapping, or `{}` when the knowledge base has never been indexed. */
  async load(kbName: string): Promise<Result<Manifest, KnowledgeError>> {
    const path = this.path(kbName)
    if (!path.ok) return path

    let text: string
    try {
      text = await readFile(path.value, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) return Ok({})
      return Err(KnowledgeError.scanIO(`Failed to read manifest for ${kbName}: ${errorMessage(err)}`, err))
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      return Err(KnowledgeError.scanIO(`Manifest for ${kbName} is not valid JSON: ${errorMessage(err)}`, err))
    }

    const parsed = ManifestSchema.safeParse(raw)
    if (!parsed.success) {
      return Err(KnowledgeError.scanIO(`Manifest for ${kbName} has an unexpected shape`))
    }
    return Ok(parsed.data)
  }

  /** Persist via write-then-rename; keys are written sorted. */
  async save(kbName: string, manifest: Manifest): Promise<Result<void, KnowledgeError>> {
    const path = this.path(kbName)
    if (!path.ok) return path

    const sorted: Manifest = {}
    for (const key of Object.keys(manifest).sort()) {
      sorted[key] = manifest[key]
    }

    const tmpPath = `${path.value}.tmp`
    try {
      await mkdir(join(path.value, '..'), { recursive: true })
      await writeFile(tmpPath, JSON.stringify(sorted, null, 2) + '\n', 'utf-8')
      await rename(tmpPath, path.value)
      return Ok(undefined)
    } catch (err) {
      await rm(tmpPath, { force: true }).catch(() => undefined)
      return Err(KnowledgeError.scanIO(`Failed to write manifest for ${kbName}: ${errorMessage(err)}`, err))
    }
  }
}
