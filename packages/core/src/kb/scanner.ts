/**
 * Text tree scanner: recursively finds plain-text files under `texts/`,
 * hashes them and diffs the result against the manifest.
 */

import { readdir, readFile, stat } from 'node:fs/promises'
import { createHash } from 'node:crypto'
import { extname, join, relative } from 'node:path'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage, toPosixPath } from '../common/index.js'
import { INTRO_FILE, MANIFEST_FILE, TEXTS_DIR, VECTORS_DIR } from './layout.js'
import type { Manifest, ScanDiff, ScanFailure, ScannedFile } from './schemas.js'

export const SUPPORTED_TEXT_EXTENSIONS = new Set([
  '.txt',
  '.md',
  '.markdown',
  '.html',
  '.htm',
  '.rst',
  '.csv',
  '.tsv',
  '.json',
  '.yaml',
  '.yml',
  '.xml',
  '.log',
  '.ini',
  '.cfg',
  '.conf',
])

const IGNORED_DIRS = new Set([VECTORS_DIR, '.git', '__pycache__', 'node_modules'])

const EXCLUDED_FILES = new Set([MANIFEST_FILE, INTRO_FILE])

export function isSupportedTextFile(fileName: string): boolean {
  if (EXCLUDED_FILES.has(fileName)) return false
  return SUPPORTED_TEXT_EXTENSIONS.has(extname(fileName).toLowerCase())
}

async function walkTextFiles(dirPath: string): Promise<string[]> {
  const results: string[] = []
  const entries = await readdir(dirPath, { withFileTypes: true })

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name)
    if (entry.isDirectory()) {
      if (entry.name.startsWith('.') || IGNORED_DIRS.has(entry.name.toLowerCase())) continue
      const nested = await walkTextFiles(fullPath)
      results.push(...nested)
    } else if (entry.isFile() && isSupportedTextFile(entry.name)) {
      results.push(fullPath)
    }
  }

  return results
}

export interface TextFileRef {
  /** POSIX path relative to the knowledge base directory, e.g. `texts/a.md`. */
  relativePath: string
  absolutePath: string
}

/** Every indexable file of a knowledge base, sorted by relative path. */
export async function listTextFiles(kbDir: string): Promise<Result<TextFileRef[], KnowledgeError>> {
  const textsDir = join(kbDir, TEXTS_DIR)
  try {
    const dirStat = await stat(textsDir)
    if (!dirStat.isDirectory()) {
      return Err(KnowledgeError.scanIO(`Not a directory: ${textsDir}`))
    }
  } catch {
    return Err(KnowledgeError.scanIO(`Directory not found: ${textsDir}`))
  }

  try {
    const absolutePaths = await walkTextFiles(textsDir)
    const refs = absolutePaths.map((absolutePath) => ({
      relativePath: toPosixPath(relative(kbDir, absolutePath)),
      absolutePath,
    }))
    refs.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0))
    return Ok(refs)
  } catch (err) {
    return Err(KnowledgeError.scanIO(`Failed to scan directory: ${errorMessage(err)}`, err))
  }
}

export function hashContent(content: Buffer | string): string {
  return createHash('sha256').update(content).digest('hex')
}

export type FileReader = (absolutePath: string) => Promise<Buffer>

export interface ScanOptions {
  readFile?: FileReader
}

/**
 * Hash every text file and classify it against the manifest.
 * Unreadable files are reported in `failed` and never counted as removed.
 */
export async function scanKnowledgeBase(
  kbDir: string,
  manifest: Manifest,
  options?: ScanOptions,
): Promise<Result<ScanDiff, KnowledgeError>> {
  const read = options?.readFile ?? ((path: string) => readFile(path))
  const listed = await listTextFiles(kbDir)
  if (!listed.ok) return listed

  const diff: ScanDiff = { added: [], changed: [], unchanged: [], removed: [], failed: [] }
  const seen = new Set<string>()

  for (const ref of listed.value) {
    seen.add(ref.relativePath)

    let content: Buffer
    try {
      content = await read(ref.absolutePath)
    } catch (err) {
      const failure: ScanFailure = {
        relativePath: ref.relativePath,
        error: KnowledgeError.scanIO(`Failed to read ${ref.relativePath}: ${errorMessage(err)}`, err),
      }
      console.warn(`[scanner] ${failure.error.message}`)
      diff.failed.push(failure)
      continue
    }

    const file: ScannedFile = {
      relativePath: ref.relativePath,
      absolutePath: ref.absolutePath,
      hash: hashContent(content),
      sizeBytes: content.byteLength,
    }

    const previous = manifest[ref.relativePath]
    if (previous === undefined) {
      diff.added.push(file)
    } else if (previous !== file.hash) {
      diff.changed.push(file)
    } else {
      diff.unchanged.push(file)
    }
  }

  for (const path of Object.keys(manifest).sort()) {
    if (!seen.has(path)) diff.removed.push(path)
  }

  return Ok(diff)
}
