/**
 * On-disk layout of a knowledge base directory.
 *
 *   <baseDir>/<name>/
 *     intro.md          description shown to callers before they search
 *     texts/...         corpus, scanned recursively
 *     vectors/index.db  generated vector store
 *     .manifest.json    generated path → hash manifest
 */

import { readdir, readFile, stat } from 'node:fs/promises'
import type { Dirent } from 'node:fs'
import { join, resolve, sep } from 'node:path'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, KnowledgeBaseNameSchema, trimText } from '../common/index.js'

export const TEXTS_DIR = 'texts'
export const VECTORS_DIR = 'vectors'
export const VECTOR_DB_FILE = 'index.db'
export const MANIFEST_FILE = '.manifest.json'
export const INTRO_FILE = 'intro.md'

/** Resolve a knowledge base name to its directory, refusing names that escape `baseDir`. */
export function resolveKnowledgeBaseDir(baseDir: string, name: string): Result<string, KnowledgeError> {
  const parsed = KnowledgeBaseNameSchema.safeParse(name)
  if (!parsed.success) {
    return Err(KnowledgeError.validation(`Invalid knowledge base name: ${JSON.stringify(name)}`))
  }

  const base = resolve(baseDir)
  const candidate = resolve(base, parsed.data)
  if (candidate === base || !candidate.startsWith(base + sep)) {
    return Err(KnowledgeError.validation(`Invalid knowledge base name: ${JSON.stringify(name)}`))
  }
  return Ok(candidate)
}

export function vectorDir(kbDir: string): string {
  return join(kbDir, VECTORS_DIR)
}

export function vectorDbPath(kbDir: string): string {
  return join(kbDir, VECTORS_DIR, VECTOR_DB_FILE)
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

/** Names of every directory under `baseDir` that has a `texts/` subdirectory, sorted. */
export async function listKnowledgeBaseNames(baseDir: string): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await readdir(baseDir, { withFileTypes: true })
  } catch {
    return []
  }

  const names: string[] = []
  for (const entry of entries) {
    if (!entry.isDirectory()) continue
    if (await isDirectory(join(baseDir, entry.name, TEXTS_DIR))) {
      names.push(entry.name)
    }
  }
  return names.sort()
}

export async function knowledgeBaseExists(kbDir: string): Promise<boolean> {
  return isDirectory(join(kbDir, TEXTS_DIR))
}

/** True when `vectors/index.db` is on disk, the same test the store registry uses. */
export async function vectorStoreExists(kbDir: string): Promise<boolean> {
  try {
    return (await stat(vectorDbPath(kbDir))).isFile()
  } catch {
    return false
  }
}

/** Intro text, trimmed to `maxChars`. Missing or unreadable intros read as ''. */
export async function readIntro(kbDir: string, maxChars = 300): Promise<string> {
  try {
    const intro = (await readFile(join(kbDir, INTRO_FILE), 'utf-8')).trim()
    return trimText(intro, maxChars)
  } catch {
    return ''
  }
}
