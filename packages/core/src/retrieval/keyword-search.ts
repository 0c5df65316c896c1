/**
 * Keyword search over the raw lines of a knowledge base's text files.
 */

import { readFile } from 'node:fs/promises'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeError, errorMessage } from '../common/index.js'
import { listTextFiles } from '../kb/index.js'
import { KeywordSearchOptionsSchema } from './schemas.js'
import type { KeywordHit, KeywordSearchOptions } from './schemas.js'

/**
 * Lines containing `keyword`, in file then line order. Stops once `maxLines`
 * hits are collected or their combined length reaches `maxChars`.
 */
export async function keywordSearch(
  kbDir: string,
  keyword: string,
  options?: KeywordSearchOptions,
): Promise<Result<KeywordHit[], KnowledgeError>> {
  if (keyword.trim().length === 0) {
    return Err(KnowledgeError.validation('Keyword cannot be empty'))
  }
  const parsed = KeywordSearchOptionsSchema.safeParse(options ?? {})
  if (!parsed.success) {
    return Err(KnowledgeError.validation(`Invalid keyword search options: ${parsed.error.issues[0]?.message ?? 'unknown'}`))
  }
  const { maxLines, maxChars, caseSensitive, sourceKeyword } = parsed.data

  const files = await listTextFiles(kbDir)
  if (!files.ok) return files

  const fold = (s: string): string => (caseSensitive ? s : s.toLowerCase())
  const needle = fold(keyword)
  const sourceNeedle = fold(sourceKeyword?.trim() ?? '')

  const hits: KeywordHit[] = []
  let totalChars = 0

  for (const file of files.value) {
    if (sourceNeedle && !fold(file.relativePath).includes(sourceNeedle)) continue

    let content: string
    try {
      content = await readFile(file.absolutePath, 'utf-8')
    } catch (err) {
      console.warn(`[retrieval] skipping unreadable ${file.relativePath}: ${errorMessage(err)}`)
      continue
    }

    const lines = content.split(/\r\n|\r|\n/)
    for (let i = 0; i < lines.length; i++) {
      if (!fold(lines[i]).includes(needle)) continue
      hits.push({ source: file.relativePath, line: i + 1, text: lines[i] })
      totalChars += lines[i].length
      if (hits.length >= maxLines || totalChars >= maxChars) return Ok(hits)
    }
  }

  return Ok(hits)
}
