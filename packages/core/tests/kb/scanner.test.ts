import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, writeFile, mkdir, rm, readFile } from 'node:fs/promises'
import { createHash } from 'node:crypto'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { listTextFiles, scanKnowledgeBase, isSupportedTextFile } from '../../src/kb/scanner.js'

function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

describe('isSupportedTextFile', () => {
  it('matches extensions case-insensitively', () => {
    expect(isSupportedTextFile('notes.MD')).toBe(true)
    expect(isSupportedTextFile('data.yaml')).toBe(true)
    expect(isSupportedTextFile('image.png')).toBe(false)
    expect(isSupportedTextFile('Makefile')).toBe(false)
  })

  it('excludes the manifest and intro files', () => {
    expect(isSupportedTextFile('intro.md')).toBe(false)
    expect(isSupportedTextFile('.manifest.json')).toBe(false)
  })
})

describe('listTextFiles', () => {
  let kbDir: string

  beforeEach(async () => {
    kbDir = await mkdtemp(join(tmpdir(), 'kb-scanner-'))
  })

  afterEach(async () => {
    await rm(kbDir, { recursive: true, force: true })
  })

  it('walks texts/ recursively and sorts by relative path', async () => {
    await mkdir(join(kbDir, 'texts', 'guide'), { recursive: true })
    await writeFile(join(kbDir, 'texts', 'z.txt'), 'z')
    await writeFile(join(kbDir, 'texts', 'guide', 'setup.md'), 'setup')
    await writeFile(join(kbDir, 'texts', 'a.csv'), 'a,b')

    const result = await listTextFiles(kbDir)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((f) => f.relativePath)).toEqual(['texts/a.csv', 'texts/guide/setup.md', 'texts/z.txt'])
  })

  it('skips hidden and ignored directories', async () => {
    for (const dir of ['.hidden', 'vectors', 'node_modules', '__pycache__', '.git']) {
      await mkdir(join(kbDir, 'texts', dir), { recursive: true })
      await writeFile(join(kbDir, 'texts', dir, 'skip.md'), 'skip')
    }
    await writeFile(join(kbDir, 'texts', 'keep.md'), 'keep')
    await writeFile(join(kbDir, 'texts', 'intro.md'), 'not corpus')

    const result = await listTextFiles(kbDir)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((f) => f.relativePath)).toEqual(['texts/keep.md'])
  })

  it('returns an IO error when texts/ is missing', async () => {
    const result = await listTextFiles(kbDir)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('IO_ERROR')
  })
})

describe('scanKnowledgeBase', () => {
  let kbDir: string

  beforeEach(async () => {
    kbDir = await mkdtemp(join(tmpdir(), 'kb-scan-diff-'))
    await mkdir(join(kbDir, 'texts'), { recursive: true })
  })

  afterEach(async () => {
    await rm(kbDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('classifies files against the manifest', async () => {
    await writeFile(join(kbDir, 'texts', 'new.md'), 'new')
    await writeFile(join(kbDir, 'texts', 'same.md'), 'same')
    await writeFile(join(kbDir, 'texts', 'edited.md'), 'edited v2')

    const manifest = {
      'texts/same.md': sha256('same'),
      'texts/edited.md': sha256('edited v1'),
      'texts/gone.md': sha256('gone'),
    }

    const result = await scanKnowledgeBase(kbDir, manifest)
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.value.added.map((f) => f.relativePath)).toEqual(['texts/new.md'])
    expect(result.value.changed.map((f) => f.relativePath)).toEqual(['texts/edited.md'])
    expect(result.value.unchanged.map((f) => f.relativePath)).toEqual(['texts/same.md'])
    expect(result.value.removed).toEqual(['texts/gone.md'])
    expect(result.value.failed).toEqual([])
    expect(result.value.changed[0].hash).toBe(sha256('edited v2'))
    expect(result.value.added[0].sizeBytes).toBe(3)
  })

  it('reports unreadable files as failed and never as removed', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    await writeFile(join(kbDir, 'texts', 'locked.md'), 'secret')
    await writeFile(join(kbDir, 'texts', 'open.md'), 'open')

    const manifest = { 'texts/locked.md': sha256('old') }
    const result = await scanKnowledgeBase(kbDir, manifest, {
      readFile: async (path) => {
        if (path.endsWith('locked.md')) throw new Error('EACCES: permission denied')
        return readFile(path)
      },
    })
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.value.failed).toHaveLength(1)
    expect(result.value.failed[0].relativePath).toBe('texts/locked.md')
    expect(result.value.failed[0].error.code).toBe('IO_ERROR')
    expect(result.value.removed).toEqual([])
    expect(result.value.added.map((f) => f.relativePath)).toEqual(['texts/open.md'])
  })
})
