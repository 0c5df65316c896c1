import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { tmpdir } from 'node:os'
import { KnowledgeManager } from '../../src/manager/knowledge-manager.js'
import { KnowledgeConfigSchema, KnowledgeSettingsSchema } from '../../src/config/index.js'

function topicVector(text: string): number[] {
  return text.includes('cat') ? [1, 0] : [0, 1]
}

function fakeEmbedder() {
  return {
    modelName: 'embed-small',
    embedDocuments: vi.fn(async (texts: string[]) => texts.map(topicVector)),
    embedQuery: vi.fn(async (text: string) => topicVector(text)),
    stop: vi.fn(async () => undefined),
  }
}

describe('KnowledgeManager', () => {
  let baseDir: string
  let embedder: ReturnType<typeof fakeEmbedder>
  let manager: KnowledgeManager

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'knowledge-manager-'))

    await mkdir(join(baseDir, 'pets', 'texts'), { recursive: true })
    await writeFile(join(baseDir, 'pets', 'intro.md'), '  Notes about household pets  \n')
    await writeFile(join(baseDir, 'pets', 'texts', 'cats.md'), 'the cat sat\ncats purr\n')
    await writeFile(join(baseDir, 'pets', 'texts', 'dogs.md'), 'dogs bark\n\ndogs run\n')

    await mkdir(join(baseDir, 'drafts', 'texts'), { recursive: true })
    await mkdir(join(baseDir, 'scratch'), { recursive: true })
    await writeFile(join(baseDir, 'readme.txt'), 'not a knowledge base')

    embedder = fakeEmbedder()
    manager = new KnowledgeManager({ settings: KnowledgeSettingsSchema.parse({ baseDir }), embedder })
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    await manager.stop()
    vi.restoreAllMocks()
    await rm(baseDir, { recursive: true, force: true })
  })

  describe('listKnowledgeBases', () => {
    it('lists directories with a texts/ folder, sorted by name', async () => {
      expect(await manager.listKnowledgeBases()).toEqual([
        { name: 'drafts', intro: '', hasIntro: false },
        { name: 'pets', intro: 'Notes about household pets', hasIntro: true },
      ])
    })

    it('keeps only knowledge bases with an intro when onlyReady is set', async () => {
      const infos = await manager.listKnowledgeBases({ onlyReady: true })
      expect(infos.map((info) => info.name)).toEqual(['pets'])
    })

    it('filters by name keyword', async () => {
      const infos = await manager.listKnowledgeBases({ nameKeyword: 'DRA' })
      expect(infos.map((info) => info.name)).toEqual(['drafts'])
    })

    it('truncates the intro', async () => {
      const [, pets] = await manager.listKnowledgeBases({ introMaxChars: 5 })
      expect(pets.intro).toBe('Note…')
    })
  })

  describe('index', () => {
    it('joins a scan that is already running', async () => {
      const first = manager.index('pets')
      const second = manager.index('pets')

      expect(second).toBe(first)
      expect(manager.isIndexing('pets')).toBe(true)

      const result = await first
      expect(manager.isIndexing('pets')).toBe(false)
      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value).toMatchObject({ knowledgeBase: 'pets', added: 2, embeddedTexts: 2, status: 'completed' })
      expect(embedder.embedDocuments).toHaveBeenCalledTimes(2)
    })

    it('reports a missing knowledge base', async () => {
      const result = await manager.index('ghost')
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('NOT_FOUND')
    })

    it('scans every knowledge base', async () => {
      const reports = await manager.indexAll()
      expect(reports.map((report) => report.knowledgeBase)).toEqual(['drafts', 'pets'])
    })
  })

  describe('search', () => {
    it('refuses semantic search before the first scan', async () => {
      const result = await manager.semanticSearch('pets', 'cat')
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('NOT_INDEXED')
    })

    it('reports an unknown knowledge base', async () => {
      const result = await manager.semanticSearch('ghost', 'cat')
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('NOT_FOUND')
    })

    it('rejects names that leave the base directory', async () => {
      const result = await manager.keywordSearch('../pets', 'cat')
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('VALIDATION_ERROR')
    })

    it('finds indexed text by meaning', async () => {
      await manager.index('pets')

      const result = await manager.semanticSearch('pets', 'a cat question', { topK: 2 })
      expect(result.ok).toBe(true)
      if (!result.ok) return

      expect(result.value).toEqual([
        { source: 'texts/cats.md', startLine: 1, text: 'the cat sat\ncats purr', relevance: 1 },
        { source: 'texts/dogs.md', startLine: 1, text: 'dogs bark\ndogs run', relevance: 0 },
      ])
      expect(embedder.embedQuery).toHaveBeenCalledWith('a cat question')
    })

    it('applies minRelevance from the request', async () => {
      await manager.index('pets')
      const result = await manager.semanticSearch('pets', 'cat', { minRelevance: 0.5 })
      if (!result.ok) throw result.error
      expect(result.value.map((hit) => hit.source)).toEqual(['texts/cats.md'])
    })

    it('finds results again after switching embedding models', async () => {
      await manager.index('pets')
      await manager.stop()

      const renamed = { ...fakeEmbedder(), modelName: 'embed-large' }
      manager = new KnowledgeManager({ settings: KnowledgeSettingsSchema.parse({ baseDir }), embedder: renamed })

      const before = await manager.semanticSearch('pets', 'cat')
      expect(before.ok).toBe(false)
      if (before.ok) return
      expect(before.error.code).toBe('NOT_INDEXED')
      expect(before.error.message).toBe(
        'Knowledge base has not been indexed yet: pets (vectors were built with embed-small, not embed-large)',
      )

      const report = await manager.index('pets')
      if (!report.ok) throw report.error
      expect(report.value).toMatchObject({ added: 2, embeddedTexts: 2 })

      const after = await manager.semanticSearch('pets', 'cat', { topK: 1 })
      if (!after.ok) throw after.error
      expect(after.value.map((hit) => hit.source)).toEqual(['texts/cats.md'])
    })

    it('searches raw lines by keyword', async () => {
      const result = await manager.keywordSearch('pets', 'DOGS')
      if (!result.ok) throw result.error
      expect(result.value).toEqual([
        { source: 'texts/dogs.md', line: 1, text: 'dogs bark' },
        { source: 'texts/dogs.md', line: 3, text: 'dogs run' },
      ])
    })
  })

  describe('scheduling', () => {
    it('runs the auto scan until stopped', async () => {
      manager.startAutoScan(3600)
      await vi.waitFor(() => expect(embedder.embedDocuments).toHaveBeenCalledTimes(2))

      await manager.stop()

      expect(embedder.stop).toHaveBeenCalled()
      expect(manager.isIndexing('pets')).toBe(false)
    })

    it('runs one initial scan when auto scan is off', async () => {
      manager.start()
      await vi.waitFor(() => expect(embedder.embedDocuments).toHaveBeenCalledTimes(2))
      await vi.waitFor(() => expect(manager.isIndexing('pets')).toBe(false))

      const result = await manager.semanticSearch('pets', 'cat', { topK: 1 })
      if (!result.ok) throw result.error
      expect(result.value.map((hit) => hit.source)).toEqual(['texts/cats.md'])
    })

    it('ignores new scans after stop', async () => {
      await manager.stop()
      manager.startInitialScan()
      manager.startAutoScan()
      expect(manager.isIndexing('pets')).toBe(false)
    })
  })

  it('builds HTTP-backed components from config', () => {
    const config = KnowledgeConfigSchema.parse({
      knowledge: { enabled: true, baseDir },
      embedding: { apiUrl: 'http://localhost:9000/v1', apiKey: 'test-key', modelName: 'embed-small' },
    })
    const built = KnowledgeManager.fromConfig(config)
    expect(built?.baseDir).toBe(resolve(baseDir))
    expect(built?.settings.defaultTopK).toBe(5)
  })

  it('builds nothing when the feature is disabled', () => {
    const config = KnowledgeConfigSchema.parse({
      knowledge: { baseDir },
      embedding: { apiUrl: 'http://localhost:9000/v1', apiKey: 'test-key', modelName: 'embed-small' },
    })
    expect(config.knowledge.enabled).toBe(false)
    expect(KnowledgeManager.fromConfig(config)).toBeNull()
  })
})
