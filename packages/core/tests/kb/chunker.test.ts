import { describe, it, expect, vi, afterEach } from 'vitest'
import { createHash } from 'node:crypto'
import { chunkLines, splitNonEmptyLines, computeChunkId, resolveWindow } from '../../src/kb/chunker.js'

function lines(count: number): string {
  return Array.from({ length: count }, (_, i) => `l${i + 1}`).join('\n')
}

describe('splitNonEmptyLines', () => {
  it('splits on every newline style and drops blank lines', () => {
    const result = splitNonEmptyLines('a\r\nb\rc\n\n   \nd')
    expect(result).toEqual([
      { lineNumber: 1, text: 'a' },
      { lineNumber: 2, text: 'b' },
      { lineNumber: 3, text: 'c' },
      { lineNumber: 6, text: 'd' },
    ])
  })

  it('returns nothing for whitespace-only content', () => {
    expect(splitNonEmptyLines(' \n\t\n')).toEqual([])
  })
})

describe('computeChunkId', () => {
  it('is the first 16 hex chars of the SHA-256 of the text', () => {
    const expected = createHash('sha256').update('l1\nl2').digest('hex').slice(0, 16)
    expect(computeChunkId('l1\nl2')).toBe(expected)
    expect(computeChunkId('l1\nl2')).toHaveLength(16)
  })
})

describe('chunkLines', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('stops once a window reaches the last line (7 lines, 4/1)', () => {
    const chunks = chunkLines('texts/a.md', lines(7), { chunkSize: 4, chunkOverlap: 1 })

    expect(chunks.map((c) => c.text)).toEqual(['l1\nl2\nl3\nl4', 'l4\nl5\nl6\nl7'])
    expect(chunks.map((c) => c.startLine)).toEqual([1, 4])
    expect(chunks.every((c) => c.source === 'texts/a.md')).toBe(true)
  })

  it('emits a single chunk when the file fits one window (10 lines, 10/2)', () => {
    const chunks = chunkLines('texts/a.md', lines(10), { chunkSize: 10, chunkOverlap: 2 })
    expect(chunks).toHaveLength(1)
    expect(chunks[0].startLine).toBe(1)
    expect(chunks[0].text.split('\n')).toHaveLength(10)
  })

  it('emits one short window for files smaller than chunkSize', () => {
    const chunks = chunkLines('texts/a.md', lines(3), { chunkSize: 10, chunkOverlap: 2 })
    expect(chunks.map((c) => c.text)).toEqual(['l1\nl2\nl3'])
  })

  it('allows a short trailing window', () => {
    const chunks = chunkLines('texts/a.md', lines(6), { chunkSize: 4, chunkOverlap: 1 })
    expect(chunks.map((c) => c.text)).toEqual(['l1\nl2\nl3\nl4', 'l4\nl5\nl6'])
  })

  it('reports the physical line number of the first line', () => {
    const chunks = chunkLines('texts/a.md', '\n\nalpha\n\nbeta\ngamma', { chunkSize: 2, chunkOverlap: 0 })
    expect(chunks.map((c) => [c.startLine, c.text])).toEqual([
      [3, 'alpha\nbeta'],
      [6, 'gamma'],
    ])
  })

  it('returns no chunks for an empty file', () => {
    expect(chunkLines('texts/a.md', '', { chunkSize: 4, chunkOverlap: 1 })).toEqual([])
  })

  it('derives ids from window text only', () => {
    const a = chunkLines('texts/a.md', 'same\ntext', { chunkSize: 5, chunkOverlap: 0 })
    const b = chunkLines('texts/b.md', 'same\ntext', { chunkSize: 5, chunkOverlap: 0 })
    expect(a[0].id).toBe(b[0].id)
    expect(a[0].id).toBe(computeChunkId('same\ntext'))
  })

  it('clamps an overlap that would stall the window, with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const chunks = chunkLines('texts/a.md', lines(3), { chunkSize: 2, chunkOverlap: 5 })

    expect(chunks.map((c) => c.text)).toEqual(['l1\nl2', 'l2\nl3'])
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe('resolveWindow', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('uses 10/2 by default', () => {
    expect(resolveWindow()).toEqual({ chunkSize: 10, chunkOverlap: 2 })
  })

  it('raises chunkSize to 1 and overlap to 0', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    expect(resolveWindow({ chunkSize: 0, chunkOverlap: -3 })).toEqual({ chunkSize: 1, chunkOverlap: 0 })
  })
})
