import { describe, it, expect } from 'vitest'
import { KnowledgeError, errorMessage, trimText, toPosixPath, KnowledgeBaseNameSchema } from '../../src/common/index.js'

describe('KnowledgeError', () => {
  it('factories set code and message', () => {
    const notFound = KnowledgeError.notFound('Knowledge base', 'docs')
    expect(notFound).toBeInstanceOf(Error)
    expect(notFound.name).toBe('KnowledgeError')
    expect(notFound.code).toBe('NOT_FOUND')
    expect(notFound.message).toBe('Knowledge base not found: docs')

    expect(KnowledgeError.notIndexed('docs').code).toBe('NOT_INDEXED')
    expect(KnowledgeError.cancelled().message).toBe('Cancelled')
  })

  it('keeps the cause', () => {
    const cause = new Error('socket hang up')
    const err = KnowledgeError.embedding('request failed', cause)
    expect(err.code).toBe('EMBEDDING_ERROR')
    expect(err.cause).toBe(cause)
  })

  it('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('x'))).toBe('x')
    expect(errorMessage('plain')).toBe('plain')
    expect(errorMessage(42)).toBe('42')
  })
})

describe('trimText', () => {
  it('leaves short text alone', () => {
    expect(trimText('hello', 10)).toBe('hello')
    expect(trimText('hello', 5)).toBe('hello')
  })

  it('cuts to maxChars including the ellipsis', () => {
    expect(trimText('abcdefghij', 5)).toBe('abcd…')
  })

  it('drops trailing whitespace before the ellipsis', () => {
    expect(trimText('ab   cdefgh', 6)).toBe('ab…')
  })

  it('treats non-positive limits as unlimited', () => {
    expect(trimText('abcdef', 0)).toBe('abcdef')
  })
})

describe('toPosixPath', () => {
  it('converts backslashes', () => {
    expect(toPosixPath('texts\\guide\\setup.md')).toBe('texts/guide/setup.md')
  })
})

describe('KnowledgeBaseNameSchema', () => {
  it('accepts a single segment and trims it', () => {
    expect(KnowledgeBaseNameSchema.parse('  product-docs ')).toBe('product-docs')
  })

  it.each(['', '   ', '.', '..', 'a/b', 'a\\b', '/abs'])('rejects %j', (name) => {
    expect(KnowledgeBaseNameSchema.safeParse(name).success).toBe(false)
  })
})
