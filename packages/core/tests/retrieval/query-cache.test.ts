import { describe, it, expect } from 'vitest'
import { QueryVectorCache } from '../../src/retrieval/query-cache.js'

describe('QueryVectorCache', () => {
  it('keys entries by model and query', () => {
    const cache = new QueryVectorCache()
    cache.set('model-a', 'hello', [1])
    cache.set('model-b', 'hello', [2])

    expect(cache.get('model-a', 'hello')).toEqual([1])
    expect(cache.get('model-b', 'hello')).toEqual([2])
    expect(cache.get('model-a', 'other')).toBeUndefined()
  })

  it('evicts the least recently used entry', () => {
    const cache = new QueryVectorCache(2)
    cache.set('m', 'one', [1])
    cache.set('m', 'two', [2])
    cache.get('m', 'one')
    cache.set('m', 'three', [3])

    expect(cache.size).toBe(2)
    expect(cache.get('m', 'two')).toBeUndefined()
    expect(cache.get('m', 'one')).toEqual([1])
    expect(cache.get('m', 'three')).toEqual([3])
  })

  it('clears', () => {
    const cache = new QueryVectorCache()
    cache.set('m', 'q', [1])
    cache.clear()
    expect(cache.size).toBe(0)
  })
})
