import { describe, expect, it } from 'vitest'
import { InMemoryCache } from './cache'

describe('InMemoryCache', () => {
  it('computes once per key', async () => {
    const cache = new InMemoryCache<number>()
    let calls = 0
    const compute = async () => ++calls
    expect(await cache.getOrCompute('a', compute)).toBe(1)
    expect(await cache.getOrCompute('a', compute)).toBe(1)
    expect(await cache.getOrCompute('b', compute)).toBe(2)
    expect(cache.size).toBe(2)
  })

  it('shares one in-flight computation between concurrent callers', async () => {
    const cache = new InMemoryCache<string>()
    let calls = 0
    let release: (value: string) => void = () => {}
    const compute = () => {
      calls++
      return new Promise<string>((resolve) => {
        release = resolve
      })
    }
    const first = cache.getOrCompute('k', compute)
    const second = cache.getOrCompute('k', compute)
    release('done')
    expect(await Promise.all([first, second])).toEqual(['done', 'done'])
    expect(calls).toBe(1)
  })

  it('evicts a rejected computation', async () => {
    const cache = new InMemoryCache<string>()
    await expect(cache.getOrCompute('k', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    expect(cache.size).toBe(0)
    expect(await cache.getOrCompute('k', async () => 'ok')).toBe('ok')
  })

  it('invalidates one key or all of them', async () => {
    const cache = new InMemoryCache<number>()
    await cache.getOrCompute('a', async () => 1)
    await cache.getOrCompute('b', async () => 2)
    cache.invalidate('a')
    expect(cache.size).toBe(1)
    expect(await cache.getOrCompute('a', async () => 10)).toBe(10)
    cache.invalidate()
    expect(cache.size).toBe(0)
  })
})
