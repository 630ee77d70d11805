import { debug } from './logger'

export interface MemoCache<V> {
  getOrCompute(key: string, compute: () => Promise<V>): Promise<V>
  // drops one key, or everything when no key is given
  invalidate(key?: string): void
  readonly size: number
}

export type CacheFactory = <V>() => MemoCache<V>

/**
 * Read-through cache that publishes the pending promise before awaiting it,
 * so concurrent callers for the same key share a single computation.
 * A computation that rejects is evicted and will run again on the next call.
 */
export class InMemoryCache<V> implements MemoCache<V> {
  private entries = new Map<string, Promise<V>>()

  getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    const hit = this.entries.get(key)
    if (hit) {
      debug('cache hit', key)
      return hit
    }

    debug('cache miss', key)
    const pending = compute()
    this.entries.set(key, pending)
    pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key)
    })
    return pending
  }

  invalidate(key?: string) {
    if (key === undefined) this.entries.clear()
    else this.entries.delete(key)
  }

  get size() {
    return this.entries.size
  }
}

export const createMemoryCache: CacheFactory = <V>() => new InMemoryCache<V>()
