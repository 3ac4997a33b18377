/**
 * In-memory Response Cache for Tests
 *
 * Implements ResponseCache without touching disk and records every call,
 * so tests can assert exactly how the fetcher used the cache.
 */

import { CacheStoreError } from '../errors'
import type { CacheKey, ResponseCache } from '../cache/types'

export type CacheCall = 'lookup' | 'store' | 'contains'

export class MemoryCache implements ResponseCache {
  readonly bodies = new Map<string, string>()
  readonly calls: CacheCall[] = []
  /** When set, store() keeps the body in memory but throws like a failed disk write */
  failStores = false

  constructor(initial: readonly (readonly [CacheKey, string])[] = []) {
    for (const [key, body] of initial) {
      this.bodies.set(key.fingerprint, body)
    }
  }

  lookup(key: CacheKey): string | undefined {
    this.calls.push('lookup')
    return this.bodies.get(key.fingerprint)
  }

  store(key: CacheKey, body: string): void {
    this.calls.push('store')
    this.bodies.set(key.fingerprint, body)
    if (this.failStores) {
      throw new CacheStoreError('memory://responses.json', new Error('disk full'))
    }
  }

  contains(key: CacheKey): boolean {
    this.calls.push('contains')
    return this.bodies.has(key.fingerprint)
  }
}
