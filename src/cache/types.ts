/**
 * Response Cache Types
 *
 * Disk-backed memo of raw API response bodies, keyed by request identity.
 */

/**
 * Normalized identity of a request: URL plus parameters sorted by name.
 */
export interface CacheKey {
  readonly url: string
  /** [name, value] pairs sorted by name, values stringified */
  readonly params: readonly (readonly [string, string])[]
  /** SHA256 hex digest of url + params; equal for equal keys */
  readonly fingerprint: string
}

/**
 * One cached response body.
 */
export interface CacheEntry {
  readonly url: string
  readonly params: readonly (readonly [string, string])[]
  /** Local calendar day the body was fetched on (days since 1970-01-01) */
  readonly fetchedOn: number
  readonly body: string
}

/**
 * Request-identity → response-body cache with expiry on load.
 */
export interface ResponseCache {
  /**
   * Get the cached body for a key. Never touches disk.
   * @returns The raw body or undefined if not cached
   */
  lookup(key: CacheKey): string | undefined

  /**
   * Store a body fetched today and persist the whole cache.
   * @throws CacheStoreError when persisting fails
   */
  store(key: CacheKey, body: string): void

  contains(key: CacheKey): boolean
}

/**
 * On-disk layout of the cache file.
 */
export interface CacheFileData {
  version: 1
  entries: CacheEntry[]
}

/**
 * Entries fetched this many days ago or earlier are dropped at load time.
 */
export const CACHE_EXPIRY_DAYS = 7
