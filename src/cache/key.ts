/**
 * Cache Key Generation
 *
 * Builds deterministic request identities for response caching.
 */

import { createHash } from 'node:crypto'
import type { QueryParams } from '../types'
import type { CacheKey } from './types'

type ParamPair = readonly [string, string]

function comparePairs(a: ParamPair, b: ParamPair): number {
  if (a[0] !== b[0]) return a[0] < b[0] ? -1 : 1
  if (a[1] !== b[1]) return a[1] < b[1] ? -1 : 1
  return 0
}

/**
 * Sort [name, value] pairs so that insertion order never matters.
 */
export function normalizeParams(params: QueryParams): ParamPair[] {
  return Object.entries(params)
    .map(([name, value]): ParamPair => [name, String(value)])
    .sort(comparePairs)
}

/**
 * SHA256 of `url:sorted_params_json`.
 */
export function fingerprintOf(url: string, params: readonly ParamPair[]): string {
  const sorted = [...params].sort(comparePairs)
  const input = `${url}:${JSON.stringify(sorted)}`
  return createHash('sha256').update(input).digest('hex')
}

/**
 * Generate the cache key for a GET request.
 *
 * @example
 * ```ts
 * const a = createCacheKey('https://api.worldbank.org/v2/country', { format: 'json', per_page: 1000 })
 * const b = createCacheKey('https://api.worldbank.org/v2/country', { per_page: '1000', format: 'json' })
 * a.fingerprint === b.fingerprint // true
 * ```
 */
export function createCacheKey(url: string, params: QueryParams): CacheKey {
  const normalized = normalizeParams(params)
  return {
    url,
    params: normalized,
    fingerprint: fingerprintOf(url, normalized)
  }
}
