/**
 * Cache Module
 *
 * Disk-persisted response caching so repeated runs skip redundant API calls.
 */

export { isExpired, toDayOrdinal } from './day'
export {
  cacheFilePath,
  defaultCacheDir,
  FilesystemCache,
  type FilesystemCacheOptions
} from './filesystem'
export { createCacheKey, fingerprintOf, normalizeParams } from './key'
export type { CacheEntry, CacheFileData, CacheKey, ResponseCache } from './types'
export { CACHE_EXPIRY_DAYS } from './types'
