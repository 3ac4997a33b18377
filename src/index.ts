/**
 * wb-fetcher Core Library
 *
 * Paginated JSON API retrieval with a disk-persisted, day-granular response cache.
 */

// Cache module
export type { CacheEntry, CacheKey, ResponseCache } from './cache/index'
export {
  CACHE_EXPIRY_DAYS,
  cacheFilePath,
  createCacheKey,
  defaultCacheDir,
  FilesystemCache,
  type FilesystemCacheOptions,
  toDayOrdinal
} from './cache/index'
// Client
export { createFetcherClient, type FetcherClient, type FetcherClientConfig } from './client'
// Errors
export {
  ApiError,
  CacheStoreError,
  ConnectivityError,
  FetcherError,
  HttpStatusError,
  PaginationLimitError,
  ResponseParseError,
  UnexpectedResponseError
} from './errors'
// Fetcher module
export {
  classifyResponse,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_PAGES,
  type FetchedPage,
  isConnectivityError,
  PageFetcher,
  Paginator,
  PER_PAGE,
  parseLastUpdated,
  Transport,
  type TransportResponse
} from './fetcher/index'
// HTTP
export { type FetchFn, type HttpResponse, httpFetch, UncachedHttpRequestError } from './http'
// Logging
export { createLogger, type Logger, silentLogger } from './logger'
// Types
export type {
  AggregatedResult,
  ApiErrorPayload,
  ApiRecord,
  ClassifiedResponse,
  PageEnvelope,
  ParamValue,
  QueryParams
} from './types'

export const VERSION = '0.1.0'
