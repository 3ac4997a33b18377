/**
 * Fetcher Client
 *
 * Wires the response cache, transport, page fetcher and paginator together.
 * The cache is loaded once here and shared by every query made through the client.
 */

import { FilesystemCache } from './cache/filesystem'
import { PageFetcher } from './fetcher/page'
import { Paginator } from './fetcher/paginator'
import { Transport } from './fetcher/transport'
import type { FetchFn } from './http'
import { type Logger, silentLogger } from './logger'
import type { AggregatedResult, QueryParams } from './types'

export interface FetcherClientConfig {
  /** Cache file path (see cacheFilePath) */
  readonly cacheFile: string
  /** Attempts per request on connection failures (default: 5) */
  readonly maxAttempts?: number | undefined
  /** Linear backoff step between attempts in ms (default: 0) */
  readonly retryDelayMs?: number | undefined
  /** Page guard per query (default: 10000) */
  readonly maxPages?: number | undefined
  /** Custom fetch function (for testing) */
  readonly customFetch?: FetchFn | undefined
  /** Clock for cache expiry (for testing) */
  readonly now?: (() => Date) | undefined
  readonly logger?: Logger | undefined
}

export interface FetcherClient {
  readonly cache: FilesystemCache
  fetchAll(url: string, params?: QueryParams, useCache?: boolean): Promise<AggregatedResult>
}

export function createFetcherClient(config: FetcherClientConfig): FetcherClient {
  const logger = config.logger ?? silentLogger
  const cache = new FilesystemCache(config.cacheFile, { now: config.now })
  const transport = new Transport({
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    customFetch: config.customFetch,
    logger
  })
  const paginator = new Paginator(new PageFetcher(transport, cache, logger), {
    maxPages: config.maxPages,
    logger
  })

  return {
    cache,
    fetchAll: (url, params = {}, useCache = true) => paginator.fetchAll(url, params, useCache)
  }
}
