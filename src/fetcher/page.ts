/**
 * Page Fetcher
 *
 * Resolves one request to a parsed JSON page, serving it from the response
 * cache when possible and filling the cache on a miss. Only 2xx bodies that
 * parse as JSON are cached.
 */

import { createCacheKey } from '../cache/key'
import type { ResponseCache } from '../cache/types'
import { CacheStoreError, HttpStatusError, ResponseParseError } from '../errors'
import { type Logger, silentLogger } from '../logger'
import type { QueryParams } from '../types'
import { classifyResponse } from './envelope'
import type { Transport, TransportResponse } from './transport'

/**
 * A parsed response and where it came from.
 */
export interface FetchedPage {
  readonly data: unknown
  readonly fromCache: boolean
  /** Set when the body was fetched but could not be persisted */
  readonly cacheError?: CacheStoreError | undefined
}

export class PageFetcher {
  constructor(
    private readonly transport: Transport,
    private readonly cache: ResponseCache,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Fetch one page. With `useCache` false the cache is neither read nor written.
   *
   * @throws ConnectivityError when the API cannot be reached
   * @throws HttpStatusError on a non-2xx status without an error envelope
   * @throws ResponseParseError when a 2xx body is not JSON
   */
  async getPage(url: string, params: QueryParams, useCache: boolean): Promise<FetchedPage> {
    this.logger.verbose(`fetching ${url}`)
    const key = createCacheKey(url, params)

    const cached = useCache ? this.cache.lookup(key) : undefined
    if (cached !== undefined) {
      return { data: parseBody(url, cached), fromCache: true }
    }

    const response = await this.transport.fetchBody(url, params)
    const data = parseResponse(url, response)

    let cacheError: CacheStoreError | undefined
    if (useCache && response.ok) {
      try {
        this.cache.store(key, response.body)
      } catch (error) {
        if (!(error instanceof CacheStoreError)) throw error
        this.logger.warn(error.message)
        cacheError = error
      }
    }

    return { data, fromCache: false, cacheError }
  }
}

/**
 * Parse a fresh response. A non-2xx status passes only when it carries an
 * error envelope, so the API's own message reaches the caller.
 */
function parseResponse(url: string, response: TransportResponse): unknown {
  if (response.ok) return parseBody(url, response.body)

  let data: unknown
  try {
    data = JSON.parse(response.body)
  } catch {
    throw new HttpStatusError(url, response.status)
  }
  if (classifyResponse(data).kind !== 'api_error') {
    throw new HttpStatusError(url, response.status)
  }
  return data
}

function parseBody(url: string, body: string): unknown {
  try {
    return JSON.parse(body)
  } catch (error) {
    throw new ResponseParseError(url, error)
  }
}
