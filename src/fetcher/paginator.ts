/**
 * Paginator
 *
 * Walks every page of a query, one request at a time, and aggregates the
 * records in page order. Each request's `page` depends on the previous
 * response, so pages are never fetched in parallel.
 */

import { ApiError, type CacheStoreError, PaginationLimitError, UnexpectedResponseError } from '../errors'
import { type Logger, silentLogger } from '../logger'
import type { AggregatedResult, ApiRecord, PageEnvelope, QueryParams } from '../types'
import { classifyResponse, parseLastUpdated } from './envelope'
import type { PageFetcher } from './page'

/** Fixed page size sent with every request */
export const PER_PAGE = 1000

/** Default upper bound on pages walked for one query */
export const DEFAULT_MAX_PAGES = 10_000

export interface PaginatorConfig {
  /** Give up with PaginationLimitError after this many pages (default: 10000) */
  readonly maxPages?: number | undefined
  readonly logger?: Logger | undefined
}

/**
 * Trim surrounding whitespace from a record's string `id`.
 */
export function trimRecordId(record: ApiRecord): ApiRecord {
  const id = record.id
  if (typeof id !== 'string') return record
  return { ...record, id: id.trim() }
}

export class Paginator {
  private readonly maxPages: number
  private readonly logger: Logger

  constructor(
    private readonly pageFetcher: PageFetcher,
    config: PaginatorConfig = {}
  ) {
    this.maxPages = Math.max(1, config.maxPages ?? DEFAULT_MAX_PAGES)
    this.logger = config.logger ?? silentLogger
  }

  /**
   * Fetch all pages of `url` and return their records.
   *
   * The first request carries `format=json` and `per_page=1000` on top of the
   * caller's params; every later one also carries `page=<n>`.
   *
   * @throws ApiError when the API answers with an error envelope
   * @throws UnexpectedResponseError when a response has neither shape
   * @throws PaginationLimitError when more than maxPages pages are walked
   */
  async fetchAll(
    url: string,
    params: QueryParams = {},
    useCache = true
  ): Promise<AggregatedResult> {
    const requestParams: Record<string, string | number> = {
      ...params,
      format: 'json',
      per_page: PER_PAGE
    }

    const records: ApiRecord[] = []
    const cacheWarnings: CacheStoreError[] = []
    let lastEnvelope: PageEnvelope | undefined
    let pages = 0
    let thisPage = 1
    let walked = 0

    do {
      if (walked >= this.maxPages) {
        throw new PaginationLimitError(url, this.maxPages)
      }

      const fetched = await this.pageFetcher.getPage(url, requestParams, useCache)
      walked++
      if (fetched.cacheError) cacheWarnings.push(fetched.cacheError)

      const classified = classifyResponse(fetched.data)
      if (classified.kind === 'api_error') {
        const { id, key, value } = classified.error
        throw new ApiError(id, key, value)
      }
      if (classified.kind === 'unexpected') {
        throw new UnexpectedResponseError(classified.response)
      }

      records.push(...classified.records)
      lastEnvelope = classified.envelope
      thisPage = classified.envelope.page
      pages = classified.envelope.pages

      this.logger.verbose(`Processed page ${thisPage} of ${pages}`)
      this.logger.progress(url, thisPage, pages)
      requestParams.page = thisPage + 1
    } while (thisPage < pages)

    return {
      records: records.map(trimRecordId),
      lastUpdated: parseLastUpdated(lastEnvelope?.lastUpdated),
      cacheWarnings
    }
  }
}
