/**
 * Fetcher Types
 *
 * Request parameters, API envelopes and aggregated results.
 */

import type { CacheStoreError } from '../errors'

/** Query parameter value as accepted by the fetcher (numbers are stringified on the wire). */
export type ParamValue = string | number

/** Query parameters for one request, in insertion order. */
export type QueryParams = Readonly<Record<string, ParamValue>>

/** One record object of a result page. */
export type ApiRecord = Readonly<Record<string, unknown>>

/**
 * Pagination metadata sent as element 0 of a successful response.
 */
export interface PageEnvelope {
  readonly page: number
  readonly pages: number
  /** Raw `lastupdated` value, when the API sent one */
  readonly lastUpdated?: string | undefined
}

/**
 * Error payload the API sends as `message[0]` of element 0.
 */
export interface ApiErrorPayload {
  readonly id: string
  readonly key: string
  readonly value: string
}

/**
 * Outcome of inspecting one parsed response.
 */
export type ClassifiedResponse =
  | {
      readonly kind: 'page'
      readonly envelope: PageEnvelope
      readonly records: readonly ApiRecord[]
    }
  | { readonly kind: 'api_error'; readonly error: ApiErrorPayload }
  | { readonly kind: 'unexpected'; readonly response: unknown }

/**
 * All records of a paginated query, in page order.
 */
export interface AggregatedResult {
  readonly records: readonly ApiRecord[]
  /** Date from the final page's `lastupdated` (local midnight), if present and valid */
  readonly lastUpdated: Date | undefined
  /** Cache writes that failed during the walk; the records are complete regardless */
  readonly cacheWarnings: readonly CacheStoreError[]
}
