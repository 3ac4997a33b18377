/**
 * Fetcher Module
 *
 * Cached, retrying, paginated retrieval from JSON APIs.
 */

export { classifyResponse, parseLastUpdated } from './envelope'
export { type FetchedPage, PageFetcher } from './page'
export {
  DEFAULT_MAX_PAGES,
  Paginator,
  type PaginatorConfig,
  PER_PAGE,
  trimRecordId
} from './paginator'
export {
  DEFAULT_MAX_ATTEMPTS,
  isConnectivityError,
  Transport,
  type TransportConfig,
  type TransportResponse
} from './transport'
