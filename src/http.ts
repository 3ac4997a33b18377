/**
 * HTTP Utilities
 *
 * The minimal response contract the fetcher needs, and the default fetch
 * function that refuses real network traffic where it must not happen.
 */

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Check if offline mode is on (no real HTTP requests allowed, cache only).
 */
function isOffline(): boolean {
  return process.env.WB_FETCHER_OFFLINE === 'true'
}

/**
 * Check if HTTP requests should be blocked.
 * True when:
 * - Running tests in CI (CI=true + test mode)
 * - Offline mode is on (WB_FETCHER_OFFLINE=true)
 */
function shouldBlockHttpRequests(): boolean {
  return (isCI() && isTestMode()) || isOffline()
}

/**
 * Error thrown when an uncached HTTP request is made in blocked mode.
 */
export class UncachedHttpRequestError extends Error {
  constructor(url: string) {
    const reason = isOffline() ? 'offline mode is on (WB_FETCHER_OFFLINE=true)' : 'running tests in CI'
    super(
      `Uncached HTTP request to ${url} blocked: ${reason}. ` +
        'Only responses already in the cache can be served.'
    )
    this.name = 'UncachedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
}

/**
 * Fetch function type for dependency injection.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<HttpResponse>

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws UncachedHttpRequestError when HTTP requests are blocked (CI tests or offline mode)
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new UncachedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Append query parameters to a URL, keeping any query it already has.
 */
export function buildRequestUrl(url: string, params: Readonly<Record<string, string | number>>): string {
  const query = new URLSearchParams(
    Object.entries(params).map(([name, value]): [string, string] => [name, String(value)])
  ).toString()
  if (!query) return url
  return `${url}${url.includes('?') ? '&' : '?'}${query}`
}
