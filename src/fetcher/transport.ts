/**
 * Transport
 *
 * One HTTP GET with bounded retries on connection-level failures.
 * Everything else (HTTP status, body contents) is left to the caller.
 */

import { ConnectivityError } from '../errors'
import { buildRequestUrl, type FetchFn, httpFetch } from '../http'
import { type Logger, silentLogger } from '../logger'
import type { QueryParams } from '../types'

export const DEFAULT_MAX_ATTEMPTS = 5

const CONNECTIVITY_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET'
])

function errorCode(error: unknown): string | undefined {
  if (error === null || typeof error !== 'object' || !('code' in error)) return undefined
  return typeof error.code === 'string' ? error.code : undefined
}

/**
 * Whether an error means the server could not be reached at all.
 *
 * Node's fetch rejects with `TypeError: fetch failed` for every network-level
 * failure and carries the socket error as `cause`.
 */
export function isConnectivityError(error: unknown): boolean {
  if (error instanceof TypeError && error.message === 'fetch failed') return true

  const code = errorCode(error)
  if (code && CONNECTIVITY_ERROR_CODES.has(code)) return true

  if (error instanceof Error && error.cause !== undefined) {
    const causeCode = errorCode(error.cause)
    return causeCode !== undefined && CONNECTIVITY_ERROR_CODES.has(causeCode)
  }
  return false
}

export interface TransportConfig {
  /** Attempts per request before giving up (default: 5) */
  readonly maxAttempts?: number | undefined
  /** Delay before retry n is n * retryDelayMs (default: 0) */
  readonly retryDelayMs?: number | undefined
  /** Custom fetch function (for testing) */
  readonly customFetch?: FetchFn | undefined
  readonly logger?: Logger | undefined
}

/**
 * Body and status of the first attempt that reached the server.
 */
export interface TransportResponse {
  readonly ok: boolean
  readonly status: number
  readonly body: string
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class Transport {
  private readonly maxAttempts: number
  private readonly retryDelayMs: number
  private readonly fetchFn: FetchFn
  private readonly logger: Logger

  constructor(config: TransportConfig = {}) {
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS)
    this.retryDelayMs = config.retryDelayMs ?? 0
    this.fetchFn = config.customFetch ?? httpFetch
    this.logger = config.logger ?? silentLogger
  }

  /**
   * GET `url` with `params` and return the first attempt that reaches the
   * server. A non-2xx status is not retried; the caller decides what it means.
   *
   * @throws ConnectivityError after maxAttempts connection failures
   */
  async fetchBody(url: string, params: QueryParams): Promise<TransportResponse> {
    const requestUrl = buildRequestUrl(url, params)
    let lastError: unknown

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (attempt > 1 && this.retryDelayMs > 0) {
        await sleep(this.retryDelayMs * (attempt - 1))
      }

      try {
        const response = await this.fetchFn(requestUrl, { method: 'GET' })
        if (!response.ok) {
          this.logger.verbose(`HTTP ${response.status} from ${requestUrl}`)
        }
        return { ok: response.ok, status: response.status, body: await response.text() }
      } catch (error) {
        if (!isConnectivityError(error)) throw error
        lastError = error
        this.logger.verbose(`Attempt ${attempt}/${this.maxAttempts} to reach ${url} failed`)
      }
    }

    this.logger.verbose(`Giving up on ${url}`)
    throw new ConnectivityError(url, this.maxAttempts, lastError)
  }
}
