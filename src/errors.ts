/**
 * Fetcher Errors
 *
 * Every failure the fetcher surfaces is a FetcherError subclass with a fixed name.
 */

import { inspect } from 'node:util'

export class FetcherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FetcherError'
  }
}

/**
 * Every attempt to reach the remote API failed at the connection level.
 */
export class ConnectivityError extends FetcherError {
  readonly url: string
  readonly attempts: number

  constructor(url: string, attempts: number, cause?: unknown) {
    super(`Couldn't connect to ${url} after ${attempts} attempt${attempts === 1 ? '' : 's'}`, {
      cause
    })
    this.name = 'ConnectivityError'
    this.url = url
    this.attempts = attempts
  }
}

/**
 * The remote API answered with its own error envelope.
 */
export class ApiError extends FetcherError {
  readonly id: string
  readonly key: string
  readonly value: string

  constructor(id: string, key: string, value: string) {
    super(`Got error ${id} (${key}): ${value}`)
    this.name = 'ApiError'
    this.id = id
    this.key = key
    this.value = value
  }
}

/**
 * The response matched neither a result page nor an error envelope.
 */
export class UnexpectedResponseError extends FetcherError {
  readonly response: unknown

  constructor(response: unknown) {
    super(`Got unexpected response:\n${inspect(response, { depth: 6, breakLength: 100 })}`)
    this.name = 'UnexpectedResponseError'
    this.response = response
  }
}

/**
 * The server answered with a non-2xx status and no error envelope.
 */
export class HttpStatusError extends FetcherError {
  readonly url: string
  readonly status: number

  constructor(url: string, status: number) {
    super(`Got HTTP ${status} from ${url}`)
    this.name = 'HttpStatusError'
    this.url = url
    this.status = status
  }
}

/**
 * The response body was not valid JSON.
 */
export class ResponseParseError extends FetcherError {
  readonly url: string

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Invalid JSON from ${url}: ${reason}`, { cause })
    this.name = 'ResponseParseError'
    this.url = url
  }
}

/**
 * Writing the response cache to disk failed. Non-fatal: the fetched data is still usable.
 */
export class CacheStoreError extends FetcherError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to write response cache ${path}: ${reason}`, { cause })
    this.name = 'CacheStoreError'
    this.path = path
  }
}

/**
 * The API kept reporting more pages than the walk is allowed to fetch.
 */
export class PaginationLimitError extends FetcherError {
  readonly maxPages: number

  constructor(url: string, maxPages: number) {
    super(`Gave up on ${url} after ${maxPages} pages: pagination never converged`)
    this.name = 'PaginationLimitError'
    this.maxPages = maxPages
  }
}
