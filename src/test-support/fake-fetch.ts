/**
 * In-process stand-ins for the HTTP layer.
 */

import { vi } from 'vitest'
import type { HttpResponse } from '../http'

export function textResponse(body: string, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: () => null
    },
    text: async () => body
  }
}

/**
 * The error Node's fetch raises when the server cannot be reached.
 */
export function connectionRefused(): TypeError {
  const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), {
    code: 'ECONNREFUSED'
  })
  return new TypeError('fetch failed', { cause })
}

/**
 * Build a World Bank style page: `[envelope, records]`.
 */
export function apiPage(
  page: number,
  pages: number,
  records: readonly Record<string, unknown>[],
  lastupdated?: string
): unknown[] {
  const envelope: Record<string, unknown> = { page, pages, per_page: 1000, total: records.length }
  if (lastupdated !== undefined) envelope.lastupdated = lastupdated
  return [envelope, records]
}

/**
 * Fake paginated API: serves `pages[n - 1]` for `page=n` (page 1 when absent).
 * Every requested URL is recorded on the returned mock.
 */
export function createPagedApi(pages: readonly unknown[]) {
  return vi.fn(async (url: string, _init?: RequestInit): Promise<HttpResponse> => {
    const page = Number(new URL(url).searchParams.get('page') ?? '1')
    const body = pages[page - 1]
    if (body === undefined) {
      return textResponse('Not found', 404)
    }
    return textResponse(JSON.stringify(body))
  })
}
