/**
 * Cache Integration Tests
 *
 * Verify that a query cached on disk by one client is served to a fresh
 * client without any API calls, until the entries expire.
 */

import { existsSync, mkdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createFetcherClient } from '../client'
import type { HttpResponse } from '../http'
import { apiPage, textResponse } from '../test-support'
import { cacheFilePath } from './filesystem'

// Mock the http module's fetch to track API calls through the default transport
const { mockFetch } = vi.hoisted(() => ({
  mockFetch: vi.fn<(url: string, init?: RequestInit) => Promise<HttpResponse>>()
}))
vi.mock('../http', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../http')>()),
  httpFetch: mockFetch
}))

const URL = 'https://api.example.test/v2/country/BR/indicator/SP.POP.TOTL'
const FETCH_DAY = new Date(2020, 2, 15, 12, 0, 0)

const PAGES = [
  apiPage(1, 2, [{ id: ' BR ', value: 1 }, { id: 'BR', value: 2 }]),
  apiPage(2, 2, [{ id: 'BR', value: 3 }], '2020-03-01')
]

function servePages(url: string): Promise<HttpResponse> {
  const page = Number(new globalThis.URL(url).searchParams.get('page') ?? '1')
  const body = PAGES[page - 1]
  return Promise.resolve(
    body === undefined ? textResponse('Not found', 404) : textResponse(JSON.stringify(body))
  )
}

describe('Cache Integration', () => {
  let testDir: string
  let cacheFile: string

  beforeEach(() => {
    testDir = join(tmpdir(), `integration-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
    cacheFile = cacheFilePath(testDir, '0.1.0')
    mockFetch.mockReset()
    mockFetch.mockImplementation(servePages)
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  function client(now: Date = FETCH_DAY) {
    return createFetcherClient({ cacheFile, now: () => now })
  }

  it('fetches every page on the first run', async () => {
    const result = await client().fetchAll(URL, { date: '2019' })

    expect(result.records).toEqual([
      { id: 'BR', value: 1 },
      { id: 'BR', value: 2 },
      { id: 'BR', value: 3 }
    ])
    expect(result.lastUpdated).toEqual(new Date(2020, 2, 1))
    expect(mockFetch).toHaveBeenCalledTimes(2)
    expect(existsSync(cacheFile)).toBe(true)
  })

  it('serves a second process from disk without API calls', async () => {
    const first = await client().fetchAll(URL, { date: '2019' })
    mockFetch.mockClear()

    const second = await client().fetchAll(URL, { date: '2019' })

    expect(second).toEqual(first)
    expect(mockFetch).not.toHaveBeenCalled()
  })

  it('still serves the cache six days later', async () => {
    await client().fetchAll(URL)
    mockFetch.mockClear()

    const later = new Date(2020, 2, 21, 8, 0, 0)
    await client(later).fetchAll(URL)

    expect(mockFetch).not.toHaveBeenCalled()
  })

  it('refetches once the entries are seven days old', async () => {
    await client().fetchAll(URL)
    mockFetch.mockClear()

    const later = new Date(2020, 2, 22, 8, 0, 0)
    await client(later).fetchAll(URL)

    expect(mockFetch).toHaveBeenCalledTimes(2)
  })

  it('keys the cache on the query params', async () => {
    await client().fetchAll(URL, { date: '2019' })
    mockFetch.mockClear()

    await client().fetchAll(URL, { date: '2020' })

    expect(mockFetch).toHaveBeenCalledTimes(2)
  })

  it('bypasses the cache entirely with useCache off', async () => {
    const c = client()
    await c.fetchAll(URL, {}, false)

    expect(c.cache.size).toBe(0)
    expect(existsSync(cacheFile)).toBe(false)

    await c.fetchAll(URL, {}, false)
    expect(mockFetch).toHaveBeenCalledTimes(4)
  })

  it('goes back to the network after an outage instead of replaying it', async () => {
    mockFetch.mockImplementation(async () =>
      textResponse('<html>503 Service Unavailable</html>', 503)
    )
    await expect(client().fetchAll(URL)).rejects.toThrow(`Got HTTP 503 from ${URL}`)
    expect(existsSync(cacheFile)).toBe(false)

    mockFetch.mockReset()
    mockFetch.mockImplementation(servePages)
    const fiveDaysLater = new Date(2020, 2, 20, 9, 0, 0)
    const result = await client(fiveDaysLater).fetchAll(URL)

    expect(result.records).toHaveLength(3)
    expect(mockFetch).toHaveBeenCalledTimes(2)
  })

  it('does not cache a body that is not JSON', async () => {
    mockFetch.mockImplementationOnce(async () => textResponse('<html>maintenance</html>'))

    await expect(client().fetchAll(URL)).rejects.toThrow(`Invalid JSON from ${URL}`)
    const result = await client().fetchAll(URL)

    expect(result.records).toHaveLength(3)
    expect(mockFetch).toHaveBeenCalledTimes(3)
  })

  it('replays a cached error envelope without calling the API', async () => {
    mockFetch.mockImplementation(async () =>
      textResponse(JSON.stringify([{ message: [{ id: '120', key: 'Invalid value', value: 'x' }] }]))
    )

    await expect(client().fetchAll(URL)).rejects.toThrow('Got error 120 (Invalid value): x')
    await expect(client().fetchAll(URL)).rejects.toThrow('Got error 120 (Invalid value): x')

    // a 2xx JSON body is cached before classification, so the replay hits disk
    expect(mockFetch).toHaveBeenCalledTimes(1)
  })
})
