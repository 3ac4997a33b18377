import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { defaultCacheDir } from '../cache/filesystem'
import { getCacheDir } from './context'

describe('getCacheDir', () => {
  let originalEnv: string | undefined

  beforeEach(() => {
    originalEnv = process.env.WB_FETCHER_CACHE_DIR
    delete process.env.WB_FETCHER_CACHE_DIR
  })

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.WB_FETCHER_CACHE_DIR = originalEnv
    } else {
      delete process.env.WB_FETCHER_CACHE_DIR
    }
  })

  it('prefers the CLI override', () => {
    process.env.WB_FETCHER_CACHE_DIR = '/env/cache'
    expect(getCacheDir('/cli/cache', { cacheDir: '/config/cache' })).toBe('/cli/cache')
  })

  it('uses the env var over the config file', () => {
    process.env.WB_FETCHER_CACHE_DIR = '/env/cache'
    expect(getCacheDir(undefined, { cacheDir: '/config/cache' })).toBe('/env/cache')
  })

  it('uses the config file when nothing else is set', () => {
    expect(getCacheDir(undefined, { cacheDir: '/config/cache' })).toBe('/config/cache')
  })

  it('falls back to ~/.cache/wb-fetcher', () => {
    expect(getCacheDir(undefined, null)).toBe(defaultCacheDir())
    expect(defaultCacheDir()).toContain(join('.cache', 'wb-fetcher'))
  })
})
