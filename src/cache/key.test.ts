import { describe, expect, it } from 'vitest'
import { createCacheKey, fingerprintOf, normalizeParams } from './key'

const URL = 'https://api.example.test/v2/country'

describe('Cache Key Generation', () => {
  describe('normalizeParams', () => {
    it('sorts params by name and stringifies values', () => {
      expect(normalizeParams({ per_page: 1000, format: 'json', page: 2 })).toEqual([
        ['format', 'json'],
        ['page', '2'],
        ['per_page', '1000']
      ])
    })

    it('returns an empty list for no params', () => {
      expect(normalizeParams({})).toEqual([])
    })
  })

  describe('createCacheKey', () => {
    it('ignores parameter insertion order', () => {
      const a = createCacheKey(URL, { format: 'json', per_page: 1000, page: 2 })
      const b = createCacheKey(URL, { page: 2, per_page: 1000, format: 'json' })

      expect(a).toEqual(b)
      expect(a.fingerprint).toBe(b.fingerprint)
    })

    it('treats numeric and string values alike', () => {
      const a = createCacheKey(URL, { per_page: 1000 })
      const b = createCacheKey(URL, { per_page: '1000' })

      expect(a.fingerprint).toBe(b.fingerprint)
    })

    it('is stable across calls', () => {
      const first = createCacheKey(URL, { format: 'json' })
      const second = createCacheKey(URL, { format: 'json' })

      expect(first.fingerprint).toBe(second.fingerprint)
      expect(first.fingerprint).toMatch(/^[a-f0-9]{64}$/)
    })

    it('differs by URL', () => {
      const a = createCacheKey(URL, { format: 'json' })
      const b = createCacheKey(`${URL}/BR`, { format: 'json' })

      expect(a.fingerprint).not.toBe(b.fingerprint)
    })

    it('differs by parameter value', () => {
      const a = createCacheKey(URL, { page: 1 })
      const b = createCacheKey(URL, { page: 2 })

      expect(a.fingerprint).not.toBe(b.fingerprint)
    })

    it('does not confuse a value containing separators with two params', () => {
      const a = createCacheKey(URL, { a: '1', b: '2' })
      const b = createCacheKey(URL, { a: '1","b","2' })

      expect(a.fingerprint).not.toBe(b.fingerprint)
    })

    it('keeps the url and sorted params on the key', () => {
      const key = createCacheKey(URL, { b: 'x', a: 'y' })

      expect(key.url).toBe(URL)
      expect(key.params).toEqual([
        ['a', 'y'],
        ['b', 'x']
      ])
    })
  })

  describe('fingerprintOf', () => {
    it('matches createCacheKey for the same pairs in any order', () => {
      const key = createCacheKey(URL, { a: '1', b: '2' })

      expect(
        fingerprintOf(URL, [
          ['b', '2'],
          ['a', '1']
        ])
      ).toBe(key.fingerprint)
    })
  })
})
