/**
 * Filesystem-based Response Cache
 *
 * Keeps every cached response in a single JSON file that is loaded whole at
 * construction and rewritten whole on every store. Entries expire after
 * CACHE_EXPIRY_DAYS calendar days, checked only when the file is loaded.
 *
 * A full rewrite per store caps how large the cache can usefully grow; that
 * is accepted for a per-user memo of paginated queries.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { CacheStoreError } from '../errors'
import { isExpired, toDayOrdinal } from './day'
import { fingerprintOf } from './key'
import {
  CACHE_EXPIRY_DAYS,
  type CacheEntry,
  type CacheFileData,
  type CacheKey,
  type ResponseCache
} from './types'

const CACHE_FILE_NAME = 'responses.json'

/**
 * Default cache root: ~/.cache/wb-fetcher
 */
export function defaultCacheDir(): string {
  return join(homedir(), '.cache', 'wb-fetcher')
}

/**
 * Cache file inside a cache root, versioned so releases never read each other's files.
 */
export function cacheFilePath(cacheDir: string, version: string): string {
  return join(cacheDir, version, CACHE_FILE_NAME)
}

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(path: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = defaultCacheDir()
  if (path.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache file: ${path}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/wb-fetcher/`
    )
  }
}

function isParamPair(value: unknown): value is [string, string] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'string'
  )
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function isCacheEntry(entry: unknown): entry is CacheEntry {
  if (!isRecord(entry)) return false
  return (
    typeof entry.url === 'string' &&
    Array.isArray(entry.params) &&
    entry.params.every(isParamPair) &&
    typeof entry.fetchedOn === 'number' &&
    Number.isInteger(entry.fetchedOn) &&
    typeof entry.body === 'string'
  )
}

/**
 * Read the entries of a cache file, or null if the file is missing or not ours.
 */
function readCacheFile(path: string): CacheEntry[] | null {
  if (!existsSync(path)) return null

  let data: unknown
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'))
  } catch {
    return null
  }

  if (!isRecord(data) || data.version !== 1 || !Array.isArray(data.entries)) return null

  return data.entries.filter(isCacheEntry)
}

export interface FilesystemCacheOptions {
  /** Clock used for fetch days and expiry (default: system clock) */
  readonly now?: (() => Date) | undefined
  /** Expiry threshold in calendar days (default: CACHE_EXPIRY_DAYS) */
  readonly expiryDays?: number | undefined
}

/**
 * Single-file cache implementation.
 *
 * File layout:
 * ```json
 * {
 *   "version": 1,
 *   "entries": [
 *     { "url": "...", "params": [["format", "json"]], "fetchedOn": 20104, "body": "[...]" }
 *   ]
 * }
 * ```
 *
 * Not safe for concurrent writers: the last full rewrite wins.
 */
export class FilesystemCache implements ResponseCache {
  private entries = new Map<string, CacheEntry>()
  private readonly now: () => Date
  private readonly expiryDays: number

  constructor(
    readonly path: string,
    options: FilesystemCacheOptions = {}
  ) {
    guardAgainstUserCache(path)
    this.now = options.now ?? (() => new Date())
    this.expiryDays = options.expiryDays ?? CACHE_EXPIRY_DAYS
    this.load()
  }

  /**
   * (Re)load the cache file, dropping expired entries.
   * A missing or corrupt file leaves the cache empty.
   */
  load(): void {
    const entries = readCacheFile(this.path) ?? []
    const today = toDayOrdinal(this.now())

    this.entries = new Map()
    for (const entry of entries) {
      if (isExpired(entry.fetchedOn, today, this.expiryDays)) continue
      this.entries.set(fingerprintOf(entry.url, entry.params), entry)
    }
  }

  lookup(key: CacheKey): string | undefined {
    return this.entries.get(key.fingerprint)?.body
  }

  store(key: CacheKey, body: string): void {
    this.entries.set(key.fingerprint, {
      url: key.url,
      params: key.params,
      fetchedOn: toDayOrdinal(this.now()),
      body
    })
    this.sync()
  }

  contains(key: CacheKey): boolean {
    return this.entries.has(key.fingerprint)
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Drop every entry and delete the cache file.
   */
  clear(): void {
    this.entries = new Map()
    try {
      rmSync(this.path, { force: true })
    } catch (error) {
      throw new CacheStoreError(this.path, error)
    }
  }

  /**
   * Write the whole in-memory cache to disk.
   */
  private sync(): void {
    const data: CacheFileData = {
      version: 1,
      entries: [...this.entries.values()]
    }

    try {
      mkdirSync(dirname(this.path), { recursive: true })
      writeFileSync(this.path, JSON.stringify(data))
    } catch (error) {
      throw new CacheStoreError(this.path, error)
    }
  }
}
