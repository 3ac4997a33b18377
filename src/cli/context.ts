/**
 * CLI Context
 *
 * Resolves settings from CLI args, environment and config file, and builds
 * the fetcher client every command shares.
 */

import { cacheFilePath, defaultCacheDir } from '../cache/filesystem'
import { createFetcherClient, type FetcherClient } from '../client'
import type { FetchFn } from '../http'
import { VERSION } from '../index'
import type { Logger } from '../logger'
import type { CLIArgs } from './args'
import { type Config, loadConfig } from './config'

/** CLI default backoff step; the library itself defaults to no delay */
const DEFAULT_RETRY_DELAY_MS = 500

export interface CommandContext {
  readonly client: FetcherClient
  readonly cacheFile: string
  readonly logger: Logger
}

/**
 * Get the cache directory: CLI arg > env var > config file > default.
 */
export function getCacheDir(override: string | undefined, config: Config | null): string {
  return (
    override ?? process.env.WB_FETCHER_CACHE_DIR ?? config?.cacheDir ?? defaultCacheDir()
  )
}

export interface InitContextOptions {
  /** Custom fetch function (for testing) */
  readonly customFetch?: FetchFn | undefined
}

export async function initContext(
  args: CLIArgs,
  logger: Logger,
  options: InitContextOptions = {}
): Promise<CommandContext> {
  const config = await loadConfig(args.configFile)
  const cacheFile = cacheFilePath(getCacheDir(args.cacheDir, config), VERSION)
  logger.verbose(`Cache file: ${cacheFile}`)

  const client = createFetcherClient({
    cacheFile,
    maxAttempts: args.maxAttempts ?? config?.maxAttempts,
    retryDelayMs: config?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    maxPages: args.maxPages ?? config?.maxPages,
    customFetch: options.customFetch,
    logger
  })

  return { client, cacheFile, logger }
}
