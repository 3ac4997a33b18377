#!/usr/bin/env tsx
/**
 * wb-fetcher CLI
 *
 * Local orchestrator for the core library.
 * Handles argument parsing, configuration, progress reporting and output.
 */

import { parseCliArgs } from './cli/args'
import { cmdCache } from './cli/commands/cache'
import { cmdConfig } from './cli/commands/config'
import { cmdFetch } from './cli/commands/fetch'
import { initContext } from './cli/context'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  // JSON on stdout must not be interleaved with progress output
  const logger = createLogger(args.quiet || args.jsonOutput?.to === 'stdout', args.verbose)

  try {
    switch (args.command) {
      case 'fetch':
        await cmdFetch(args, await initContext(args, logger))
        break

      case 'cache':
        await cmdCache(args, await initContext(args, logger))
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'wb-fetcher --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
