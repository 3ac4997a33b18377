/**
 * Cache Command
 *
 * Show where the response cache lives and how many pages it holds, or clear it.
 */

import type { CLIArgs } from '../args'
import type { CommandContext } from '../context'

export async function cmdCache(args: CLIArgs, ctx: CommandContext): Promise<void> {
  const { client, cacheFile, logger } = ctx

  switch (args.cacheAction) {
    case 'info':
      logger.log(`\nCache file: ${cacheFile}`)
      logger.log(`Cached pages: ${client.cache.size}`)
      break
    case 'clear': {
      const count = client.cache.size
      client.cache.clear()
      logger.success(`Cleared ${count} cached page${count === 1 ? '' : 's'}`)
      break
    }
  }
}
