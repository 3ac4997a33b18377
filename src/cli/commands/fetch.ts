/**
 * Fetch Command
 *
 * Walks every page of a query through the response cache and prints or
 * saves the aggregated records.
 */

import { writeFile } from 'node:fs/promises'
import type { AggregatedResult } from '../../types'
import type { CLIArgs } from '../args'
import type { CommandContext } from '../context'
import { formatDay, parseParamArgs, summarizeRecord, truncate } from '../helpers'

const PREVIEW_COUNT = 10

interface FetchOutput {
  url: string
  lastUpdated: string | null
  recordCount: number
  records: AggregatedResult['records']
}

export function toFetchOutput(url: string, result: AggregatedResult): FetchOutput {
  return {
    url,
    lastUpdated: result.lastUpdated ? formatDay(result.lastUpdated) : null,
    recordCount: result.records.length,
    records: result.records
  }
}

export async function cmdFetch(args: CLIArgs, ctx: CommandContext): Promise<FetchOutput> {
  const { client, logger } = ctx
  if (!args.url) {
    throw new Error('No URL specified')
  }

  const params = parseParamArgs(args.params)
  logger.log(`\n🌐 ${args.url}${args.noCache ? ' (--no-cache)' : ''}`)

  const result = await client.fetchAll(args.url, params, !args.noCache)
  const output = toFetchOutput(args.url, result)

  for (const warning of result.cacheWarnings) {
    logger.warn(`Cache not updated: ${warning.message}`)
  }

  logger.success(
    `${output.recordCount} record${output.recordCount === 1 ? '' : 's'}` +
      (output.lastUpdated ? ` (last updated ${output.lastUpdated})` : '')
  )

  if (args.jsonOutput) {
    const json = JSON.stringify(output, null, 2)
    if (args.jsonOutput.to === 'stdout') {
      console.log(json)
    } else {
      await writeFile(args.jsonOutput.path, json)
      logger.success(`Saved records to ${args.jsonOutput.path}`)
    }
    return output
  }

  for (const record of result.records.slice(0, PREVIEW_COUNT)) {
    logger.log(`   ${truncate(summarizeRecord(record), 100)}`)
  }
  if (result.records.length > PREVIEW_COUNT) {
    logger.log(`   ... and ${result.records.length - PREVIEW_COUNT} more (use --json for all)`)
  }
  return output
}
