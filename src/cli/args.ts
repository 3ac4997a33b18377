/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type CacheAction = 'info' | 'clear'
/** Where `fetch --json` sends its output */
export type JsonOutput = { readonly to: 'stdout' } | { readonly to: 'file'; readonly path: string }
export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  /** For fetch command: API URL */
  url: string
  /** For fetch command: repeated -p name=value */
  params: string[]
  quiet: boolean
  verbose: boolean
  noCache: boolean
  cacheDir: string | undefined
  configFile: string | undefined
  maxAttempts: number | undefined
  maxPages: number | undefined
  /** stdout for bare --json, a file for --json <file> */
  jsonOutput: JsonOutput | undefined
  /** For cache command */
  cacheAction: CacheAction
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Fetch every page of a paginated JSON API, caching each page on disk for 7 days.

Examples:
  $ wb-fetcher fetch https://api.worldbank.org/v2/country
  $ wb-fetcher fetch https://api.worldbank.org/v2/country/BR/indicator/SP.POP.TOTL -p date=2010:2020
  $ wb-fetcher fetch https://api.worldbank.org/v2/source --json sources.json
  $ wb-fetcher cache clear`

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function createProgram(): Command {
  const program = new Command()
    .name('wb-fetcher')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-dir <dir>', 'Custom cache directory (or set WB_FETCHER_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set WB_FETCHER_CONFIG)')

  // ============ FETCH ============
  program
    .command('fetch')
    .description('Fetch all pages of a query and print the records')
    .argument('<url>', 'API endpoint URL')
    .option('-p, --param <name=value>', 'Query parameter (repeatable)', collect, [])
    .option('--no-cache', 'Neither read nor write the response cache')
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')
    .option('--max-attempts <num>', 'Attempts per request on connection failures')
    .option('--max-pages <num>', 'Give up after this many pages')

  // ============ CACHE ============
  program
    .command('cache')
    .description('Inspect or clear the response cache')
    .argument('[action]', 'Action: info (default), clear')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  wb-fetcher config                          List current settings
  wb-fetcher config set maxAttempts 3        Retry connection failures twice
  wb-fetcher config unset cacheDir           Remove custom cache dir`
    )

  return program
}

function parseOptionalInt(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? undefined : parsed
}

function parseJsonOutput(value: unknown): JsonOutput | undefined {
  if (value === true) return { to: 'stdout' }
  if (typeof value === 'string') return { to: 'file', path: value }
  return undefined
}

function buildCLIArgs(commandName: string, url: string, opts: Record<string, unknown>): CLIArgs {
  const params = Array.isArray(opts.param)
    ? opts.param.filter((p): p is string => typeof p === 'string')
    : []

  return {
    command: commandName,
    url,
    params,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    noCache: opts.cache === false,
    cacheDir: typeof opts.cacheDir === 'string' ? opts.cacheDir : undefined,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    maxAttempts: parseOptionalInt(opts.maxAttempts),
    maxPages: parseOptionalInt(opts.maxPages),
    jsonOutput: parseJsonOutput(opts.json),
    cacheAction: 'info',
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseCacheAction(action: string | undefined): CacheAction {
  return action === 'clear' ? 'clear' : 'info'
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Build the program with action handlers that capture the parsed args.
 * Use optsWithGlobals() to include global options from parent program.
 */
function createCapturingProgram(): { program: Command; getResult: () => CLIArgs | null } {
  const program = createProgram()
  let result: CLIArgs | null = null

  for (const cmd of program.commands) {
    switch (cmd.name()) {
      case 'cache':
        cmd.action((action?: string) => {
          result = {
            ...buildCLIArgs('cache', '', cmd.optsWithGlobals()),
            cacheAction: parseCacheAction(action)
          }
        })
        break
      case 'config':
        cmd.action((action?: string, key?: string, value?: string) => {
          result = {
            ...buildCLIArgs('config', '', cmd.optsWithGlobals()),
            configAction: parseConfigAction(action),
            configKey: key,
            configValue: value
          }
        })
        break
      default:
        cmd.action((url: string) => {
          result = buildCLIArgs(cmd.name(), url ?? '', cmd.optsWithGlobals())
        })
    }
  }

  return { program, getResult: () => result }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const { program, getResult } = createCapturingProgram()
  program.parse()

  const result = getResult()
  if (result) {
    return result
  }
  return program.help()
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const { program, getResult } = createCapturingProgram()

  if (!exitOnHelp) {
    // subcommands copied their settings at creation, so override each one
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
      cmd.configureOutput({ writeOut: () => {}, writeErr: () => {} })
    }
  }

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version/usage errors
    if (exitOnHelp) throw error
  }

  return getResult() ?? buildCLIArgs('help', '', {})
}
