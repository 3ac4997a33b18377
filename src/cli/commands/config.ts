/**
 * Config Command
 *
 * `config` lists the settings in effect; `config set <key> <value>` and
 * `config unset <key>` edit the config file.
 */

import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue
} from '../config'

const USAGE = {
  set: 'wb-fetcher config set <key> <value>',
  unset: 'wb-fetcher config unset <key>'
} as const

function requireKey(args: CLIArgs, action: keyof typeof USAGE): ConfigKey {
  const key = args.configKey
  if (!key) {
    throw new Error(`Missing key. Usage: ${USAGE[action]}`)
  }
  if (!isValidConfigKey(key)) {
    throw new Error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const { configFile } = args

  if (args.configAction === 'list') {
    const config = await loadConfig(configFile)
    logger.log(`\nConfig file: ${getConfigPath(configFile)}\n`)

    const lines = getValidConfigKeys().flatMap((key) => {
      const value = config?.[key]
      return value === undefined ? [] : [`  ${key}: ${formatConfigValue(value)}`]
    })
    if (lines.length === 0) {
      logger.log('No settings configured. Run `wb-fetcher config --help` for available settings.')
    }
    for (const line of lines) logger.log(line)
    return
  }

  const key = requireKey(args, args.configAction)

  if (args.configAction === 'unset') {
    await unsetConfigValue(key, configFile)
    logger.log(`Unset ${key}`)
    return
  }

  if (args.configValue === undefined) {
    throw new Error(`Missing value. Usage: ${USAGE.set}`)
  }
  const value = parseConfigValue(key, args.configValue)
  await setConfigValue(key, value, configFile)
  logger.log(`Set ${key}=${formatConfigValue(value)}`)
}
