/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/wb-fetcher/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or WB_FETCHER_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Custom cache directory */
  cacheDir?: string | undefined
  /** Attempts per request on connection failures */
  maxAttempts?: number | undefined
  /** Linear backoff step between attempts in ms */
  retryDelayMs?: number | undefined
  /** Give up after this many pages per query */
  maxPages?: number | undefined
  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

/** Config keys that accept string values */
const STRING_KEYS: readonly ConfigKey[] = ['cacheDir']
/** Config keys that accept number values */
const NUMBER_KEYS: readonly ConfigKey[] = ['maxAttempts', 'retryDelayMs', 'maxPages']

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  cacheDir: 'Cache directory path (default: ~/.cache/wb-fetcher)',
  maxAttempts: 'Attempts per request on connection failures (default: 5)',
  retryDelayMs: 'Backoff step between attempts in ms (default: 500)',
  maxPages: 'Give up after this many pages per query (default: 10000)'
}

/**
 * Get the type of a config key (for CLI help).
 */
export function getConfigType(key: ConfigKey): string {
  return NUMBER_KEYS.includes(key) ? 'number' : 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for wb-fetcher.
 * Uses ~/.config/wb-fetcher on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'wb-fetcher')
}

/**
 * Get the config file path.
 * Priority: configFile arg > WB_FETCHER_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.WB_FETCHER_CONFIG) {
    return process.env.WB_FETCHER_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Keep only known keys with values of the right type.
 */
function sanitizeConfig(raw: unknown): Config | null {
  if (!isRecord(raw)) return null
  const config: Config = {}
  if (typeof raw.cacheDir === 'string') config.cacheDir = raw.cacheDir
  const maxAttempts = readNumber(raw.maxAttempts)
  if (maxAttempts !== undefined) config.maxAttempts = maxAttempts
  const retryDelayMs = readNumber(raw.retryDelayMs)
  if (retryDelayMs !== undefined) config.retryDelayMs = retryDelayMs
  const maxPages = readNumber(raw.maxPages)
  if (maxPages !== undefined) config.maxPages = maxPages
  if (typeof raw.updatedAt === 'string') config.updatedAt = raw.updatedAt
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return sanitizeConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/** Number keys that must be at least 1 */
const POSITIVE_KEYS: readonly ConfigKey[] = ['maxAttempts', 'maxPages']

/**
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws Error when a number key gets something that is not an integer in range
 */
export function parseConfigValue(key: ConfigKey, value: string): string | number {
  if (!NUMBER_KEYS.includes(key)) {
    return value
  }
  const min = POSITIVE_KEYS.includes(key) ? 1 : 0
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) < min) {
    const expected = min === 1 ? 'a positive integer' : 'a non-negative integer'
    throw new Error(`Invalid value for ${key}: "${value}" (expected ${expected})`)
  }
  return Number.parseInt(trimmed, 10)
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return getValidConfigKeys().some((validKey) => validKey === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

function withValue(config: Config, key: ConfigKey, value: string | number): Config {
  switch (key) {
    case 'cacheDir':
      return { ...config, cacheDir: String(value) }
    case 'maxAttempts':
      return { ...config, maxAttempts: Number(value) }
    case 'retryDelayMs':
      return { ...config, retryDelayMs: Number(value) }
    case 'maxPages':
      return { ...config, maxPages: Number(value) }
  }
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string | number,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(withValue(config, key, value), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}
