/**
 * CLI Helpers
 *
 * Shared formatting and parsing utilities for CLI commands.
 */

import type { ApiRecord, QueryParams } from '../types'

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a date as YYYY-MM-DD in local time.
 */
export function formatDay(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${date.getFullYear()}-${month}-${day}`
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return `${text.slice(0, maxLength - 3)}...`
}

/**
 * One-line summary of a record: its id and name when present, JSON otherwise.
 */
export function summarizeRecord(record: ApiRecord): string {
  const id = typeof record.id === 'string' ? record.id : undefined
  const name = typeof record.name === 'string' ? record.name : undefined
  if (id !== undefined && name !== undefined) return `${id}  ${name}`
  return JSON.stringify(record)
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse repeated `name=value` arguments into query params.
 * Later occurrences of a name win.
 *
 * @throws Error on an argument without `=` or with an empty name
 */
export function parseParamArgs(args: readonly string[]): QueryParams {
  const params: Record<string, string> = {}
  for (const arg of args) {
    const eq = arg.indexOf('=')
    if (eq <= 0) {
      throw new Error(`Invalid parameter "${arg}": expected name=value`)
    }
    params[arg.slice(0, eq)] = arg.slice(eq + 1)
  }
  return params
}
