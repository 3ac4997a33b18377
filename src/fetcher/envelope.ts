/**
 * Response Envelope Classification
 *
 * A successful response is `[envelope, records]`, where the envelope carries
 * `page`, `pages` and optionally `lastupdated`. An error response carries
 * `message: [{ id, key, value }]` in element 0 instead.
 */

import type { ApiErrorPayload, ApiRecord, ClassifiedResponse, PageEnvelope } from '../types'

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Page numbers arrive as numbers or numeric strings.
 */
function toPageNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10)
  }
  return null
}

function readEnvelope(value: unknown): PageEnvelope | null {
  if (!isObject(value)) return null
  const page = toPageNumber(value.page)
  const pages = toPageNumber(value.pages)
  if (page === null || pages === null) return null
  return {
    page,
    pages,
    lastUpdated: typeof value.lastupdated === 'string' ? value.lastupdated : undefined
  }
}

/**
 * Records of a page. The API sends `null` for an empty result set.
 */
function readRecords(value: unknown): ApiRecord[] | null {
  if (value === null) return []
  if (!Array.isArray(value) || !value.every(isObject)) return null
  return value
}

function readErrorPayload(value: unknown): ApiErrorPayload | null {
  if (!isObject(value) || !Array.isArray(value.message)) return null
  const message: unknown = value.message[0]
  if (!isObject(message)) return null
  if (!('id' in message) || !('key' in message) || !('value' in message)) return null
  return {
    id: String(message.id),
    key: String(message.key),
    value: String(message.value)
  }
}

/**
 * Classify a parsed response as a result page, an API error, or something unexpected.
 */
export function classifyResponse(response: unknown): ClassifiedResponse {
  const head: unknown = Array.isArray(response) ? response[0] : undefined

  if (Array.isArray(response) && response.length >= 2) {
    const envelope = readEnvelope(head)
    const records = readRecords(response[1])
    if (envelope && records) {
      return { kind: 'page', envelope, records }
    }
  }

  const error = readErrorPayload(head)
  if (error) {
    return { kind: 'api_error', error }
  }

  return { kind: 'unexpected', response }
}

const LAST_UPDATED_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Parse a `YYYY-MM-DD` date as local midnight.
 * Returns undefined for anything else, including impossible dates like 2020-02-30.
 */
export function parseLastUpdated(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined
  const match = LAST_UPDATED_PATTERN.exec(value)
  if (!match) return undefined

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const date = new Date(year, month - 1, day)
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined
  }
  return date
}
