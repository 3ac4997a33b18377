/**
 * Calendar-day arithmetic for cache expiry.
 */

import { CACHE_EXPIRY_DAYS } from './types'

const MS_PER_DAY = 24 * 60 * 60 * 1000

/**
 * Days since 1970-01-01 of the date's local calendar day.
 * Time of day and DST shifts never change the result.
 */
export function toDayOrdinal(date: Date): number {
  return Math.floor(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()) / MS_PER_DAY)
}

export function isExpired(
  fetchedOn: number,
  today: number,
  expiryDays: number = CACHE_EXPIRY_DAYS
): boolean {
  return today - fetchedOn >= expiryDays
}
