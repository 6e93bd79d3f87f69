import { DateTime } from 'luxon'
import { DEFAULT_WINDOW_DAYS } from '../const'
import type { DateWindow, EventRecord } from '../types'

/**
 * Fill in the default search window, today .. today + 90 days in UTC.
 * Explicit bounds are kept as given.
 */
export const resolveDateWindow = (
  window: DateWindow,
  now: DateTime = DateTime.utc()
): Required<DateWindow> => {
  const today = now.toUTC().startOf('day')
  return {
    from: window.from ?? today.toISODate() ?? '',
    to: window.to ?? today.plus({ days: DEFAULT_WINDOW_DAYS }).toISODate() ?? '',
  }
}

/**
 * Sort key for an event date. A trailing Z is dropped before parsing, so
 * offset-less and Z-suffixed timestamps compare as the same wall time.
 * @returns epoch millis, or Infinity when the date is missing or unparsable
 */
export const eventTimestamp = (date?: string): number => {
  if (!date) return Number.POSITIVE_INFINITY
  const dt = DateTime.fromISO(date.replace(/Z$/, ''), { zone: 'utc' })
  return dt.isValid ? dt.toMillis() : Number.POSITIVE_INFINITY
}

/**
 * Stable ascending sort by event date, TBA and unparsable dates last
 */
export const sortEventsByDate = (
  events: readonly EventRecord[]
): EventRecord[] => {
  const keyed = events.map((event) => ({
    event,
    key: eventTimestamp(event.date),
  }))
  keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
  return keyed.map(({ event }) => event)
}
