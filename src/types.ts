import type { EventSource } from './const'

export type { EventSource }

/**
 * A single upcoming event as reported by one source for one queried artist.
 * Missing upstream values are already defaulted by the source decoder.
 */
export interface EventRecord {
  readonly source: EventSource
  readonly artist: string
  readonly date?: string // ISO-8601 as returned upstream, undefined means TBA
  readonly venue: string
  readonly city: string // "City, Country"
  readonly lineup: string // co-billed artists joined with ", "
  readonly url?: string
}

/**
 * Inclusive date range, both bounds in YYYY-MM-DD.
 * An absent bound is unbounded on that side.
 */
export interface DateWindow {
  from?: string
  to?: string
}

export interface EventQuery {
  window: DateWindow
  country?: string
  city?: string
}

export interface EventFetcher {
  readonly source: EventSource
  fetchEvents(artist: string, query: EventQuery): AsyncIterable<EventRecord>
}

export interface Credentials {
  ticketmasterApiKey?: string
  bandsintownAppId?: string
}
