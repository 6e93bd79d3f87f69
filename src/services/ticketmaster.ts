import {
  DEFAULT_MAX_PAGES,
  EVENT_SOURCES,
  TICKETMASTER_CLASSIFICATION,
  TICKETMASTER_PAGE_SIZE,
} from '../const'
import type { EventFetcher, EventQuery, EventRecord } from '../types'
import {
  getJson,
  ticketmasterEventSchema,
  ticketmasterPageSchema,
  type TicketmasterEvent,
} from '../utils'
import { logger } from './logger'

export interface TicketmasterOptions {
  apiKey: string
  maxPages?: number
  pageSize?: number
  baseUrl?: string
  timeout?: number
}

/**
 * Ticketmaster Discovery API event search, restricted to electronic music.
 * @class
 */
export class TicketmasterService implements EventFetcher {
  readonly source = EVENT_SOURCES.TICKETMASTER
  private readonly apiKey: string
  private readonly maxPages: number
  private readonly pageSize: number
  private readonly baseUrl: string
  private readonly timeout?: number

  constructor({
    apiKey,
    maxPages = DEFAULT_MAX_PAGES,
    pageSize = TICKETMASTER_PAGE_SIZE,
    baseUrl = 'https://app.ticketmaster.com/discovery/v2/events.json',
    timeout,
  }: TicketmasterOptions) {
    this.apiKey = apiKey
    this.maxPages = maxPages
    this.pageSize = pageSize
    this.baseUrl = baseUrl
    this.timeout = timeout
  }

  /**
   * Page through the search results for an artist. Stops at the reported
   * page count or the page cap, whichever comes first.
   */
  async *fetchEvents(
    artist: string,
    query: EventQuery
  ): AsyncGenerator<EventRecord> {
    let page = 0
    while (page < this.maxPages) {
      const data = ticketmasterPageSchema.parse(
        await getJson(this.buildUrl(artist, query, page), this.timeout)
      )

      const events = data._embedded?.events ?? []
      logger.debug(
        `Ticketmaster page ${page} for ${artist}: ${events.length} events`
      )

      for (const raw of events) {
        const parsed = ticketmasterEventSchema.safeParse(raw)
        if (!parsed.success) {
          logger.warn(`Skipping malformed Ticketmaster event for ${artist}`, {
            issues: parsed.error.issues,
          })
          continue
        }
        yield toTicketmasterRecord(artist, parsed.data)
      }

      const totalPages = data.page?.totalPages ?? 1
      page += 1
      if (page >= totalPages) break
    }
  }

  private buildUrl(artist: string, query: EventQuery, page: number): URL {
    const url = new URL(this.baseUrl)
    const params = url.searchParams
    params.set('apikey', this.apiKey)
    params.set('keyword', artist)
    params.set('classificationName', TICKETMASTER_CLASSIFICATION)
    params.set('size', String(this.pageSize))
    params.set('sort', 'date,asc')
    if (query.country) params.set('countryCode', query.country)
    if (query.city) params.set('city', query.city)
    if (query.window.from) {
      params.set('startDateTime', `${query.window.from}T00:00:00Z`)
    }
    if (query.window.to) {
      params.set('endDateTime', `${query.window.to}T23:59:59Z`)
    }
    params.set('page', String(page))
    return url
  }
}

/**
 * Map a decoded Ticketmaster event, only the first listed venue is used
 */
export const toTicketmasterRecord = (
  artist: string,
  event: TicketmasterEvent
): EventRecord => {
  const venue = event._embedded?.venues?.[0]
  const attractions = event._embedded?.attractions ?? []

  return {
    source: EVENT_SOURCES.TICKETMASTER,
    artist,
    date: event.dates?.start?.dateTime ?? undefined,
    venue: venue?.name ?? '',
    city: [venue?.city?.name, venue?.country?.countryCode]
      .filter(Boolean)
      .join(', '),
    lineup: attractions
      .map((attraction) => attraction.name)
      .filter(Boolean)
      .join(', '),
    url: event.url ?? undefined,
  }
}
