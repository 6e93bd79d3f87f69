import { EVENT_SOURCES } from '../const'
import type { DateWindow, EventFetcher, EventQuery, EventRecord } from '../types'
import { bandsintownEventSchema, getJson, type BandsintownEvent } from '../utils'
import { logger } from './logger'

// Sentinels for an open side of the window, the api only takes closed ranges
const EARLIEST_DATE = '1900-01-01'
const LATEST_DATE = '2999-12-31'

export interface BandsintownOptions {
  appId: string
  baseUrl?: string
  timeout?: number
}

/**
 * Bandsintown artist events, one request per artist
 * @class
 */
export class BandsintownService implements EventFetcher {
  readonly source = EVENT_SOURCES.BANDSINTOWN
  private readonly appId: string
  private readonly baseUrl: string
  private readonly timeout?: number

  constructor({
    appId,
    baseUrl = 'https://rest.bandsintown.com',
    timeout,
  }: BandsintownOptions) {
    this.appId = appId
    this.baseUrl = baseUrl
    this.timeout = timeout
  }

  /**
   * Fetch an artist's events. Country and city refinements are not
   * supported by this source and are ignored.
   */
  async *fetchEvents(
    artist: string,
    query: EventQuery
  ): AsyncGenerator<EventRecord> {
    const url = new URL(
      `/artists/${encodeURIComponent(artist)}/events`,
      this.baseUrl
    )
    url.searchParams.set('app_id', this.appId)
    url.searchParams.set('date', bandsintownDateParam(query.window))

    const data = await getJson(url, this.timeout)

    // error payloads come back as objects
    if (!Array.isArray(data)) {
      logger.warn(`Bandsintown returned no event list for ${artist}`, {
        response: data,
      })
      return
    }

    for (const raw of data) {
      const parsed = bandsintownEventSchema.safeParse(raw)
      if (!parsed.success) {
        logger.warn(`Skipping malformed Bandsintown event for ${artist}`, {
          issues: parsed.error.issues,
        })
        continue
      }
      yield toBandsintownRecord(artist, parsed.data)
    }
  }
}

export const bandsintownDateParam = ({ from, to }: DateWindow): string => {
  if (!from && !to) return 'all'
  return `${from ?? EARLIEST_DATE},${to ?? LATEST_DATE}`
}

export const toBandsintownRecord = (
  artist: string,
  event: BandsintownEvent
): EventRecord => ({
  source: EVENT_SOURCES.BANDSINTOWN,
  artist,
  date: event.datetime ?? undefined,
  venue: event.venue?.name ?? '',
  city: [event.venue?.city, event.venue?.country].filter(Boolean).join(', '),
  lineup: (event.lineup ?? []).filter(Boolean).join(', '),
  url: event.url ?? undefined,
})
