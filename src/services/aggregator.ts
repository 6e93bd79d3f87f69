import type { EventFetcher, EventQuery, EventRecord } from '../types'
import { errorMessage, looksLikeClub, sortEventsByDate } from '../utils'
import { logger } from './logger'

export interface CollectOptions {
  clubFilter: boolean
}

/**
 * Query every source for every artist, one call at a time, and return the
 * matching events sorted by date.
 *
 * A failing artist/source pair is logged and contributes whatever it yielded
 * before the failure. Nothing is deduplicated across sources.
 */
export const collectEvents = async (
  fetchers: readonly EventFetcher[],
  artists: readonly string[],
  query: EventQuery,
  { clubFilter }: CollectOptions
): Promise<EventRecord[]> => {
  const rows: EventRecord[] = []

  for (const artist of artists) {
    for (const fetcher of fetchers) {
      let kept = 0
      try {
        for await (const event of fetcher.fetchEvents(artist, query)) {
          if (!clubFilter || looksLikeClub(event.venue)) {
            rows.push(event)
            kept++
          }
        }
        logger.info(`[${fetcher.source}] ${artist}: ${kept} events kept`)
      } catch (e: unknown) {
        logger.error(`[${fetcher.source}] ${artist}: ${errorMessage(e)}`)
      }
    }
  }

  return sortEventsByDate(rows)
}
