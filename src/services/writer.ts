import { writeFile } from 'node:fs/promises'
import type { EventRecord } from '../types'
import { eventsToCsv } from '../utils'
import { logger } from './logger'

/**
 * Write the events to a CSV file, replacing any existing file
 */
export const writeEventsCsv = async (
  path: string,
  events: readonly EventRecord[]
): Promise<void> => {
  await writeFile(path, eventsToCsv(events), 'utf-8')
  logger.debug(`CSV written to ${path}`)
}

export const formatEventLine = (event: EventRecord): string =>
  `${event.date || 'TBA'} | ${event.artist} @ ${event.venue} — ${event.city} | ${event.url ?? ''}`

/**
 * Print the summary line followed by one line per event
 */
export const printEvents = (path: string, events: readonly EventRecord[]) => {
  console.log(`Wrote ${events.length} events to ${path}`)
  for (const event of events) {
    console.log(formatEventLine(event))
  }
}
