import { vi } from 'vitest'
import type { EventRecord } from '../src/types'

export const jsonResponse = (body: unknown, status = 200, statusText = 'OK') =>
  new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  })

/**
 * Replace global fetch. Every requested url is recorded in `urls`.
 */
export const stubFetch = (
  handler: (url: URL) => Response | Promise<Response>
) => {
  const urls: URL[] = []
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = new URL(input instanceof Request ? input.url : input)
    urls.push(url)
    return handler(url)
  })
  vi.stubGlobal('fetch', fetchMock)
  return { fetchMock, urls }
}

export const drain = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
  const out: T[] = []
  for await (const item of iterable) out.push(item)
  return out
}

export const ticketmasterEvent = (
  venue: string,
  dateTime: string,
  url = `https://tickets.test/${encodeURIComponent(venue)}`
) => ({
  name: `Night at ${venue}`,
  url,
  dates: { start: { localDate: dateTime.slice(0, 10), dateTime } },
  _embedded: {
    venues: [
      {
        name: venue,
        city: { name: 'London' },
        country: { name: 'Great Britain', countryCode: 'GB' },
      },
    ],
    attractions: [{ name: 'Bontan' }, { name: 'Eats Everything' }],
  },
})

export const ticketmasterPage = (
  events: unknown[],
  totalPages = 1,
  number = 0
) => ({
  _embedded: { events },
  page: { size: 100, totalElements: events.length, totalPages, number },
})

export const eventRecord = (
  overrides: Partial<EventRecord> = {}
): EventRecord => ({
  source: 'Ticketmaster',
  artist: 'Bontan',
  date: '2025-01-10T23:00:00Z',
  venue: 'The Warehouse',
  city: 'London, GB',
  lineup: 'Bontan',
  url: 'https://tickets.test/warehouse',
  ...overrides,
})

/**
 * Minimal RFC 4180 reader for checking written files
 */
export const parseCsv = (text: string): string[][] => {
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let quoted = false

  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"'
        i++
      } else if (ch === '"') {
        quoted = false
      } else {
        field += ch
      }
    } else if (ch === '"') {
      quoted = true
    } else if (ch === ',') {
      row.push(field)
      field = ''
    } else if (ch === '\n') {
      row.push(field)
      rows.push(row)
      row = []
      field = ''
    } else if (ch !== '\r') {
      field += ch
    }
  }
  if (field || row.length) {
    row.push(field)
    rows.push(row)
  }
  return rows
}
