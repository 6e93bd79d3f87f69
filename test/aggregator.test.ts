import { afterEach, describe, expect, it, vi } from 'vitest'
import { collectEvents, logger } from '../src/services'
import type { EventFetcher, EventRecord, EventSource } from '../src/types'
import { eventRecord } from './helpers'

interface FakeResult {
  events: EventRecord[]
  error?: Error
}

// in-process stand-in for a source, keyed by artist
const fakeFetcher = (
  source: EventSource,
  results: Record<string, FakeResult>
): EventFetcher & { calls: string[] } => {
  const calls: string[] = []
  return {
    source,
    calls,
    async *fetchEvents(artist) {
      calls.push(artist)
      const result = results[artist] ?? { events: [] }
      yield* result.events
      if (result.error) throw result.error
    },
  }
}

const query = { window: { from: '2025-01-01', to: '2025-01-31' } }

describe('collectEvents', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('queries artists in order, each against every source in order', async () => {
    const order: string[] = []
    const tracking = (source: EventSource): EventFetcher => ({
      source,
      async *fetchEvents(artist) {
        order.push(`${source}:${artist}`)
      },
    })

    await collectEvents(
      [tracking('Bandsintown'), tracking('Ticketmaster')],
      ['Bontan', 'Joshua Butler'],
      query,
      { clubFilter: true }
    )

    expect(order).toEqual([
      'Bandsintown:Bontan',
      'Ticketmaster:Bontan',
      'Bandsintown:Joshua Butler',
      'Ticketmaster:Joshua Butler',
    ])
  })

  it('filters venues and sorts the merged result', async () => {
    const ticketmaster = fakeFetcher('Ticketmaster', {
      Bontan: {
        events: [
          eventRecord({ venue: 'City Hall', date: '2025-01-05T20:00:00Z' }),
          eventRecord({ venue: 'The Warehouse', date: '2025-01-20T23:00:00Z' }),
        ],
      },
    })
    const bandsintown = fakeFetcher('Bandsintown', {
      Bontan: {
        events: [
          eventRecord({
            source: 'Bandsintown',
            venue: 'Basement 45',
            date: '2025-01-11T22:00:00',
          }),
          eventRecord({ source: 'Bandsintown', venue: 'Jazz Bar', date: undefined }),
        ],
      },
    })

    const events = await collectEvents(
      [ticketmaster, bandsintown],
      ['Bontan'],
      query,
      { clubFilter: true }
    )

    expect(events.map((event) => event.venue)).toEqual([
      'Basement 45',
      'The Warehouse',
      'Jazz Bar',
    ])
  })

  it('keeps every venue when the club filter is off', async () => {
    const ticketmaster = fakeFetcher('Ticketmaster', {
      Bontan: {
        events: [
          eventRecord({ venue: 'City Hall' }),
          eventRecord({ venue: '' }),
        ],
      },
    })

    const events = await collectEvents([ticketmaster], ['Bontan'], query, {
      clubFilter: false,
    })

    expect(events).toHaveLength(2)
  })

  it('does not merge the same event from two sources', async () => {
    const event = eventRecord()
    const events = await collectEvents(
      [
        fakeFetcher('Ticketmaster', { Bontan: { events: [event] } }),
        fakeFetcher('Bandsintown', {
          Bontan: { events: [{ ...event, source: 'Bandsintown' }] },
        }),
      ],
      ['Bontan'],
      query,
      { clubFilter: true }
    )

    expect(events.map((e) => e.source)).toEqual(['Ticketmaster', 'Bandsintown'])
  })

  it('logs a failing artist/source pair and carries on', async () => {
    const errorSpy = vi.spyOn(logger, 'error')
    const ticketmaster = fakeFetcher('Ticketmaster', {
      Bontan: {
        events: [eventRecord({ venue: 'The Warehouse' })],
        error: new Error('socket hang up'),
      },
      'Joshua Butler': {
        events: [eventRecord({ artist: 'Joshua Butler', venue: 'Sky Terrace' })],
      },
    })
    const bandsintown = fakeFetcher('Bandsintown', {
      Bontan: {
        events: [
          eventRecord({ source: 'Bandsintown', venue: 'Basement 45' }),
        ],
      },
    })

    const events = await collectEvents(
      [ticketmaster, bandsintown],
      ['Bontan', 'Joshua Butler'],
      query,
      { clubFilter: true }
    )

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy).toHaveBeenCalledWith('[Ticketmaster] Bontan: socket hang up')
    expect(ticketmaster.calls).toEqual(['Bontan', 'Joshua Butler'])
    expect(events.map((event) => event.venue)).toEqual([
      'The Warehouse',
      'Basement 45',
      'Sky Terrace',
    ])
  })
})
