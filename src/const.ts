export const EVENT_SOURCES = {
  TICKETMASTER: 'Ticketmaster',
  BANDSINTOWN: 'Bandsintown',
} as const

export type EventSource = (typeof EVENT_SOURCES)[keyof typeof EVENT_SOURCES]

// CLI names for each source
export const SOURCE_OPTION_NAMES = ['ticketmaster', 'bandsintown'] as const

export type SourceOption = (typeof SOURCE_OPTION_NAMES)[number]

export const SOURCE_OPTIONS: Record<SourceOption, EventSource> = {
  ticketmaster: EVENT_SOURCES.TICKETMASTER,
  bandsintown: EVENT_SOURCES.BANDSINTOWN,
}

export const CSV_COLUMNS = [
  'date',
  'artist',
  'venue',
  'city',
  'lineup',
  'url',
  'source',
] as const

export const DEFAULT_CSV_PATH = 'club_nights.csv'
export const DEFAULT_MAX_PAGES = 4
export const DEFAULT_WINDOW_DAYS = 90
export const TICKETMASTER_PAGE_SIZE = 100
export const TICKETMASTER_CLASSIFICATION = 'Electronic'
