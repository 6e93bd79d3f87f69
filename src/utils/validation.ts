import { z } from 'zod'
import { DateTime } from 'luxon'
import {
  DEFAULT_CSV_PATH,
  DEFAULT_MAX_PAGES,
  SOURCE_OPTION_NAMES,
} from '../const'

// Upstream keys may be missing or null, decoders default them
const optionalString = z.string().nullish()

export const ticketmasterVenueSchema = z.object({
  name: optionalString,
  city: z.object({ name: optionalString }).nullish(),
  country: z.object({ countryCode: optionalString }).nullish(),
})

export const ticketmasterEventSchema = z.object({
  url: optionalString,
  dates: z
    .object({
      start: z.object({ dateTime: optionalString }).nullish(),
    })
    .nullish(),
  _embedded: z
    .object({
      venues: z.array(ticketmasterVenueSchema).nullish(),
      attractions: z.array(z.object({ name: optionalString })).nullish(),
    })
    .nullish(),
})

// Events stay unknown here so one bad item does not sink the page
export const ticketmasterPageSchema = z.object({
  _embedded: z
    .object({
      events: z.array(z.unknown()).nullish(),
    })
    .nullish(),
  page: z
    .object({
      totalPages: z.number().int().nonnegative().nullish(),
    })
    .nullish(),
})

export const bandsintownEventSchema = z.object({
  datetime: optionalString,
  url: optionalString,
  venue: z
    .object({
      name: optionalString,
      city: optionalString,
      country: optionalString,
    })
    .nullish(),
  lineup: z.array(z.string()).nullish(),
})

export type TicketmasterEvent = z.infer<typeof ticketmasterEventSchema>
export type TicketmasterPage = z.infer<typeof ticketmasterPageSchema>
export type BandsintownEvent = z.infer<typeof bandsintownEventSchema>

const calendarDate = z
  .string()
  .refine(
    (val) => DateTime.fromFormat(val, 'yyyy-MM-dd').isValid,
    'Expected a date as YYYY-MM-DD'
  )

const nonBlank = z.string().trim().min(1)

// checked but kept as typed, records carry the name as queried
const artistName = z
  .string()
  .refine((val) => val.trim().length > 0, 'Expected a non-blank artist name')

export const cliOptionsSchema = z
  .object({
    artists: z.array(artistName).min(1),
    from: calendarDate.optional(),
    to: calendarDate.optional(),
    country: nonBlank.optional(),
    city: nonBlank.optional(),
    csv: nonBlank.default(DEFAULT_CSV_PATH),
    clubFilter: z.boolean().default(true),
    maxPages: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),
    sources: z.array(z.enum(SOURCE_OPTION_NAMES)).min(1).default(['ticketmaster']),
    includeTicketmaster: z.boolean().default(false),
  })
  .refine((opts) => !opts.from || !opts.to || opts.from <= opts.to, {
    message: '--from must not be after --to',
    path: ['from'],
  })

export type CliOptions = z.infer<typeof cliOptionsSchema>
