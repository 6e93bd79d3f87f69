import { SOURCE_OPTIONS, type SourceOption } from '../const'
import type { Credentials, EventFetcher } from '../types'
import { MissingCredentialError } from '../utils'
import { BandsintownService } from './bandsintown'
import { TicketmasterService } from './ticketmaster'

export interface SourceSettings {
  maxPages: number
}

/**
 * Resolve the enabled sources in CLI order, without repeats.
 * includeTicketmaster appends Ticketmaster when it is not already on.
 */
export const resolveSources = (
  sources: readonly SourceOption[],
  includeTicketmaster = false
): SourceOption[] => {
  const enabled = new Set<SourceOption>(sources)
  if (includeTicketmaster) enabled.add('ticketmaster')
  return [...enabled]
}

/**
 * Build one fetcher per enabled source. Fetchers do no work until queried,
 * so a missing credential fails before any network call.
 * @throws MissingCredentialError when an enabled source has no credential
 */
export const createFetchers = (
  sources: readonly SourceOption[],
  credentials: Credentials,
  { maxPages }: SourceSettings
): EventFetcher[] =>
  sources.map((source) => {
    switch (source) {
      case 'ticketmaster': {
        const apiKey = credentials.ticketmasterApiKey
        if (!apiKey) throw new MissingCredentialError('TICKETMASTER_API_KEY')
        return new TicketmasterService({ apiKey, maxPages })
      }
      case 'bandsintown': {
        const appId = credentials.bandsintownAppId
        if (!appId) throw new MissingCredentialError('BANDSINTOWN_APP_ID')
        return new BandsintownService({ appId })
      }
    }
  })

export const sourceLabels = (sources: readonly SourceOption[]): string[] =>
  sources.map((source) => SOURCE_OPTIONS[source])
