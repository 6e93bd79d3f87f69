import { Command, CommanderError, Option } from 'commander'
import type { DateTime } from 'luxon'
import { ZodError } from 'zod'
import { env } from './config'
import { DEFAULT_CSV_PATH, DEFAULT_MAX_PAGES, SOURCE_OPTION_NAMES } from './const'
import {
  collectEvents,
  createFetchers,
  initLog,
  logger,
  printEvents,
  resolveSources,
  sourceLabels,
  writeEventsCsv,
} from './services'
import type { Credentials, EventFetcher } from './types'
import {
  cliOptionsSchema,
  MissingCredentialError,
  resolveDateWindow,
  type CliOptions,
} from './utils'

export const buildProgram = (): Command =>
  new Command()
    .name('club-nights')
    .description(
      'Find club nights featuring specific DJs on Ticketmaster and Bandsintown.'
    )
    .requiredOption(
      '--artists <names...>',
      "Artist names (e.g. 'Bontan' 'Eats Everything' 'Joshua Butler')"
    )
    .option('--from <date>', 'Start date YYYY-MM-DD (default: today)')
    .option('--to <date>', 'End date YYYY-MM-DD (default: +90 days)')
    .option('--country <code>', 'ISO country code (e.g. US, GB), Ticketmaster only')
    .option('--city <name>', "City name (e.g. 'Los Angeles'), Ticketmaster only")
    .option('--csv <path>', 'Output CSV filename', DEFAULT_CSV_PATH)
    .option(
      '--no-club-filter',
      'Disable nightclub heuristic filter (show all venues)'
    )
    .option(
      '--max-pages <n>',
      'Max Ticketmaster pages per artist',
      String(DEFAULT_MAX_PAGES)
    )
    .addOption(
      new Option('--sources <names...>', 'Event sources to query')
        .choices(SOURCE_OPTION_NAMES)
        .default(['ticketmaster'])
    )
    .option(
      '--include-ticketmaster',
      'Add Ticketmaster to the enabled sources'
    )
    .exitOverride()

/**
 * Parse and validate command line arguments (without node and script path)
 * @throws CommanderError on usage errors, ZodError on invalid values
 */
export const parseCliOptions = (argv: readonly string[]): CliOptions => {
  const program = buildProgram()
  program.parse([...argv], { from: 'user' })
  return cliOptionsSchema.parse(program.opts())
}

const describeIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    .join('; ')

/**
 * Run the finder.
 * @returns the process exit code
 */
export const main = async (
  argv: readonly string[],
  credentials: Credentials = {
    ticketmasterApiKey: env.TICKETMASTER_API_KEY,
    bandsintownAppId: env.BANDSINTOWN_APP_ID,
  },
  now?: DateTime
): Promise<number> => {
  let options: CliOptions
  try {
    options = parseCliOptions(argv)
  } catch (e: unknown) {
    // commander has already printed usage or help
    if (e instanceof CommanderError) return e.exitCode
    if (e instanceof ZodError) {
      logger.error(`Invalid options: ${describeIssues(e)}`)
      return 1
    }
    throw e
  }

  const sources = resolveSources(options.sources, options.includeTicketmaster)

  let fetchers: EventFetcher[]
  try {
    fetchers = createFetchers(sources, credentials, {
      maxPages: options.maxPages,
    })
  } catch (e: unknown) {
    if (e instanceof MissingCredentialError) {
      logger.error(`ERROR: ${e.message}`)
      return 1
    }
    throw e
  }

  const window = resolveDateWindow({ from: options.from, to: options.to }, now)
  initLog(sourceLabels(sources), window.from, window.to)

  const events = await collectEvents(
    fetchers,
    options.artists,
    { window, country: options.country, city: options.city },
    { clubFilter: options.clubFilter }
  )

  await writeEventsCsv(options.csv, events)
  printEvents(options.csv, events)
  return 0
}
