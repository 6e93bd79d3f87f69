import * as envalid from 'envalid'

/**
 * Validate and return the environment variables.
 * Source credentials are optional here, the CLI decides which ones it needs.
 */
export const env = envalid.cleanEnv(process.env, {
  TICKETMASTER_API_KEY: envalid.str({
    desc: 'The Ticketmaster Discovery API key',
    default: undefined,
  }),
  BANDSINTOWN_APP_ID: envalid.str({
    desc: 'The Bandsintown app id',
    default: undefined,
  }),
  DEBUG_LEVEL: envalid.str({
    desc: 'The debug level',
    choices: ['info', 'warn', 'error', 'debug', 'silent'],
    default: 'info',
  }),
  REQUEST_TIMEOUT: envalid.num({
    desc: 'Per request timeout in milliseconds',
    default: 20000,
  }),
  NODE_ENV: envalid.str({
    desc: 'The node environment',
    choices: ['development', 'production', 'test'],
    default: 'development',
  }),
})

export type EnvConfig = typeof env
