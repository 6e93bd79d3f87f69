import { env } from '../config/env'
import { logger } from '../services/logger'
import { HttpError } from './errors'
import { parseJsonBody } from './json'

/**
 * GET a JSON document. One attempt, no retry.
 * @param url - The full request url, query included
 * @param timeout - Milliseconds before the request is aborted
 */
export const getJson = async (
  url: URL,
  timeout: number = env.REQUEST_TIMEOUT
): Promise<unknown> => {
  const target = `${url.origin}${url.pathname}`
  logger.debug(`GET ${target}`)

  const response = await fetch(url, {
    headers: { Accept: 'application/json' },
    signal: AbortSignal.timeout(timeout),
  })

  if (!response.ok) {
    throw new HttpError(response.status, response.statusText, target)
  }

  return parseJsonBody(await response.text(), target)
}
