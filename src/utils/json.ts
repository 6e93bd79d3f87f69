import { logger } from '../services/logger'

/**
 * Parse a JSON response body.
 *
 * @param content - The raw response text
 * @param context - Where the body came from, for logging
 * @returns The parsed JSON data, still untyped
 * @throws SyntaxError if parsing fails
 */
export const parseJsonBody = (content: string, context: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(content)
    return parsed
  } catch (e) {
    logger.error(`Failed to parse JSON response from ${context}`)
    logger.debug('Raw content:', { content: content.slice(0, 500) })
    throw e
  }
}
