/**
 * Thrown before any network call when an enabled source has no credential.
 */
export class MissingCredentialError extends Error {
  constructor(public readonly variable: string) {
    super(`set ${variable} in your environment.`)
    this.name = 'MissingCredentialError'
  }
}

/**
 * A non-2xx upstream response. The url carries no query string so that
 * api keys stay out of the logs.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string
  ) {
    super(`${status} ${statusText} for ${url}`)
    this.name = 'HttpError'
  }
}

export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e)
