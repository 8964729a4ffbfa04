import type { ZodIssue } from 'zod'

/**
 * Base class of every error raised or reported by the client
 * @public
 */
export class TwitchApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * The request never got a response: DNS, connection or timeout failure.
 * @public
 */
export class TransportError extends TwitchApiError {
  constructor(
    readonly method: string,
    readonly url: string,
    cause: unknown
  ) {
    super(`${method} ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    })
  }
}

/**
 * Helix answered with a status outside 2xx/3xx.
 * @public
 */
export class HttpStatusError extends TwitchApiError {
  constructor(
    readonly statusCode: number,
    readonly method: string,
    readonly url: string,
    readonly body: string
  ) {
    super(`${method} ${url} failed with status ${statusCode}`)
  }
}

/**
 * The token endpoint answered without an access token.
 * Reported through {@link TokenResult}, never thrown.
 * @public
 */
export class AuthProviderError extends TwitchApiError {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message)
  }
}

/**
 * @public
 */
export class ParseError extends TwitchApiError {
  constructor(
    message: string,
    readonly issues: ZodIssue[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

/**
 * @public
 */
export class ConfigError extends TwitchApiError {}
