import type { z } from 'zod'
import type { Store } from './store'
import type { AuthProviderError } from './error'
import type { channelSchema, gameSchema } from './schemas'

/**
 * Helix channel information record
 * @public
 */
export type Channel = z.infer<typeof channelSchema>

/**
 * Helix game record
 * @public
 */
export type Game = z.infer<typeof gameSchema>

/**
 * In-process token state. `expiresAt` is epoch milliseconds.
 * @public
 */
export type TokenState =
  | { kind: 'unset' }
  | {
      kind: 'valid'
      accessToken: string
      expiresAt: number
    }

/**
 * Outcome of a client-credentials exchange that reached the token endpoint
 * @public
 */
export type TokenResult =
  | {
      status: 'issued'
      accessToken: string
      /**
       * token lifetime in seconds
       */
      expiresIn: number
    }
  | {
      status: 'rejected'
      error: AuthProviderError
    }

export type QueryValue = string | number | boolean
export type QueryParams = Record<string, QueryValue | readonly QueryValue[] | undefined>
export type JsonBody = Record<string, unknown>

/**
 * @public
 */
export interface ConfigurationOptions {
  clientId: string
  clientSecret: string
  /**
   * Shared cache holding the app access token. Defaults to a {@link MemoryStore}.
   */
  store?: Store
  apiBaseUrl?: string
  oauthUrl?: string
}
