import type { Agent as HttpAgent } from 'http'
import type { Agent as HttpsAgent } from 'https'
import got, { Got, RequestError, Response } from 'got'
import { logger } from './log'
import { ACCESS_TOKEN_KEY, OAUTH_TOKEN_URL, TOKEN_EXPIRY_MARGIN, UserAgent } from './const'
import { AuthProviderError, TransportError } from './error'
import { tokenErrorSchema, tokenResponseSchema } from './schemas'
import { Store } from './store'
import type { TokenResult, TokenState } from './types'
import { createLogHook, requestLogHook } from './hook'

export interface TokenManagerOptions {
  clientId: string
  clientSecret: string
  store: Store
  oauthUrl?: string
  agent?: { http?: HttpAgent; https?: HttpsAgent }
}

/**
 * Keeps a client-credentials access token valid.
 *
 * The shared store is read once, by {@link TokenManager.authorize}; after that the
 * in-process expiry decides when the token endpoint is called again.
 * @public
 */
export class TokenManager {
  readonly authRequest: Got
  readonly #clientId: string
  readonly #clientSecret: string
  readonly #store: Store
  readonly #oauthUrl: string
  #state: TokenState = { kind: 'unset' }
  #refreshPromise: Promise<TokenResult> | null = null
  #consecutiveFailures = 0

  constructor(options: TokenManagerOptions) {
    this.#clientId = options.clientId
    this.#clientSecret = options.clientSecret
    this.#store = options.store
    this.#oauthUrl = options.oauthUrl ?? OAUTH_TOKEN_URL
    this.authRequest = got.extend({
      agent: options.agent,
      retry: {
        limit: 0
      },
      // error bodies are inspected, not thrown
      throwHttpErrors: false,
      headers: {
        'User-Agent': UserAgent,
        Accept: 'application/json'
      },
      hooks: {
        beforeRequest: [requestLogHook],
        afterResponse: [createLogHook({ logBody: false })]
      }
    })
  }

  get state(): TokenState {
    return this.#state
  }

  get accessToken(): string | undefined {
    return this.#state.kind === 'valid' ? this.#state.accessToken : undefined
  }

  /**
   * Token endpoint answers without a token since the last issued one
   */
  get consecutiveFailures(): number {
    return this.#consecutiveFailures
  }

  /**
   * Adopts the token cached in the shared store, or generates one when there is none.
   *
   * A cached token whose TTL the store cannot report is adopted as already expired:
   * the next {@link TokenManager.ensureValid} refreshes it, and it stays in use if that
   * refresh is rejected.
   */
  async authorize(): Promise<void> {
    logger.info('Authorizing Twitch API')

    const cached = await this.#readStore(() => this.#store.get(ACCESS_TOKEN_KEY))
    if (!cached) {
      logger.info('No cached access token found, generating new one')
      await this.#refresh()
      logger.info('Twitch API authorized')
      return
    }

    const ttl = await this.#readStore(() => this.#store.getTtl(ACCESS_TOKEN_KEY))
    if (ttl === undefined) {
      logger.warn('Cached access token has no TTL, it will be replaced on first use')
    }
    this.#state = {
      kind: 'valid',
      accessToken: cached,
      expiresAt: ttl === undefined ? 0 : Date.now() + (ttl - TOKEN_EXPIRY_MARGIN) * 1000
    }

    logger.info('Twitch API authorized')
  }

  /**
   * Runs the client-credentials exchange.
   *
   * A structured error from the token endpoint is logged and returned, leaving the
   * current state untouched. Transport failures throw {@link TransportError}.
   */
  async generateToken(): Promise<TokenResult> {
    logger.info('Generating new Twitch access token')

    let response: Response<string>
    try {
      response = await this.authRequest.post(this.#oauthUrl, {
        searchParams: {
          client_id: this.#clientId,
          client_secret: this.#clientSecret,
          grant_type: 'client_credentials'
        }
      })
    } catch (e) {
      if (e instanceof RequestError) {
        logger.error(e, 'Twitch access token request failed')
        throw new TransportError('POST', this.#oauthUrl, e)
      }
      throw e
    }

    const body = parseBody(response.body)
    const issued = tokenResponseSchema.safeParse(body)
    if (issued.success) {
      const { access_token: accessToken, expires_in: expiresIn } = issued.data
      this.#state = { kind: 'valid', accessToken, expiresAt: Date.now() + expiresIn * 1000 }
      this.#consecutiveFailures = 0
      await this.#writeStore(accessToken, expiresIn)
      logger.info({ expiresIn }, 'New Twitch access token generated')
      return { status: 'issued', accessToken, expiresIn }
    }

    const failure = tokenErrorSchema.safeParse(body)
    const error = new AuthProviderError(
      response.statusCode,
      failure.success ? failure.data.message : 'Unexpected token endpoint response'
    )
    this.#consecutiveFailures += 1
    logger.error(
      { status: response.statusCode, failures: this.#consecutiveFailures, reason: error.message },
      'Twitch access token request failed'
    )
    return { status: 'rejected', error }
  }

  /**
   * Refreshes the token when none is held or it has expired
   */
  async ensureValid(): Promise<void> {
    logger.debug('Ensuring Twitch access token is set and not expired')
    const state = this.#state
    if (state.kind === 'unset') {
      logger.debug('Twitch access token is not set')
      await this.#refresh()
      return
    }
    if (Date.now() > state.expiresAt) {
      logger.debug('Twitch access token expired')
      await this.#refresh()
      return
    }
    logger.debug('Twitch access token is set and not expired')
  }

  /**
   * Concurrent callers share one in-flight exchange
   */
  #refresh(): Promise<TokenResult> {
    if (!this.#refreshPromise) {
      this.#refreshPromise = this.generateToken().finally(() => {
        this.#refreshPromise = null
      })
    }
    return this.#refreshPromise
  }

  async #readStore<T>(read: () => T | Promise<T>): Promise<T | undefined> {
    try {
      return await read()
    } catch (e) {
      logger.warn({ error: e }, 'Token store unavailable, treating as cache miss')
      return undefined
    }
  }

  async #writeStore(accessToken: string, ttl: number) {
    try {
      await this.#store.set(ACCESS_TOKEN_KEY, accessToken, ttl)
    } catch (e) {
      logger.error({ error: e }, 'Could not write Twitch access token to store')
    }
  }
}

const parseBody = (body: string): unknown => {
  try {
    return JSON.parse(body)
  } catch {
    return null
  }
}
