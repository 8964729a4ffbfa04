import http from 'http'
import https from 'https'
import got, { Got, HTTPError, Method, RequestError, Response } from 'got'
import { API_BASE_URL, UserAgent } from './const'
import { HttpStatusError, TransportError } from './error'
import { createLogHook, requestLogHook } from './hook'
import { logger } from './log'
import { channelSchema, gameSchema, parseData } from './schemas'
import { MemoryStore, Store } from './store'
import { TokenManager } from './TokenManager'
import type { Channel, ConfigurationOptions, Game, JsonBody, QueryParams } from './types'
import { normalizePath, toSearchParams } from './util'

interface SendOptions {
  params?: QueryParams
  json?: JsonBody
}

/**
 * Twitch Helix client authenticated with an app access token
 * @public
 */
export class TwitchClient {
  readonly clientId: string
  readonly store: Store
  readonly tokenManager: TokenManager
  readonly request: Got
  readonly #agent: { http: http.Agent; https: https.Agent }

  constructor(_options: ConfigurationOptions) {
    this.#valid(_options)
    this.clientId = _options.clientId
    this.store = _options.store ?? new MemoryStore()
    this.#agent = {
      http: new http.Agent({ keepAlive: true }),
      https: new https.Agent({ keepAlive: true })
    }
    this.tokenManager = new TokenManager({
      clientId: _options.clientId,
      clientSecret: _options.clientSecret,
      store: this.store,
      oauthUrl: _options.oauthUrl,
      agent: this.#agent
    })
    this.request = got.extend({
      prefixUrl: _options.apiBaseUrl ?? API_BASE_URL,
      agent: this.#agent,
      // FUTURE: handle rate limit (Ratelimit-Reset header) instead of surfacing 429
      retry: {
        limit: 0
      },
      headers: {
        'User-Agent': UserAgent,
        Accept: 'application/json'
      },
      hooks: {
        beforeRequest: [requestLogHook],
        afterResponse: [createLogHook({ logBody: true })]
      }
    })
  }

  #valid = (options: ConfigurationOptions) => {
    if (options.clientId && options.clientSecret) {
      return
    }
    logger.error('Missing Twitch client credentials')
    throw new Error('Please provide clientId and clientSecret !')
  }

  /**
   * Picks up a cached app access token or requests a new one. Call once at startup.
   */
  authorize() {
    return this.tokenManager.authorize()
  }

  /**
   * Releases pooled connections
   */
  async shutdown() {
    logger.info('Shutting down Twitch client')
    this.#agent.http.destroy()
    this.#agent.https.destroy()
  }

  /**
   * Makes an authenticated GET request to the Twitch API
   */
  get(path: string, params?: QueryParams): Promise<Response<string>> {
    return this.#send('GET', path, { params })
  }

  /**
   * Makes an authenticated POST request to the Twitch API
   */
  post(path: string, json?: JsonBody, params?: QueryParams): Promise<Response<string>> {
    return this.#send('POST', path, { json, params })
  }

  /**
   * Makes an authenticated DELETE request to the Twitch API
   */
  delete(path: string, params?: QueryParams): Promise<Response<string>> {
    return this.#send('DELETE', path, { params })
  }

  /**
   * Gets channel information for broadcasters, in the order the API returns them
   * @param broadcasterIds - at least one broadcaster id
   */
  async fetchChannels(broadcasterIds: ReadonlyArray<string | number>): Promise<Channel[]> {
    if (broadcasterIds.length === 0) {
      throw new RangeError('broadcasterIds must not be empty')
    }
    logger.debug({ ids: broadcasterIds }, `Fetching ${broadcasterIds.length} channels from API`)
    const response = await this.get('channels', { broadcaster_id: broadcasterIds })
    return parseData(channelSchema, response.body)
  }

  /**
   * Gets games by id
   * @param gameIds - at least one game id
   */
  async fetchGames(gameIds: ReadonlyArray<string | number>): Promise<Game[]> {
    if (gameIds.length === 0) {
      throw new RangeError('gameIds must not be empty')
    }
    logger.debug({ ids: gameIds }, `Fetching ${gameIds.length} games from API`)
    const response = await this.get('games', { id: gameIds })
    return parseData(gameSchema, response.body)
  }

  async #send(method: Method, path: string, options: SendOptions): Promise<Response<string>> {
    await this.tokenManager.ensureValid()

    const headers: Record<string, string> = {
      'Client-ID': this.clientId
    }
    const accessToken = this.tokenManager.accessToken
    if (accessToken) {
      headers.Authorization = `Bearer ${accessToken}`
    } else {
      logger.warn({ method, path }, 'No Twitch access token held, sending request without it')
    }
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    try {
      return await this.request(normalizePath(path), {
        method,
        headers,
        searchParams: toSearchParams(options.params),
        json: options.json
      })
    } catch (e) {
      if (e instanceof HTTPError) {
        const error = new HttpStatusError(
          e.response.statusCode,
          method,
          e.options.url.toString(),
          String(e.response.body)
        )
        logger.error({ status: error.statusCode, url: error.url }, `${method} request failed`)
        throw error
      }
      if (e instanceof RequestError) {
        const url = e.options.url.toString()
        logger.error(e, `Request to ${url} failed`)
        throw new TransportError(method, url, e)
      }
      throw e
    }
  }
}
