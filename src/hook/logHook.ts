import type { AfterResponseHook, BeforeRequestHook } from 'got'
import { logger } from '../log'

const MAX_LOGGED_BODY = 500
const REDACTED_PARAMS = ['client_secret']

export const redactUrl = (url: URL | string) => {
  const copy = new URL(url.toString())
  for (const name of REDACTED_PARAMS) {
    if (copy.searchParams.has(name)) {
      copy.searchParams.set(name, '***')
    }
  }
  return copy.toString()
}

export const requestLogHook: BeforeRequestHook = (options) => {
  logger.debug({ method: options.method, url: redactUrl(options.url) }, 'request')
}

/**
 * Logs status and timing of every response; the body only when `logBody` is set,
 * since token endpoint bodies carry the access token.
 */
export const createLogHook =
  ({ logBody }: { logBody: boolean }): AfterResponseHook =>
  (response) => {
    if (logger.isLevelEnabled('debug')) {
      const fields: Record<string, unknown> = {
        url: redactUrl(response.requestUrl),
        status: response.statusCode,
        elapsed: `${response.timings.phases.total ?? '?'}ms`
      }
      if (logBody) {
        const body = String(response.body)
        fields.body = body.length > MAX_LOGGED_BODY ? `${body.slice(0, MAX_LOGGED_BODY)}...` : body
      }
      logger.debug(fields, 'response')
    }
    return response
  }
