export * from './TwitchClient'
export * from './TokenManager'
export * from './store'
export * from './types'
export * from './error'
export * from './config'
export { logger, Logger } from './log'
export type { LoggerOptions, LogLevel, Fields } from './log'
export { ACCESS_TOKEN_KEY, API_BASE_URL, OAUTH_TOKEN_URL, TOKEN_EXPIRY_MARGIN } from './const'
