export const API_BASE_URL = 'https://api.twitch.tv/helix/'
export const OAUTH_TOKEN_URL = 'https://id.twitch.tv/oauth2/token'

export const ACCESS_TOKEN_KEY = 'twitch:access_token'

/**
 * Seconds taken off a cached token's TTL before trusting it
 */
export const TOKEN_EXPIRY_MARGIN = 5

export const UserAgent = 'twitch-app-client (+https://dev.twitch.tv/docs/api)'
