import { z } from 'zod'
import { ConfigError } from './error'
import type { LogLevel } from './log'
import type { ConfigurationOptions } from './types'

const logLevelSchema = z
  .string()
  .transform((level) => level.toLowerCase())
  .pipe(z.enum(['debug', 'info', 'notice', 'warn', 'error']))

const envSchema = z.object({
  TWITCH_CLIENT_ID: z.string().min(1, 'is required'),
  TWITCH_CLIENT_SECRET: z.string().min(1, 'is required'),
  TWITCH_API_BASE_URL: z.string().url().optional(),
  TWITCH_OAUTH_URL: z.string().url().optional(),
  LOG_LEVEL: logLevelSchema.optional()
})

export interface EnvConfiguration extends ConfigurationOptions {
  logLevel?: LogLevel
}

/**
 * Reads client credentials and endpoints from the environment
 * @public
 */
export const optionsFromEnv = (env: NodeJS.ProcessEnv = process.env): EnvConfiguration => {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const name = issue.path.join('.')
      return issue.code === 'invalid_type' && issue.received === 'undefined'
        ? `${name} is required`
        : `${name} ${issue.message}`
    })
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`)
  }
  const config = parsed.data
  return {
    clientId: config.TWITCH_CLIENT_ID,
    clientSecret: config.TWITCH_CLIENT_SECRET,
    apiBaseUrl: config.TWITCH_API_BASE_URL,
    oauthUrl: config.TWITCH_OAUTH_URL,
    logLevel: config.LOG_LEVEL
  }
}
