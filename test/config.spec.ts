import { expect } from 'chai'
import { ConfigError, optionsFromEnv } from '../src'

describe('optionsFromEnv', () => {
  it('should read credentials from the environment', () => {
    const options = optionsFromEnv({
      TWITCH_CLIENT_ID: 'test-client-id',
      TWITCH_CLIENT_SECRET: 'test-secret'
    })
    expect(options).to.deep.equal({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      apiBaseUrl: undefined,
      oauthUrl: undefined,
      logLevel: undefined
    })
  })

  it('should read endpoints and a case-insensitive log level', () => {
    const options = optionsFromEnv({
      TWITCH_CLIENT_ID: 'test-client-id',
      TWITCH_CLIENT_SECRET: 'test-secret',
      TWITCH_API_BASE_URL: 'http://localhost:8080/mock/',
      TWITCH_OAUTH_URL: 'http://localhost:8080/auth/token',
      LOG_LEVEL: 'INFO'
    })
    expect(options.apiBaseUrl).to.equal('http://localhost:8080/mock/')
    expect(options.oauthUrl).to.equal('http://localhost:8080/auth/token')
    expect(options.logLevel).to.equal('info')
  })

  it('should name every missing variable', () => {
    expect(() => optionsFromEnv({})).to.throw(
      ConfigError,
      'Invalid configuration: TWITCH_CLIENT_ID is required; TWITCH_CLIENT_SECRET is required'
    )
  })

  it('should reject an unknown log level', () => {
    expect(() =>
      optionsFromEnv({
        TWITCH_CLIENT_ID: 'test-client-id',
        TWITCH_CLIENT_SECRET: 'test-secret',
        LOG_LEVEL: 'verbose'
      })
    ).to.throw(ConfigError, /^Invalid configuration: LOG_LEVEL /)
  })
})
