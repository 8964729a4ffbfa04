import 'dotenv/config'
import { FileTokenStore, TwitchClient, logger, optionsFromEnv } from '../src/index'

;(async () => {
  const { logLevel, ...options } = optionsFromEnv()
  logger.configure({
    level: logLevel ?? 'debug',
    fileOutput: true
  })
  const client = new TwitchClient({
    ...options,
    store: new FileTokenStore('.token/twitch.json')
  })
  try {
    await client.authorize()
    const broadcasterIds = (process.env.TWITCH_BROADCASTER_IDS ?? '141981764').split(',')
    const channels = await client.fetchChannels(broadcasterIds)
    console.log(channels)
    const gameIds = channels.map((channel) => channel.game_id).filter((id) => id)
    if (gameIds.length > 0) {
      console.log(await client.fetchGames(gameIds))
    }
  } catch (e) {
    console.error(e)
  } finally {
    await client.shutdown()
    logger.close()
  }
})()
