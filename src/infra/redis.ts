import IORedis from 'ioredis'
import type { Logger } from '../utils/logger.js'

export type RedisClient = IORedis

/**
 * Creates the shared client used by the ledger, the job store and the sent
 * recorder. Commands fail fast while disconnected instead of queueing.
 */
export function createRedisClient(url: string, logger: Logger): RedisClient {
  const client = new IORedis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    connectTimeout: 2000,
    commandTimeout: 2000,
    retryStrategy: (times: number) => Math.min(times * 500, 5000)
  })
  client.on('error', (err: Error) => {
    logger.warn({ err: err.message }, 'Redis connection error')
  })
  client.on('ready', () => {
    logger.info('Redis connection ready')
  })
  return client
}

export async function closeRedisClient(client: RedisClient, logger: Logger): Promise<void> {
  try {
    await client.quit()
  } catch (err) {
    logger.warn({ err }, 'Error during Redis connection cleanup')
  }
}
