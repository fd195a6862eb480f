import { Redis } from 'ioredis';
import logger from './logger.js';

/**
 * Creates the Redis connection used by the job queue.
 *
 * BRPOP holds the connection while it blocks, so the API and the worker each
 * own a dedicated client rather than sharing one.
 */
export function createRedisClient(redisUrl: string): Redis {
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    connectTimeout: 3000,
    lazyConnect: true,
  });

  client.on('error', (err: Error) => {
    logger.warn({ err: err.message }, 'Redis connection error');
  });

  return client;
}

/**
 * Gracefully closes a Redis connection. Safe to call on a client that never connected.
 */
export async function shutdownRedis(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Redis quit failed; disconnecting');
    client.disconnect();
  }
}
