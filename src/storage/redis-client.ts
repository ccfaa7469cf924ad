// Redis client factory with lazy connect and retry strategy

import { Redis } from 'ioredis';
import type { Logger } from 'pino';

export interface RedisConnection {
  host: string;
  port: number;
  password?: string;
  username?: string;
  db?: number;
}

/**
 * Create a Redis client instance with lazy connect and retry strategy.
 *
 * The client connects on its first command. Reconnect backoff is capped at
 * 2 seconds; each command is attempted at most 3 times across reconnects.
 */
export function createRedisClient(config: RedisConnection, logger: Logger): Redis {
  const client = new Redis({
    host: config.host,
    port: config.port,
    ...(config.password && { password: config.password }),
    ...(config.username && { username: config.username }),
    ...(config.db !== undefined && { db: config.db }),
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    retryStrategy(times: number): number {
      return Math.min(times * 200, 2000);
    },
  });

  client.on('connect', () => {
    logger.info({ host: config.host, port: config.port }, 'Redis connected');
  });

  client.on('error', (err: Error) => {
    logger.error({ err: err.message }, 'Redis connection error');
  });

  client.on('close', () => {
    logger.info('Redis connection closed');
  });

  return client;
}

/**
 * Gracefully disconnect a Redis client. A lazy client that never connected
 * is dropped without sending QUIT, which would open a connection first.
 */
export async function disconnectRedis(redis: Redis): Promise<void> {
  if (redis.status === 'wait' || redis.status === 'end') {
    redis.disconnect();
    return;
  }
  await redis.quit();
}
