import { Logger } from '@nestjs/common';
import Redis from 'ioredis';

const logger = new Logger('Redis');

let client: Redis | undefined;

/**
 * Creates a connection with the options BullMQ needs
 * (`maxRetriesPerRequest: null`) and lifecycle logging.
 */
export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    retryStrategy: (times) => {
      if (times > 3) {
        logger.error('Redis connection failed after 3 attempts.');
        return null;
      }
      return 2000; // retry after 2 seconds
    },
    maxRetriesPerRequest: null,
    enableOfflineQueue: true,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  // an unhandled 'error' event would crash the process
  redis.on('error', (err: Error) => {
    logger.error(`Redis connection error: ${err.message}`);
  });
  redis.on('ready', () => {
    logger.log('Redis is ready to accept commands');
  });
  redis.on('close', () => {
    logger.log('Redis connection closed');
  });

  return redis;
}

/**
 * Process-wide shared connection, opened on first use.
 */
export function getRedis(url: string): Redis {
  if (!client) {
    client = createRedisClient(url);
  }
  return client;
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const current = client;
  client = undefined;
  if (current.status === 'wait' || current.status === 'end') {
    current.disconnect();
    return;
  }
  await current.quit();
}
