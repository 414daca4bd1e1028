import { Redis } from 'ioredis';
import logger from './logger.js';

let shared: Redis | null = null;

/**
 * Process-wide producer connection for the Redis task queue. Worker slots
 * duplicate it for their blocking pops. Null when no URL is configured.
 */
export function getRedisClient(redisUrl: string | null): Redis | null {
  if (shared) return shared;
  if (!redisUrl) return null;

  const client = new Redis(redisUrl, {
    connectionName: 'resume-ingest',
    lazyConnect: true,
    connectTimeout: 3_000,
    maxRetriesPerRequest: 1,
  });
  client.on('error', (err: Error) => {
    logger.warn({ error: err.message }, 'Redis: connection error');
  });
  shared = client;
  return shared;
}

export async function shutdownRedis(): Promise<void> {
  const client = shared;
  if (!client) return;
  shared = null;
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Redis: quit failed');
  }
}
