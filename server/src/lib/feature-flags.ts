export function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

/**
 * FF_REDIS_QUEUE: replace the in-process task queue with Redis lists.
 *
 * Requires REDIS_URL to be set. Default: false (in-process worker pool is used).
 * Pipeline jobs are pushed with LPUSH and consumed with BRPOP, so several
 * server instances can share one set of queues.
 */
export const FF_REDIS_QUEUE = envBool('FF_REDIS_QUEUE', false);
