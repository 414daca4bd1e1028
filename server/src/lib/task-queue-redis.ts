/**
 * Task Queue (Redis lists), used when FF_REDIS_QUEUE=true and REDIS_URL is set.
 *
 * Design:
 *   - One list per queue: `resume-ingest:queue:{name}`
 *   - Producers LPUSH a JSON task envelope
 *   - Each worker slot owns a duplicated connection and BRPOPs with a short
 *     block timeout, so close() is noticed within one timeout
 *   - Delivery is at-most-once: a task popped by a worker that then crashes is
 *     lost, and the document stays in its in-flight status
 */

import type { Redis } from 'ioredis';
import logger from './logger.js';
import {
  createTask,
  TaskSchema,
  type ProcessOptions,
  type QueueName,
  type Task,
  type TaskHandler,
  type TaskQueue,
} from './task-queue.js';

export const QUEUE_KEY_PREFIX = 'resume-ingest:queue:';

export function queueKey(queue: QueueName): string {
  return `${QUEUE_KEY_PREFIX}${queue}`;
}

export interface RedisTaskQueueOptions {
  /** BRPOP block timeout in seconds. */
  blockSeconds?: number;
}

export class RedisTaskQueue implements TaskQueue {
  readonly name = 'redis';
  private stopping = false;
  private closed = false;
  private workers: Array<{ connection: Redis; loop: Promise<void> }> = [];
  private readonly blockSeconds: number;

  constructor(
    private readonly redis: Redis,
    options: RedisTaskQueueOptions = {},
  ) {
    this.blockSeconds = options.blockSeconds ?? 1;
  }

  async enqueue(queue: QueueName, subjectId: string): Promise<Task> {
    if (this.closed) {
      throw new Error(`TaskQueue: cannot enqueue on closed queue ${queue}`);
    }
    const task = createTask(queue, subjectId);
    await this.redis.lpush(queueKey(queue), JSON.stringify(task));
    return task;
  }

  process(queue: QueueName, handler: TaskHandler, options: ProcessOptions = {}): void {
    const concurrency = Math.max(1, options.concurrency ?? 1);
    for (let slot = 0; slot < concurrency; slot++) {
      const connection = this.redis.duplicate();
      const loop = this.consume(queue, handler, connection, slot);
      this.workers.push({ connection, loop });
    }
    logger.info({ queue, concurrency }, 'TaskQueue: redis workers started');
  }

  /** Handlers still running may push follow-up tasks until their loops end. */
  async close(): Promise<void> {
    this.stopping = true;
    const workers = this.workers;
    this.workers = [];
    await Promise.all(workers.map((worker) => worker.loop));
    this.closed = true;
    await Promise.all(
      workers.map((worker) =>
        worker.connection.quit().catch((err: unknown) => {
          logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'TaskQueue: worker quit failed');
        }),
      ),
    );
  }

  private async consume(queue: QueueName, handler: TaskHandler, connection: Redis, slot: number): Promise<void> {
    const key = queueKey(queue);
    while (!this.stopping) {
      let popped: [string, string] | null;
      try {
        popped = await connection.brpop(key, this.blockSeconds);
      } catch (err) {
        if (this.stopping) break;
        logger.warn(
          { queue, slot, error: err instanceof Error ? err.message : String(err) },
          'TaskQueue: BRPOP failed',
        );
        await new Promise((resolve) => setTimeout(resolve, this.blockSeconds * 1000));
        continue;
      }
      if (!popped) continue;

      const task = this.decode(queue, popped[1]);
      if (!task) continue;

      try {
        await handler(task);
      } catch (err) {
        logger.error(
          { queue, taskId: task.id, subjectId: task.subjectId, error: err instanceof Error ? err.message : String(err) },
          'TaskQueue: handler failed',
        );
      }
    }
  }

  private decode(queue: QueueName, raw: string): Task | null {
    let candidate: unknown;
    try {
      candidate = JSON.parse(raw);
    } catch {
      logger.error({ queue, raw: raw.slice(0, 200) }, 'TaskQueue: dropping non-JSON task');
      return null;
    }
    const parsed = TaskSchema.safeParse(candidate);
    if (!parsed.success || parsed.data.queue !== queue) {
      logger.error({ queue, raw: raw.slice(0, 200) }, 'TaskQueue: dropping malformed task');
      return null;
    }
    return parsed.data;
  }
}
