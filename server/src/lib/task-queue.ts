/**
 * Task Queue: named work queues feeding the pipeline workers.
 *
 * Every task names one record (a document or a match job); handlers load the
 * record themselves, so a task never carries state that could go stale.
 * This in-process implementation runs handlers on a bounded pool per queue.
 * The Redis implementation in task-queue-redis.ts is a drop-in replacement.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import logger from './logger.js';

export const QUEUE_NAMES = ['extraction', 'enrichment', 'matching'] as const;

export type QueueName = (typeof QUEUE_NAMES)[number];

export const TaskSchema = z.object({
  id: z.string(),
  queue: z.enum(QUEUE_NAMES),
  subjectId: z.string(),
  enqueuedAt: z.string(),
});

export type Task = z.infer<typeof TaskSchema>;

export type TaskHandler = (task: Task) => Promise<void>;

export interface ProcessOptions {
  concurrency?: number;
}

export interface TaskQueue {
  readonly name: string;
  /** Schedules one task; rejects when the task could not be accepted. */
  enqueue(queue: QueueName, subjectId: string): Promise<Task>;
  process(queue: QueueName, handler: TaskHandler, options?: ProcessOptions): void;
  /**
   * Waits for in-flight handlers to finish, accepting the follow-up tasks
   * they schedule, then refuses further work.
   */
  close(): Promise<void>;
}

export function createTask(queue: QueueName, subjectId: string): Task {
  return { id: randomUUID(), queue, subjectId, enqueuedAt: new Date().toISOString() };
}

// ─── In-process implementation ───────────────────────────────────────

class Lane {
  private pending: Task[] = [];
  private handler: TaskHandler | null = null;
  private concurrency = 1;
  private active = 0;

  constructor(
    private readonly queue: QueueName,
    private readonly onSettled: () => void,
  ) {}

  attach(handler: TaskHandler, concurrency: number): void {
    if (this.handler) {
      throw new Error(`TaskQueue: queue ${this.queue} already has a handler`);
    }
    this.handler = handler;
    this.concurrency = Math.max(1, concurrency);
    this.pump();
  }

  push(task: Task): void {
    this.pending.push(task);
    this.pump();
  }

  get idle(): boolean {
    return this.active === 0 && (this.pending.length === 0 || this.handler === null);
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler) return;
    while (this.active < this.concurrency && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) break;
      this.active += 1;
      void this.execute(handler, task);
    }
  }

  private async execute(handler: TaskHandler, task: Task): Promise<void> {
    try {
      await handler(task);
    } catch (err) {
      logger.error(
        { queue: this.queue, taskId: task.id, subjectId: task.subjectId, error: err instanceof Error ? err.message : String(err) },
        'TaskQueue: handler failed',
      );
    } finally {
      this.active -= 1;
      this.pump();
      this.onSettled();
    }
  }
}

export class InProcessTaskQueue implements TaskQueue {
  readonly name = 'in-process';
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private lanes: Record<QueueName, Lane>;

  constructor() {
    const settle = () => this.notifyIfIdle();
    this.lanes = {
      extraction: new Lane('extraction', settle),
      enrichment: new Lane('enrichment', settle),
      matching: new Lane('matching', settle),
    };
  }

  async enqueue(queue: QueueName, subjectId: string): Promise<Task> {
    if (this.closed) {
      throw new Error(`TaskQueue: cannot enqueue on closed queue ${queue}`);
    }
    const task = createTask(queue, subjectId);
    this.lanes[queue].push(task);
    return task;
  }

  process(queue: QueueName, handler: TaskHandler, options: ProcessOptions = {}): void {
    this.lanes[queue].attach(handler, options.concurrency ?? 1);
  }

  /**
   * Resolves once every queue with a handler has drained, including work
   * that handlers scheduled onto other queues while running.
   */
  onIdle(): Promise<void> {
    if (this.allIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    await this.onIdle();
    this.closed = true;
  }

  private allIdle(): boolean {
    return QUEUE_NAMES.every((queue) => this.lanes[queue].idle);
  }

  private notifyIfIdle(): void {
    if (!this.allIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
