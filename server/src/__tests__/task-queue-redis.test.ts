import { describe, it, expect, vi, afterEach } from 'vitest';
import { queueKey, RedisTaskQueue } from '../lib/task-queue-redis.js';
import type { Task } from '../lib/task-queue.js';

// ─── Fake Redis (lists only) ──────────────────────────────────────────────────

function createFakeRedis() {
  const lists = new Map<string, string[]>();

  const connection = () => ({
    lpush: vi.fn(async (key: string, value: string) => {
      const list = lists.get(key) ?? [];
      list.unshift(value);
      lists.set(key, list);
      return list.length;
    }),
    brpop: vi.fn(async (key: string, _timeout: number): Promise<[string, string] | null> => {
      const value = lists.get(key)?.pop();
      if (value !== undefined) return [key, value];
      await new Promise((resolve) => setTimeout(resolve, 2));
      return null;
    }),
    quit: vi.fn(async () => 'OK'),
  });

  const primary = { ...connection(), duplicate: vi.fn(() => connection()) };
  return { redis: primary, lists };
}

function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const started = Date.now();
  return new Promise((resolve, reject) => {
    const tick = () => {
      if (predicate()) return resolve();
      if (Date.now() - started > timeoutMs) return reject(new Error('waitFor timed out'));
      setTimeout(tick, 2);
    };
    tick();
  });
}

describe('RedisTaskQueue', () => {
  let queue: RedisTaskQueue | null = null;

  afterEach(async () => {
    await queue?.close();
    queue = null;
  });

  it('LPUSHes a JSON task envelope onto the queue list', async () => {
    const { redis, lists } = createFakeRedis();
    queue = new RedisTaskQueue(redis as never, { blockSeconds: 0.01 });

    const task = await queue.enqueue('extraction', 'doc-1');

    expect(redis.lpush).toHaveBeenCalledWith('resume-ingest:queue:extraction', JSON.stringify(task));
    expect(lists.get(queueKey('extraction'))).toHaveLength(1);
  });

  it('delivers tasks to the handler in FIFO order', async () => {
    const { redis } = createFakeRedis();
    queue = new RedisTaskQueue(redis as never, { blockSeconds: 0.01 });
    const seen: string[] = [];

    await queue.enqueue('enrichment', 'doc-1');
    await queue.enqueue('enrichment', 'doc-2');
    queue.process('enrichment', async (task: Task) => {
      seen.push(task.subjectId);
    });

    await waitFor(() => seen.length === 2);
    expect(seen).toEqual(['doc-1', 'doc-2']);
    expect(redis.duplicate).toHaveBeenCalledTimes(1);
  });

  it('drops malformed entries and keeps consuming', async () => {
    const { redis, lists } = createFakeRedis();
    queue = new RedisTaskQueue(redis as never, { blockSeconds: 0.01 });
    lists.set(queueKey('matching'), ['not-json']);
    const seen: string[] = [];

    await queue.enqueue('matching', 'match-1');
    queue.process('matching', async (task: Task) => {
      seen.push(task.subjectId);
    });

    await waitFor(() => seen.length === 1);
    expect(seen).toEqual(['match-1']);
  });

  it('keeps consuming after a handler throws', async () => {
    const { redis } = createFakeRedis();
    queue = new RedisTaskQueue(redis as never, { blockSeconds: 0.01 });
    const seen: string[] = [];

    await queue.enqueue('extraction', 'bad');
    await queue.enqueue('extraction', 'good');
    queue.process('extraction', async (task: Task) => {
      if (task.subjectId === 'bad') throw new Error('boom');
      seen.push(task.subjectId);
    });

    await waitFor(() => seen.length === 1);
    expect(seen).toEqual(['good']);
  });

  it('stops workers and quits their connections on close', async () => {
    const { redis } = createFakeRedis();
    const closing = new RedisTaskQueue(redis as never, { blockSeconds: 0.01 });
    closing.process('extraction', async () => {}, { concurrency: 2 });

    await closing.close();

    const workers = redis.duplicate.mock.results.map((result) => result.value);
    expect(workers).toHaveLength(2);
    for (const worker of workers) expect(worker.quit).toHaveBeenCalledTimes(1);
    await expect(closing.enqueue('extraction', 'doc-1')).rejects.toThrow(
      'TaskQueue: cannot enqueue on closed queue extraction',
    );
  });

  it('accepts follow-up tasks pushed by a handler still running at close', async () => {
    const { redis, lists } = createFakeRedis();
    const closing = new RedisTaskQueue(redis as never, { blockSeconds: 0.01 });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let started = false;
    closing.process('extraction', async (task: Task) => {
      started = true;
      await gate;
      await closing.enqueue('enrichment', task.subjectId);
    });

    await closing.enqueue('extraction', 'doc-1');
    await waitFor(() => started);
    const done = closing.close();
    release();
    await done;

    const pushed = lists.get(queueKey('enrichment')) ?? [];
    expect(pushed).toHaveLength(1);
    expect(JSON.parse(pushed[0] ?? '{}')).toMatchObject({ queue: 'enrichment', subjectId: 'doc-1' });
  });
});
