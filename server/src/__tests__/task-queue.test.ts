import { describe, it, expect, vi } from 'vitest';
import { InProcessTaskQueue, type Task } from '../lib/task-queue.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('InProcessTaskQueue', () => {
  it('runs tasks in FIFO order with concurrency 1', async () => {
    const queue = new InProcessTaskQueue();
    const seen: string[] = [];
    queue.process('extraction', async (task) => {
      seen.push(task.subjectId);
    });

    await queue.enqueue('extraction', 'a');
    await queue.enqueue('extraction', 'b');
    await queue.enqueue('extraction', 'c');
    await queue.onIdle();

    expect(seen).toEqual(['a', 'b', 'c']);
  });

  it('returns the task it scheduled', async () => {
    const queue = new InProcessTaskQueue();
    const task = await queue.enqueue('matching', 'match-1');
    expect(task.queue).toBe('matching');
    expect(task.subjectId).toBe('match-1');
    expect(typeof task.id).toBe('string');
  });

  it('holds tasks until a handler is attached', async () => {
    const queue = new InProcessTaskQueue();
    await queue.enqueue('enrichment', 'doc-1');
    const handler = vi.fn(async (_task: Task) => {});
    queue.process('enrichment', handler);
    await queue.onIdle();
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('never runs more handlers than the concurrency limit', async () => {
    const queue = new InProcessTaskQueue();
    const gate = deferred();
    let active = 0;
    let peak = 0;
    queue.process(
      'extraction',
      async () => {
        active += 1;
        peak = Math.max(peak, active);
        await gate.promise;
        active -= 1;
      },
      { concurrency: 2 },
    );

    for (const id of ['a', 'b', 'c', 'd', 'e']) await queue.enqueue('extraction', id);
    gate.resolve();
    await queue.onIdle();

    expect(peak).toBe(2);
  });

  it('keeps processing after a handler throws', async () => {
    const queue = new InProcessTaskQueue();
    const seen: string[] = [];
    queue.process('extraction', async (task) => {
      if (task.subjectId === 'bad') throw new Error('boom');
      seen.push(task.subjectId);
    });

    await queue.enqueue('extraction', 'bad');
    await queue.enqueue('extraction', 'good');
    await queue.onIdle();

    expect(seen).toEqual(['good']);
  });

  it('waits for work that handlers schedule onto other queues', async () => {
    const queue = new InProcessTaskQueue();
    const seen: string[] = [];
    queue.process('extraction', async (task) => {
      seen.push(`extract:${task.subjectId}`);
      await queue.enqueue('enrichment', task.subjectId);
    });
    queue.process('enrichment', async (task) => {
      seen.push(`enrich:${task.subjectId}`);
    });

    await queue.enqueue('extraction', 'doc-1');
    await queue.onIdle();

    expect(seen).toEqual(['extract:doc-1', 'enrich:doc-1']);
  });

  it('rejects new work once closed', async () => {
    const queue = new InProcessTaskQueue();
    await queue.close();
    await expect(queue.enqueue('extraction', 'doc-1')).rejects.toThrow(
      'TaskQueue: cannot enqueue on closed queue extraction',
    );
  });

  it('accepts follow-up work that a running handler schedules while closing', async () => {
    const queue = new InProcessTaskQueue();
    const gate = deferred();
    const seen: string[] = [];
    queue.process('extraction', async (task) => {
      await gate.promise;
      await queue.enqueue('enrichment', task.subjectId);
    });
    queue.process('enrichment', async (task) => {
      seen.push(task.subjectId);
    });

    await queue.enqueue('extraction', 'doc-1');
    const closing = queue.close();
    gate.resolve();
    await closing;

    expect(seen).toEqual(['doc-1']);
    await expect(queue.enqueue('extraction', 'doc-2')).rejects.toThrow(
      'TaskQueue: cannot enqueue on closed queue extraction',
    );
  });

  it('refuses a second handler for the same queue', () => {
    const queue = new InProcessTaskQueue();
    queue.process('matching', async () => {});
    expect(() => queue.process('matching', async () => {})).toThrow(
      'TaskQueue: queue matching already has a handler',
    );
  });
});
