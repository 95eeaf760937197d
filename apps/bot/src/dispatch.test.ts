import { describe, expect, it, vi } from 'vitest';
import { createSerialQueue, type SerialQueue } from './dispatch';

// Resolves once every task queued before it has settled.
function drained(queue: SerialQueue): Promise<void> {
  return new Promise((resolve) => queue.enqueue(async () => resolve()));
}

describe('serial queue', () => {
  it('runs tasks one at a time in order', async () => {
    const log: string[] = [];
    const queue = createSerialQueue(() => undefined);
    const task = (name: string, ticks: number) => async () => {
      log.push(`start ${name}`);
      for (let i = 0; i < ticks; i += 1) await Promise.resolve();
      log.push(`end ${name}`);
    };

    queue.enqueue(task('a', 5));
    queue.enqueue(task('b', 0));
    await drained(queue);

    expect(log).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('reports a failed task and keeps going', async () => {
    const onError = vi.fn();
    const ran: string[] = [];
    const queue = createSerialQueue(onError);
    const failure = new Error('boom');

    queue.enqueue(async () => {
      throw failure;
    });
    queue.enqueue(async () => {
      ran.push('second');
    });
    await drained(queue);

    expect(onError).toHaveBeenCalledWith(failure);
    expect(ran).toEqual(['second']);
  });
});
