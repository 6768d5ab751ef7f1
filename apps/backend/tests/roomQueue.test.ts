import { describe, it, expect } from 'vitest';
import { RoomQueue } from '../src/sync/roomQueue.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('RoomQueue', () => {
  it('runs tasks for one room in submission order', async () => {
    const queue = new RoomQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run('ops', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = queue.run('ops', () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('does not make other rooms wait', async () => {
    const queue = new RoomQueue();
    const gate = deferred();
    const order: string[] = [];

    const blocked = queue.run('ops', async () => {
      await gate.promise;
      order.push('ops');
    });
    await queue.run('map', () => {
      order.push('map');
    });

    expect(order).toEqual(['map']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['map', 'ops']);
  });

  it('keeps going after a task fails', async () => {
    const queue = new RoomQueue();
    const failed = queue.run('ops', () => {
      throw new Error('boom');
    });
    await expect(failed).rejects.toThrow('boom');
    await expect(queue.run('ops', () => 42)).resolves.toBe(42);
  });
});
