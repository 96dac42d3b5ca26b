import { createQueue } from '../src/threads';

describe('queue', () => {
  test('runs every job and respects concurrency', async () => {
    const q = createQueue(2);
    const results: number[] = [];

    q.push(async () => {
      await new Promise(r => setTimeout(r, 10));
      results.push(1);
    });

    q.push(async () => {
      await new Promise(r => setTimeout(r, 5));
      results.push(2);
    });

    q.push(async () => {
      results.push(3);
    });

    expect(q.size()).toBe(3);
    await q.drain();
    expect(results.sort()).toEqual([1, 2, 3]);
    expect(q.active()).toBe(0);
  });

  test('a failing job does not stop the queue', async () => {
    const q = createQueue(1);
    const done: string[] = [];

    q.push(async () => {
      throw new Error('job failed');
    });
    q.push(async () => {
      done.push('second');
    });

    await q.drain();
    expect(done).toEqual(['second']);
  });

  test('single-slot queues keep order', async () => {
    const q = createQueue(1);
    const order: number[] = [];
    for (const n of [1, 2, 3]) {
      q.push(async () => {
        await new Promise(r => setTimeout(r, 4 - n));
        order.push(n);
      });
    }
    await q.drain();
    expect(order).toEqual([1, 2, 3]);
  });

  test('rejects a non-positive concurrency', () => {
    expect(() => createQueue(0)).toThrow(RangeError);
  });
});
