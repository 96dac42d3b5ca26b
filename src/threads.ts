import logger from './logger';

/**
 * Small in-process task queue with bounded concurrency.
 *
 * @module threads
 */

export type Job = () => Promise<void>;

export interface AsyncQueue {
  /** Enqueue a job; it starts on a later tick. */
  push(job: Job): void;
  /** Jobs waiting to start (running ones are not counted). */
  size(): number;
  /** Number of jobs currently running. */
  active(): number;
  /** Resolves once nothing is queued or running. */
  drain(): Promise<void>;
}

/**
 * Create a queue running at most `concurrency` jobs at once, in FIFO
 * order. A job that rejects is logged and does not stop the queue.
 */
export function createQueue(concurrency = 1): AsyncQueue {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`queue concurrency must be a positive integer (got ${concurrency})`);
  }
  const queue: Job[] = [];
  let running = 0;
  let idleResolvers: Array<() => void> = [];

  function checkIdle(): void {
    if (running === 0 && queue.length === 0) {
      const resolvers = idleResolvers;
      idleResolvers = [];
      for (const r of resolvers) r();
    }
  }

  async function runNext(): Promise<void> {
    if (running >= concurrency) return;
    const job = queue.shift();
    if (!job) return;
    running++;
    try {
      await job();
    } catch (e) {
      logger.warn('Queue job failed: ' + (e instanceof Error ? e.message : String(e)));
    } finally {
      running--;
      process.nextTick(() => {
        void runNext();
        checkIdle();
      });
    }
  }

  return {
    push(job: Job) {
      queue.push(job);
      process.nextTick(() => void runNext());
    },

    size() {
      return queue.length;
    },

    active() {
      return running;
    },

    async drain() {
      if (running === 0 && queue.length === 0) return;
      return new Promise<void>(resolve => {
        idleResolvers.push(resolve);
      });
    },
  };
}
