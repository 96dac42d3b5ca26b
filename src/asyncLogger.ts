import logger from './logger';
import { loggingQueue } from './queues';

/**
 * Asynchronous logging helpers
 *
 * Message handling and command dispatch log through `enqueueLog`, which
 * hands the write to the single-slot `loggingQueue` so bursts of chat
 * traffic never wait on formatting or file IO. Drain `loggingQueue` before
 * closing the logger.
 *
 * @module asyncLogger
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Enqueue a log message to be written via the application's logger.
 * Messages are written in the order they were enqueued.
 */
export function enqueueLog(level: LogLevel, msg: string): void {
  loggingQueue.push(async () => {
    logger.log({ level, message: msg });
  });
}

/** Message of an unknown thrown value, for log lines. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
