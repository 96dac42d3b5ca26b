import { createQueue } from './threads';

/**
 * Application queues (see `createQueue`).
 *
 * @module queues
 */

/** Log writes, one at a time so lines keep their order. */
export const loggingQueue = createQueue(1);

/**
 * Incoming chat commands. Several may be in flight (name lookups and
 * database calls overlap); each job handles one message end to end.
 */
export const commandQueue = createQueue(4);
