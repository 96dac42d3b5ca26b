/**
 * Sliding-window rate limiter
 *
 * Counts accepted messages per sender and globally over the last
 * `windowSeconds`. A message that would go over either budget is refused
 * and not counted.
 *
 * @module rateLimiter
 */

export interface RateLimitConfig {
  perSenderPerWindow: number;
  globalPerWindow: number;
  windowSeconds: number;
}

export type RateLimitResult = { limited: false } | { limited: true; reason: 'global' | 'sender' };

export interface RateLimiter {
  check(senderId: string): RateLimitResult;
  /** Senders with messages still inside the window. */
  trackedSenders(): number;
}

function prune(arr: number[], cutoff: number): void {
  while (arr.length && arr[0] <= cutoff) arr.shift();
}

/**
 * @param now - Clock in milliseconds; injectable for tests.
 */
export function createRateLimiter(cfg: RateLimitConfig, now: () => number = Date.now): RateLimiter {
  const senderTimestamps = new Map<string, number[]>();
  const globalTimestamps: number[] = [];
  const windowMs = cfg.windowSeconds * 1000;

  const pruneSenders = (cutoff: number): void => {
    for (const [sender, arr] of senderTimestamps) {
      prune(arr, cutoff);
      if (arr.length === 0) senderTimestamps.delete(sender);
    }
  };

  return {
    check(senderId: string): RateLimitResult {
      const t = now();
      const cutoff = t - windowMs;

      pruneSenders(cutoff);
      prune(globalTimestamps, cutoff);
      if (globalTimestamps.length >= cfg.globalPerWindow) return { limited: true, reason: 'global' };

      const senderArr = senderTimestamps.get(senderId) ?? [];
      if (senderArr.length >= cfg.perSenderPerWindow) return { limited: true, reason: 'sender' };

      senderArr.push(t);
      senderTimestamps.set(senderId, senderArr);
      globalTimestamps.push(t);
      return { limited: false };
    },
    trackedSenders: () => senderTimestamps.size,
  };
}
