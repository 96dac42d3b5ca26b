/**
 * Slack -> Winston adapter
 *
 * Bolt and the Slack web client log through `@slack/logger`'s `Logger`
 * interface. This adapter implements it on top of the application's
 * Winston logger so socket-mode reconnects, API retries and the like land
 * in the same log files as everything else.
 *
 * Each line is prefixed with the name Bolt assigns (`[bolt-app]`, ...).
 * `setLevel` only filters what this adapter forwards; the Winston level
 * still applies on top.
 *
 * @module slackLogger
 */

import { LogLevel, type Logger as SlackLogger } from '@slack/bolt';
import type { Logger as WinstonLogger } from 'winston';

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
};

/** Join log arguments into one line, JSON-encoding anything that is not a string. */
export function formatArgs(args: unknown[]): string {
  return args
    .map(a => {
      if (typeof a === 'string') return a;
      if (a instanceof Error) return a.stack ?? a.message;
      try {
        return JSON.stringify(a) ?? String(a);
      } catch {
        return String(a);
      }
    })
    .join(' ');
}

/** Closest Slack level for a Winston level name; unknown names map to info. */
export function toSlackLevel(level: string | undefined): LogLevel {
  switch (level) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'debug':
    case 'verbose':
    case 'silly':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

export default function createSlackLogger(
  winstonLogger: WinstonLogger,
  initialLevel: LogLevel = LogLevel.INFO,
): SlackLogger {
  let level = initialLevel;
  let name = 'slack';

  const makeMethod = (methodLevel: LogLevel) => {
    return (...args: unknown[]): void => {
      if (SEVERITY[methodLevel] > SEVERITY[level]) return;
      winstonLogger.log({ level: methodLevel, message: `[${name}] ${formatArgs(args)}` });
    };
  };

  return {
    debug: makeMethod(LogLevel.DEBUG),
    info: makeMethod(LogLevel.INFO),
    warn: makeMethod(LogLevel.WARN),
    error: makeMethod(LogLevel.ERROR),
    setLevel(next: LogLevel) {
      level = next;
    },
    getLevel() {
      return level;
    },
    setName(next: string) {
      name = next;
    },
  };
}
