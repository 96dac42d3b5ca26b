import fs from 'fs/promises';
import fsSync from 'fs';
import path from 'path';
import { describeError, enqueueLog } from './asyncLogger';

/**
 * Log directory housekeeping: sanity checks on the rotated
 * `application-YYYY-MM-DD.log` files and removal of files older than the
 * retention period. The bot runs it daily; the CLI exposes it as
 * `check-logs` and `purge-logs`.
 *
 * @module logRotation
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const LOG_PREFIX = 'application-';

export interface LogCheckOptions {
  /** Files above this size are reported. Default 200 MB. */
  maxSizeBytes?: number;
  /** Files not modified for this many days are deleted. Default 14. */
  retainDays?: number;
  now?: () => number;
}

export interface LogCheckReport {
  dirExists: boolean;
  hasToday: boolean;
  /** Empty or oversized log files. */
  suspect: string[];
  purged: number;
}

/**
 * `YYYY-MM-DD` in local time, matching the rotating file transport's
 * `%DATE%`.
 */
export function localDateStamp(ms: number): string {
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/**
 * Delete rotated log files whose mtime is older than `retainDays`.
 *
 * @returns how many files were removed.
 */
export async function purgeOldLogs(
  logsDir: string,
  retainDays = 14,
  now: () => number = Date.now,
): Promise<number> {
  const dir = path.resolve(process.cwd(), logsDir);
  if (!fsSync.existsSync(dir)) return 0;
  const cutoff = now() - retainDays * DAY_MS;
  let removed = 0;
  for (const f of await fs.readdir(dir)) {
    if (!f.startsWith(LOG_PREFIX)) continue;
    try {
      const st = await fs.stat(path.join(dir, f));
      if (!st.isFile() || st.mtimeMs >= cutoff) continue;
      await fs.unlink(path.join(dir, f));
      removed++;
      enqueueLog('info', `Log rotation: purged old log ${f}`);
    } catch (e) {
      enqueueLog('warn', `Log rotation: failed to purge ${f}: ${describeError(e)}`);
    }
  }
  return removed;
}

/**
 * Check that today's log file exists and that recent files have a sane
 * size, then purge expired files.
 */
export async function checkLogs(logsDir: string, options: LogCheckOptions = {}): Promise<LogCheckReport> {
  const maxSize = options.maxSizeBytes ?? 200 * 1024 * 1024;
  const now = options.now ?? Date.now;
  const dir = path.resolve(process.cwd(), logsDir);

  if (!fsSync.existsSync(dir)) {
    enqueueLog('warn', `Log rotation: logs dir missing: ${dir}`);
    return { dirExists: false, hasToday: false, suspect: [], purged: 0 };
  }

  const files = (await fs.readdir(dir)).filter(f => f.startsWith(LOG_PREFIX)).sort();
  const todayName = `${LOG_PREFIX}${localDateStamp(now())}.log`;
  const hasToday = files.includes(todayName);
  if (!hasToday) enqueueLog('warn', `Log rotation: today's log not found: ${todayName}`);

  const suspect: string[] = [];
  for (const fname of files.slice(-30)) {
    try {
      const st = await fs.stat(path.join(dir, fname));
      if (!st.isFile()) continue;
      if (st.size === 0) {
        enqueueLog('warn', `Log rotation: file ${fname} has size 0`);
        suspect.push(fname);
      } else if (st.size > maxSize) {
        enqueueLog('warn', `Log rotation: file ${fname} is large (${Math.round(st.size / 1024 / 1024)} MB)`);
        suspect.push(fname);
      }
    } catch (e) {
      enqueueLog('warn', `Log rotation: failed to stat ${fname}: ${describeError(e)}`);
    }
  }

  const purged = await purgeOldLogs(logsDir, options.retainDays, now);
  enqueueLog('info', 'Log rotation: completed checks');
  return { dirExists: true, hasToday, suspect, purged };
}

export interface LogRotationMonitor {
  /** Settles when the check started on creation has finished. */
  initialCheck: Promise<void>;
  stop(): void;
}

/** Run `checkLogs` now and then once a day until stopped. */
export function startLogRotationMonitor(logsDir: string, options: LogCheckOptions = {}): LogRotationMonitor {
  const run = (): Promise<void> =>
    checkLogs(logsDir, options).then(
      () => undefined,
      e => enqueueLog('warn', `Log rotation monitor failed: ${describeError(e)}`),
    );
  const initialCheck = run();
  const handle = setInterval(() => void run(), DAY_MS);
  handle.unref();
  return {
    initialCheck,
    stop() {
      clearInterval(handle);
    },
  };
}
