import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { checkLogs, localDateStamp, purgeOldLogs, startLogRotationMonitor } from '../src/logRotation';
import { loggingQueue } from '../src/queues';

const NOW = new Date(2024, 5, 15, 12).getTime();
const DAY = 24 * 60 * 60 * 1000;

describe('log rotation', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'quest-dice-logs-'));
  });

  afterEach(async () => {
    await loggingQueue.drain();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeLog(name: string, content: string, mtime?: number) {
    const file = path.join(tmpDir, name);
    await fs.writeFile(file, content);
    if (mtime !== undefined) await fs.utimes(file, new Date(mtime), new Date(mtime));
  }

  test('purges files older than the retention period', async () => {
    await writeLog('application-2024-05-01.log', 'old', NOW - 20 * DAY);
    await writeLog('application-2024-06-14.log', 'recent', NOW - DAY);
    await writeLog('unrelated.txt', 'keep', NOW - 20 * DAY);

    const removed = await purgeOldLogs(tmpDir, 7, () => NOW);

    expect(removed).toBe(1);
    expect((await fs.readdir(tmpDir)).sort()).toEqual(['application-2024-06-14.log', 'unrelated.txt']);
  });

  test('reports today, empty files and purges', async () => {
    await writeLog('application-2024-06-15.log', 'today', NOW);
    await writeLog('application-2024-06-14.log', '', NOW - DAY);
    await writeLog('application-2024-06-01.log', 'old', NOW - 14 * DAY - 1);

    const report = await checkLogs(tmpDir, { retainDays: 14, now: () => NOW });

    expect(report).toEqual({
      dirExists: true,
      hasToday: true,
      suspect: ['application-2024-06-14.log'],
      purged: 1,
    });
  });

  test('notices a missing directory', async () => {
    const report = await checkLogs(path.join(tmpDir, 'missing'));
    expect(report).toEqual({ dirExists: false, hasToday: false, suspect: [], purged: 0 });
  });

  test('monitor runs a check straight away and can be stopped', async () => {
    await writeLog('application-2024-05-01.log', 'old', NOW - 20 * DAY);

    const monitor = startLogRotationMonitor(tmpDir, { retainDays: 7, now: () => NOW });
    await monitor.initialCheck;
    monitor.stop();

    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  test('names today by the local date', () => {
    expect(localDateStamp(new Date(2024, 0, 1, 23, 59).getTime())).toBe('2024-01-01');
    expect(localDateStamp(new Date(2024, 11, 31, 0, 5).getTime())).toBe('2024-12-31');
  });

  test('finds a log written just before local midnight', async () => {
    const lateEvening = new Date(2024, 5, 15, 23, 45).getTime();
    await writeLog('application-2024-06-15.log', 'late', lateEvening);

    const report = await checkLogs(tmpDir, { now: () => lateEvening });

    expect(report.hasToday).toBe(true);
  });
});
