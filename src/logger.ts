/**
 * Application logger singleton backed by Winston.
 *
 * - Writes daily rotated log files to `<logsDir>/application-<DATE>.log`.
 * - Outside production, also logs to a colorized console.
 * - Under `NODE_ENV=test` nothing is written anywhere.
 *
 * Settings come from the `logging` and `paths` sections of `config.json`;
 * `LOG_LEVEL` overrides the level and `info` is the default.
 */
import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import type Transport from 'winston-transport';
import DailyRotateFile from 'winston-daily-rotate-file';
import { loadConfigSync, parseConfig, type RuntimeConfig } from './config';

const { combine, timestamp, printf, colorize } = format;

const logFormat = printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

function settings(): RuntimeConfig {
  try {
    return loadConfigSync();
  } catch {
    // an invalid config.json is reported by whoever starts the bot
    return parseConfig({});
  }
}

const cfg = settings();
const isTest = process.env.NODE_ENV === 'test';
const level = cfg.logging.level || 'info';
const logsDir = cfg.paths.logsDir;
const consoleEnabled = cfg.logging.console ?? process.env.NODE_ENV !== 'production';

const transportsList: Transport[] = [];
if (isTest) {
  transportsList.push(new transports.Console({ silent: true }));
} else {
  if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });
  if (cfg.logging.dailyRotate) {
    transportsList.push(
      new DailyRotateFile({
        filename: `${logsDir}/application-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: cfg.logging.maxSize,
        maxFiles: cfg.logging.maxFiles,
        level,
      }),
    );
  } else {
    transportsList.push(new transports.File({ filename: `${logsDir}/application.log`, level }));
  }
  if (consoleEnabled) {
    transportsList.push(new transports.Console({ format: combine(colorize(), timestamp(), logFormat) }));
  }
}

const logger = createLogger({
  level,
  format: combine(timestamp(), logFormat),
  transports: transportsList,
});

export default logger;
