/**
 * Main bot module
 *
 * Boots the Slack bot: loads `config.json`, opens the quest store, builds
 * the command dispatcher and connects to Slack over socket mode with Bolt.
 * Incoming messages go through the same gate as before a command runs:
 * only `!commands` are considered, suspicious text is dropped, senders and
 * the whole bot are rate limited, and the accepted commands run on
 * `commandQueue`.
 *
 * Important exports:
 * - start(): initialize and run the bot
 * - handleIncoming(): the per-message gate, used by `start` and tests
 * - shutdown(...): controlled shutdown, optionally without exiting
 *
 * @module bot
 */

import { App } from '@slack/bolt';
import logger from './logger';
import createSlackLogger, { toSlackLevel } from './slackLogger';
import { describeError, enqueueLog } from './asyncLogger';
import { commandQueue, loggingQueue } from './queues';
import type { AsyncQueue } from './threads';
import { ConfigError, DEFAULT_CONFIG_PATH, readConfig } from './config';
import { createDispatcher, isSuspicious, parseCommandText, type Dispatcher } from './handler';
import { createRateLimiter, type RateLimiter } from './rateLimiter';
import { createSlackGateway, toIncomingMessage } from './slackGateway';
import { createQuestRepository, type QuestStore } from './quests/repoFactory';
import { migrate } from './quests/pgQuestRepository';
import { createRandomSource } from './dice/random';
import { startLogRotationMonitor, type LogRotationMonitor } from './logRotation';

/** Everything `shutdown` has to stop. All optional so partial start-ups can be undone. */
export interface BotHandles {
  app?: { stop(): Promise<unknown> };
  store?: Pick<QuestStore, 'close'>;
  monitor?: LogRotationMonitor;
}

export interface MessagePipeline {
  dispatcher: Dispatcher;
  limiter: RateLimiter;
  prefix: string;
  queue?: AsyncQueue;
}

/**
 * Gate one Bolt `message` payload and queue its command.
 *
 * @returns true when a command was queued.
 */
export function handleIncoming(pipeline: MessagePipeline, message: unknown): boolean {
  const incoming = toIncomingMessage(message);
  if (!incoming) return false;
  const { context, text } = incoming;
  if (!parseCommandText(text, pipeline.prefix)) return false;

  if (isSuspicious(text)) {
    enqueueLog('warn', `Rejected suspicious message from ${context.user} in ${context.channel}`);
    return false;
  }

  const limited = pipeline.limiter.check(context.user);
  if (limited.limited) {
    enqueueLog('warn', `Dropping message due to rate limit (${limited.reason}) from ${context.user}`);
    return false;
  }

  (pipeline.queue ?? commandQueue).push(async () => {
    try {
      await pipeline.dispatcher.dispatch(context, text);
    } catch (e) {
      enqueueLog('error', `Dropped message from ${context.user}: ${describeError(e)}`);
    }
  });
  return true;
}

/**
 * Start the Slack bot.
 *
 * Resolves once the socket-mode connection is up. Throws `ConfigError`
 * when tokens or the database URL are missing; anything opened before the
 * failure is closed again.
 */
export async function start(cfgPath: string = DEFAULT_CONFIG_PATH): Promise<BotHandles> {
  const config = await readConfig(cfgPath);
  const { botToken, appToken } = config.slack;
  if (!botToken || !appToken) {
    throw new ConfigError('Slack bot and app tokens are required (SLACK_BOT_TOKEN, SLACK_APP_TOKEN)');
  }

  const handles: BotHandles = {};
  try {
    handles.monitor = startLogRotationMonitor(config.paths.logsDir, {
      retainDays: config.logging.retainDays,
    });

    const store = createQuestRepository(config.quests);
    handles.store = store;
    if (store.pool) {
      await migrate(store.pool, config.paths.schemaFile);
      enqueueLog('info', `Quest schema applied from ${config.paths.schemaFile}`);
    }

    const app = new App({
      token: botToken,
      appToken,
      socketMode: true,
      logger: createSlackLogger(logger),
      logLevel: toSlackLevel(config.logging.level),
    });
    handles.app = app;

    const dispatcher = createDispatcher({
      gateway: createSlackGateway(app.client),
      quests: store.repo,
      random: createRandomSource(config.rng.method, config.rng.seed),
      limits: config.dice,
      enabled: config.commands.enabled,
      prefix: config.commands.prefix,
      listDefault: config.quests.listDefault,
    });
    const pipeline: MessagePipeline = {
      dispatcher,
      limiter: createRateLimiter(config.rateLimit),
      prefix: config.commands.prefix,
    };

    app.message(async ({ message }) => {
      handleIncoming(pipeline, message);
    });

    process.once('SIGINT', () => void shutdown(handles, { exitCode: 0 }));
    process.once('SIGTERM', () => void shutdown(handles, { exitCode: 0 }));

    await app.start();
    enqueueLog('info', `Slack bot connected; commands: ${dispatcher.commands.join(', ')}`);
    return handles;
  } catch (e) {
    await shutdown(handles, { exitCode: 1, skipExit: true });
    throw e;
  }
}

/**
 * Stop the bot: halt the log monitor, let queued commands finish,
 * disconnect from Slack, close the quest store and flush the logs.
 *
 * @param options.skipExit - Leave the process running (tests, start-up failures).
 */
export async function shutdown(
  handles: BotHandles,
  options: { exitCode?: number; skipExit?: boolean } = {},
): Promise<void> {
  const { skipExit = false } = options;
  let exitCode = options.exitCode ?? 0;
  try {
    enqueueLog('info', 'Shutting down gracefully...');
    handles.monitor?.stop();
    await commandQueue.drain();
    await handles.app?.stop();
    await handles.store?.close();
    enqueueLog('info', 'Shutdown complete');
  } catch (err) {
    enqueueLog('error', 'Error during graceful shutdown: ' + describeError(err));
    exitCode = exitCode || 1;
  } finally {
    await loggingQueue.drain();
    if (!skipExit) {
      logger.close();
      process.exit(exitCode);
    }
  }
}
