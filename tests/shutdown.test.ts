import { handleIncoming, shutdown, start, type MessagePipeline } from '../src/bot';
import { ConfigError } from '../src/config';
import type { Dispatcher } from '../src/handler';
import { loggingQueue } from '../src/queues';
import { createRateLimiter } from '../src/rateLimiter';
import { createQueue } from '../src/threads';

function pipeline(dispatch: Dispatcher['dispatch'], perSenderPerWindow = 10): MessagePipeline & { queue: ReturnType<typeof createQueue> } {
  return {
    dispatcher: { commands: ['roll'], dispatch },
    limiter: createRateLimiter({ perSenderPerWindow, globalPerWindow: 100, windowSeconds: 60 }),
    prefix: '!',
    queue: createQueue(1),
  };
}

const message = (text: string, user = 'U1') => ({ type: 'message', channel: 'C1', user, text, ts: '1.0' });

describe('incoming message gate', () => {
  afterEach(async () => {
    await loggingQueue.drain();
  });

  test('queues commands for dispatch', async () => {
    const dispatch = jest.fn(async () => true);
    const p = pipeline(dispatch);

    expect(handleIncoming(p, message('!roll 1d6'))).toBe(true);
    await p.queue.drain();

    expect(dispatch).toHaveBeenCalledWith({ channel: 'C1', user: 'U1', ts: '1.0', threadTs: undefined }, '!roll 1d6');
  });

  test('ignores chatter, bots and suspicious text', () => {
    const dispatch = jest.fn(async () => true);
    const p = pipeline(dispatch);

    expect(handleIncoming(p, message('good morning'))).toBe(false);
    expect(handleIncoming(p, { ...message('!roll 1d6'), bot_id: 'B1' })).toBe(false);
    expect(handleIncoming(p, message('!roll `1d6`'))).toBe(false);
    expect(p.queue.size()).toBe(0);
  });

  test('drops senders over their rate limit', () => {
    const p = pipeline(jest.fn(async () => true), 1);

    expect(handleIncoming(p, message('!roll 1d6'))).toBe(true);
    expect(handleIncoming(p, message('!roll 1d6'))).toBe(false);
    expect(handleIncoming(p, message('!roll 1d6', 'U2'))).toBe(true);
  });

  test('a failing command does not break the queue', async () => {
    const dispatch = jest.fn(async (): Promise<boolean> => {
      throw new Error('db down');
    });
    const p = pipeline(dispatch);

    handleIncoming(p, message('!quest list'));
    handleIncoming(p, message('!quest list', 'U2'));
    await p.queue.drain();

    expect(dispatch).toHaveBeenCalledTimes(2);
  });
});

describe('shutdown', () => {
  test('stops every handle without exiting when skipExit=true', async () => {
    const called: string[] = [];
    const handles = {
      app: { stop: async () => void called.push('app.stop') },
      store: { close: async () => void called.push('store.close') },
      monitor: { initialCheck: Promise.resolve(), stop: () => void called.push('monitor.stop') },
    };

    await shutdown(handles, { skipExit: true });

    expect(called).toEqual(['monitor.stop', 'app.stop', 'store.close']);
  });

  test('a failing step is logged, not thrown', async () => {
    const handles = {
      app: {
        stop: async () => {
          throw new Error('already stopped');
        },
      },
    };

    await expect(shutdown(handles, { skipExit: true })).resolves.toBeUndefined();
  });
});

describe('start', () => {
  const saved = { bot: process.env.SLACK_BOT_TOKEN, app: process.env.SLACK_APP_TOKEN };

  afterEach(() => {
    if (saved.bot === undefined) delete process.env.SLACK_BOT_TOKEN;
    else process.env.SLACK_BOT_TOKEN = saved.bot;
    if (saved.app === undefined) delete process.env.SLACK_APP_TOKEN;
    else process.env.SLACK_APP_TOKEN = saved.app;
  });

  test('refuses to start without Slack tokens', async () => {
    delete process.env.SLACK_BOT_TOKEN;
    delete process.env.SLACK_APP_TOKEN;

    await expect(start('tests/no-such-config.json')).rejects.toThrow(ConfigError);
  });
});
