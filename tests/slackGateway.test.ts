import { loggingQueue } from '../src/queues';
import {
  createSlackGateway,
  decodeSlackText,
  displayNameOf,
  toIncomingMessage,
  type SlackClient,
} from '../src/slackGateway';

function fakeClient(info: SlackClient['users']['info']) {
  const postMessage = jest.fn(async (_args: { channel: string; text: string; thread_ts?: string }) => ({ ok: true }));
  const client: SlackClient = { users: { info }, chat: { postMessage } };
  return { client, postMessage };
}

describe('decodeSlackText', () => {
  test('restores escaped characters', () => {
    expect(decodeSlackText('1d6 &amp;&lt;&gt;')).toBe('1d6 &<>');
  });

  test('decodes &amp; last', () => {
    expect(decodeSlackText('&amp;lt;')).toBe('&lt;');
  });
});

describe('toIncomingMessage', () => {
  test('reads user messages', () => {
    expect(
      toIncomingMessage({ type: 'message', user: 'U1', channel: 'C1', text: '!roll 1d6', ts: '1.0', thread_ts: '0.5' }),
    ).toEqual({
      context: { channel: 'C1', user: 'U1', ts: '1.0', threadTs: '0.5' },
      text: '!roll 1d6',
    });
  });

  test('skips edits, bots and incomplete payloads', () => {
    expect(toIncomingMessage({ subtype: 'message_changed', channel: 'C1' })).toBeNull();
    expect(toIncomingMessage({ bot_id: 'B1', user: 'U1', channel: 'C1', text: '!roll 1d6' })).toBeNull();
    expect(toIncomingMessage({ user: 'U1', channel: 'C1' })).toBeNull();
    expect(toIncomingMessage(null)).toBeNull();
  });
});

describe('displayNameOf', () => {
  test('prefers the display name, then real names, then the account name', () => {
    expect(displayNameOf({ name: 'kim', real_name: 'Kim Doe', profile: { display_name: 'Kimmy' } })).toBe('Kimmy');
    expect(displayNameOf({ name: 'kim', profile: { display_name: '', real_name: 'Kim Doe' } })).toBe('Kim Doe');
    expect(displayNameOf({ name: 'kim' })).toBe('kim');
    expect(displayNameOf(undefined)).toBeUndefined();
  });
});

describe('createSlackGateway', () => {
  afterEach(async () => {
    await loggingQueue.drain();
  });

  test('resolves names through users.info', async () => {
    const info = jest.fn(async (_args: { user: string }) => ({ ok: true, user: { name: 'kim', real_name: 'Kim Doe' } }));
    const { client } = fakeClient(info);

    expect(await createSlackGateway(client).resolveName('U1')).toBe('Kim Doe');
    expect(info).toHaveBeenCalledWith({ user: 'U1' });
  });

  test('falls back to the user id when the lookup fails', async () => {
    const { client } = fakeClient(async () => {
      throw new Error('user_not_found');
    });

    expect(await createSlackGateway(client).resolveName('U404')).toBe('U404');
  });

  test('posts into the originating thread', async () => {
    const { client, postMessage } = fakeClient(async () => ({ ok: true }));

    await createSlackGateway(client).postMessage({ channel: 'C1', user: 'U1', threadTs: '9.9' }, 'hi');

    expect(postMessage).toHaveBeenCalledWith({ channel: 'C1', text: 'hi', thread_ts: '9.9' });
  });
});
