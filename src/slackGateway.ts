import { describeError, enqueueLog } from './asyncLogger';
import type { ChatGateway, CommandContext } from './commands/types';

/**
 * Slack side of the `ChatGateway` port, plus the helpers that turn Bolt
 * `message` events into command input.
 *
 * @module slackGateway
 */

interface SlackUserProfile {
  display_name?: string;
  real_name?: string;
}

interface SlackUser {
  name?: string;
  real_name?: string;
  profile?: SlackUserProfile;
}

/**
 * The two Web API methods the bot calls. Bolt's `app.client` (a
 * `WebClient`) satisfies it; tests pass a fake.
 */
export interface SlackClient {
  users: {
    info(args: { user: string }): Promise<{ ok?: boolean; user?: SlackUser }>;
  };
  chat: {
    postMessage(args: { channel: string; text: string; thread_ts?: string }): Promise<unknown>;
  };
}

export interface IncomingMessage {
  context: CommandContext;
  text: string;
}

/** Undo Slack's escaping of `&`, `<` and `>` in message text. */
export function decodeSlackText(text: string): string {
  return text.replace(/&lt;/g, '<').replace(/&gt;/g, '>').replace(/&amp;/g, '&');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Pick out plain user messages from a Bolt `message` event payload.
 * Edits, joins, bot posts and other subtypes yield null.
 */
export function toIncomingMessage(message: unknown): IncomingMessage | null {
  if (!isRecord(message)) return null;
  if (message.subtype !== undefined || message.bot_id !== undefined) return null;

  const user = optionalString(message.user);
  const channel = optionalString(message.channel);
  const text = optionalString(message.text);
  if (!user || !channel || !text) return null;

  return {
    context: {
      channel,
      user,
      ts: optionalString(message.ts),
      threadTs: optionalString(message.thread_ts),
    },
    text: decodeSlackText(text),
  };
}

/**
 * Display name for a Slack user: profile display name, then real name,
 * then the account name.
 */
export function displayNameOf(user: SlackUser | undefined): string | undefined {
  return user?.profile?.display_name || user?.profile?.real_name || user?.real_name || user?.name || undefined;
}

export function createSlackGateway(client: SlackClient): ChatGateway {
  return {
    async resolveName(userId: string): Promise<string> {
      try {
        const res = await client.users.info({ user: userId });
        return displayNameOf(res.user) ?? userId;
      } catch (e) {
        enqueueLog('warn', `users.info failed for ${userId}, using the id: ${describeError(e)}`);
        return userId;
      }
    },

    async postMessage(context: CommandContext, text: string): Promise<void> {
      await client.chat.postMessage({ channel: context.channel, text, thread_ts: context.threadTs });
    },
  };
}
