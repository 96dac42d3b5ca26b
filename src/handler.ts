import { describeError, enqueueLog } from './asyncLogger';
import { HelpCommand } from './commands/help';
import { QuestCommand } from './commands/quest';
import { RollCommand } from './commands/roll';
import type { ChatGateway, Command, CommandContext } from './commands/types';
import type { DiceLimits } from './dice/parser';
import type { RandomSource } from './dice/random';
import type { QuestRepository } from './quests/repository';

/**
 * Message dispatch
 *
 * Turns the text of an incoming chat message into a command invocation:
 * `!<name> <args>` runs the enabled command called `<name>`. Everything
 * else is ignored. Command failures that are not answered in chat are
 * logged here and rethrown to the caller.
 *
 * @module handler
 */

export interface ParsedCommand {
  name: string;
  args: string;
}

export interface EnabledCommands {
  roll: boolean;
  quest: boolean;
  help: boolean;
}

export interface DispatcherOptions {
  gateway: ChatGateway;
  quests: QuestRepository;
  random: RandomSource;
  limits?: DiceLimits;
  enabled?: Partial<EnabledCommands>;
  prefix?: string;
  /** Rows shown by `!quest list` without a count. */
  listDefault?: number;
}

export interface Dispatcher {
  /** Names of the commands that will be dispatched. */
  readonly commands: string[];
  /**
   * Run the command in `text`, if any.
   *
   * @returns whether a command was recognised and run.
   */
  dispatch(context: CommandContext, text: string): Promise<boolean>;
}

export const MAX_MESSAGE_LENGTH = 500;

const SUSPICIOUS_PATTERNS: RegExp[] = [
  /`/, // code fences and inline code
  /\$[({]/, // shell or template substitution
  /(base64|data:text)\s*:/i, // embedded data blobs
];

/**
 * Reject input that is too long or carries shell/template syntax. `|`
 * and `<...>` are allowed: quests use the first and Slack wraps links and
 * mentions in the second.
 */
export function isSuspicious(text: string): boolean {
  if (!text) return false;
  if (text.length > MAX_MESSAGE_LENGTH) return true;
  return SUSPICIOUS_PATTERNS.some(r => r.test(text));
}

/**
 * Split `!name args` into its parts. Returns null when `text` does not
 * start with `prefix` directly followed by a command name.
 */
export function parseCommandText(text: string, prefix = '!'): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith(prefix)) return null;
  const m = /^([a-z][a-z0-9_-]*)(?:\s+([\s\S]*))?$/i.exec(trimmed.slice(prefix.length));
  if (!m) return null;
  return { name: m[1].toLowerCase(), args: (m[2] ?? '').trim() };
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const enabled: EnabledCommands = { roll: true, quest: true, help: true, ...options.enabled };
  const prefix = options.prefix ?? '!';
  const commands = new Map<string, Command>();

  const help = new HelpCommand(options.gateway);
  const add = (command: Command) => {
    commands.set(command.name, command);
    help.register(command);
  };
  if (enabled.roll) {
    add(new RollCommand(options.gateway, { random: options.random, limits: options.limits }));
  }
  if (enabled.quest) {
    add(new QuestCommand(options.gateway, options.quests, { listDefault: options.listDefault ?? 5 }));
  }
  if (enabled.help) commands.set(help.name, help);

  return {
    commands: [...commands.keys()].sort(),

    async dispatch(context: CommandContext, text: string): Promise<boolean> {
      const parsed = parseCommandText(text, prefix);
      if (!parsed) return false;
      const command = commands.get(parsed.name);
      if (!command) return false;

      enqueueLog('debug', `Running ${prefix}${parsed.name} for ${context.user} in ${context.channel}`);
      try {
        await command.run(context, parsed.args);
      } catch (e) {
        enqueueLog('error', `Command ${prefix}${parsed.name} failed: ${describeError(e)}`);
        throw e;
      }
      return true;
    },
  };
}
