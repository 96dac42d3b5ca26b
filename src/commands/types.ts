/**
 * Shared command types
 *
 * Commands never reach out to the chat platform on their own: everything
 * they need from it comes through a `ChatGateway` handed in at construction.
 *
 * @module commands/types
 */

/**
 * Where a command came from. Passed back unchanged to `postMessage` so the
 * reply lands in the same channel (and thread, if any).
 */
export interface CommandContext {
  channel: string;
  /** Opaque id of the requesting user. */
  user: string;
  ts?: string;
  threadTs?: string;
}

export interface ChatGateway {
  /** Map a user id to the name shown in replies. */
  resolveName(userId: string): Promise<string>;
  postMessage(context: CommandContext, text: string): Promise<void>;
}

export interface Command {
  readonly name: string;
  readonly helpText: string;
  run(context: CommandContext, args: string): Promise<void>;
  help(context: CommandContext): Promise<void>;
}

/**
 * Base class holding the gateway and the default `help` behaviour: post
 * the command's help text where it was asked for.
 */
export abstract class BaseCommand implements Command {
  abstract readonly name: string;
  abstract readonly helpText: string;

  constructor(protected readonly gateway: ChatGateway) {}

  abstract run(context: CommandContext, args: string): Promise<void>;

  async help(context: CommandContext): Promise<void> {
    await this.gateway.postMessage(context, this.helpText);
  }
}
