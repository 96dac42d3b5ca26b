import { BaseCommand, type ChatGateway, type Command, type CommandContext } from './types';

/**
 * `!help [topic]` posts the help text of the named command, or the list
 * of available topics when no known topic is given.
 *
 * @module commands/help
 */
export class HelpCommand extends BaseCommand {
  readonly name = 'help';
  private readonly topics = new Map<string, Command>();

  constructor(gateway: ChatGateway) {
    super(gateway);
    this.topics.set(this.name, this);
  }

  /** Make `command` reachable as `!help <command.name>`. */
  register(command: Command): void {
    this.topics.set(command.name, command);
  }

  get helpText(): string {
    const names = [...this.topics.keys()].sort();
    return [
      '```',
      'available help topics:',
      ...names.map(n => `    ${n}`),
      '',
      'Try `!help [topic]` for information on a specific topic.',
      '```',
    ].join('\n');
  }

  async run(context: CommandContext, args: string): Promise<void> {
    const topic = args.trim().split(/\s+/)[0]?.toLowerCase() ?? '';
    const command = this.topics.get(topic);
    if (command && command !== this) {
      await command.help(context);
      return;
    }
    await this.help(context);
  }
}
