import { rollCompound, type CompoundResult } from '../dice/combiner';
import { OutOfRangeError, ParseError } from '../dice/errors';
import { formatRollMessage } from '../dice/formatter';
import type { DiceLimits } from '../dice/parser';
import type { RandomSource } from '../dice/random';
import { BaseCommand, type ChatGateway, type CommandContext } from './types';

/**
 * `!roll` command
 *
 * Rolls one or more dice clauses and posts a single reply naming the
 * requester. Malformed or oversized notation gets a short explanation and
 * the usage line instead; no dice are rolled in that case.
 *
 * @module commands/roll
 */

export const ROLL_USAGE = 'Usage: `!roll [HOW MANY]d[SIDES][+/-MODIFIER] [and ...]`';

const ROLL_HELP = `\`\`\`
command:
    !roll

description:
    Rolls dice for you.

usage:
    !roll [HOW MANY]d[SIDES][+/-MODIFIER]
    !roll [HOW MANY]d[SIDES][+/-MODIFIER] and [HOW MANY]d[SIDES][+/-MODIFIER] and ...

examples:
    !roll 2d6
    !roll 1d20+4
    !roll 1d6 and 1d4+2 and 2d8-1
\`\`\``;

export interface RollCommandOptions {
  random: RandomSource;
  limits?: DiceLimits;
}

export class RollCommand extends BaseCommand {
  readonly name = 'roll';
  readonly helpText = ROLL_HELP;

  constructor(
    gateway: ChatGateway,
    private readonly options: RollCommandOptions,
  ) {
    super(gateway);
  }

  async run(context: CommandContext, args: string): Promise<void> {
    let result: CompoundResult;
    try {
      result = rollCompound(args, { random: this.options.random, limits: this.options.limits });
    } catch (e) {
      if (e instanceof ParseError) {
        const what = e.clause ? `Could not roll "${e.clause}"` : 'Could not roll';
        await this.gateway.postMessage(context, `${what}: ${e.message}\n${ROLL_USAGE}`);
        return;
      }
      if (e instanceof OutOfRangeError) {
        await this.gateway.postMessage(context, e.message);
        return;
      }
      throw e;
    }

    const name = await this.gateway.resolveName(context.user);
    await this.gateway.postMessage(context, formatRollMessage(name, result));
  }
}
