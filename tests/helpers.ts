import type { ChatGateway, CommandContext } from '../src/commands/types';
import type { RandomSource } from '../src/dice/random';

/** Random source that replays `values` and fails once they run out. */
export function sequence(values: number[]): RandomSource & { calls: () => number } {
  let i = 0;
  const next = () => {
    if (i >= values.length) throw new Error('random sequence exhausted');
    return values[i++];
  };
  return Object.assign(next, { calls: () => i });
}

export const context: CommandContext = { channel: 'C1', user: 'U1' };

export class FakeGateway implements ChatGateway {
  readonly posts: Array<{ context: CommandContext; text: string }> = [];
  readonly lookups: string[] = [];

  constructor(private readonly names: Record<string, string> = {}) {}

  async resolveName(userId: string): Promise<string> {
    this.lookups.push(userId);
    return this.names[userId] ?? userId;
  }

  async postMessage(ctx: CommandContext, text: string): Promise<void> {
    this.posts.push({ context: ctx, text });
  }

  get texts(): string[] {
    return this.posts.map(p => p.text);
  }
}

/** Clock that moves forward one day per call, starting at 2024-01-01 UTC. */
export function dailyClock(): () => Date {
  let day = 0;
  return () => {
    day += 1;
    return new Date(Date.UTC(2024, 0, day));
  };
}
