/**
 * Application entry point
 *
 * Re-exports the pieces other programs embed (the bot's `start`, the
 * dispatcher, the dice core and the quest store). Executed directly it
 * hands its arguments to the CLI, defaulting to `start`.
 *
 * @module index
 */

import { start } from './bot';
import { main } from './cli';

export default start;
export { start, shutdown, handleIncoming } from './bot';
export { createDispatcher, parseCommandText, isSuspicious } from './handler';
export type { Dispatcher, DispatcherOptions } from './handler';
export type { ChatGateway, Command, CommandContext } from './commands/types';
export { rollCompound, parseCompound, splitClauses } from './dice/combiner';
export { parseRollExpression, DEFAULT_DICE_LIMITS } from './dice/parser';
export type { DiceLimits, RollExpression } from './dice/parser';
export { evaluateRoll, rollBounds } from './dice/evaluator';
export type { RollOutcome } from './dice/evaluator';
export { formatRollMessage } from './dice/formatter';
export { createRandomSource, mulberry32 } from './dice/random';
export { DiceError, ParseError, OutOfRangeError, RandomSourceError } from './dice/errors';
export { InMemoryQuestRepository } from './quests/inMemoryQuestRepository';
export { PgQuestRepository, migrate } from './quests/pgQuestRepository';
export type { QuestRepository } from './quests/repository';
export type { Quest, NewQuest, QuestChanges, QuestSummary } from './quests/types';

if (require.main === module) {
  const argv = process.argv.slice(2);
  void main(argv.length > 0 ? argv : ['start']);
}
