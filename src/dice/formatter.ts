import type { RollOutcome } from './evaluator';

/**
 * Roll result formatting
 *
 * Produces the Slack-flavoured plain text posted back for `!roll`:
 *
 * ```
 * *Kim* *rolls a 9* _(2d6+3 = 6 + 3)_ _(min: 5, max: 15)_
 * ```
 *
 * @module dice/formatter
 */

/** One clause's result as rendered in a reply. */
export interface RenderedRoll {
  readonly clause: string;
  readonly outcome: RollOutcome;
  readonly text: string;
}

export const MULTI_ROLL_SEPARATOR = '\n\t and ';

/**
 * Render one clause without the requester's name.
 */
export function formatRollFragment(clause: string, outcome: RollOutcome): string {
  const { operator, modifier } = outcome.expression;
  return (
    `*rolls a ${outcome.modifiedTotal}* ` +
    `_(${clause} = ${outcome.rawSum} ${operator} ${modifier})_ ` +
    `_(min: ${outcome.minPossible}, max: ${outcome.maxPossible})_`
  );
}

/**
 * Render the whole reply. A single roll keeps the one-line shape; several
 * rolls share one name prefix and are joined one per line.
 */
export function formatRollMessage(name: string, rolls: readonly RenderedRoll[]): string {
  if (rolls.length === 1) {
    return `*${name}* ${formatRollFragment(rolls[0].clause, rolls[0].outcome)}`;
  }
  return `*${name}* ` + rolls.map(r => r.text).join(MULTI_ROLL_SEPARATOR);
}
