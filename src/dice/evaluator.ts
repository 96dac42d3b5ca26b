import { RandomSourceError } from './errors';
import type { RollExpression } from './parser';
import type { RandomSource } from './random';

/**
 * Roll evaluator
 *
 * Draws die values for a parsed expression and computes the modified total
 * together with the theoretical minimum and maximum for that expression.
 *
 * @module dice/evaluator
 */

export interface RollOutcome {
  readonly expression: RollExpression;
  /** Individual die results, in draw order. */
  readonly rolls: readonly number[];
  readonly rawSum: number;
  readonly modifiedTotal: number;
  readonly minPossible: number;
  readonly maxPossible: number;
}

/**
 * The modifier with its sign applied: `+3` for `1d6+3`, `-1` for `2d8-1`.
 */
export function signedModifier(expression: RollExpression): number {
  return expression.operator === '+' ? expression.modifier : -expression.modifier;
}

/**
 * Lowest and highest totals the expression can produce. Needs no randomness.
 */
export function rollBounds(expression: RollExpression): { min: number; max: number } {
  const mod = signedModifier(expression);
  return {
    min: expression.count + mod,
    max: expression.count * expression.sides + mod,
  };
}

/**
 * Roll an N-sided die using the provided randomness source.
 *
 * The result is `floor(random() * sides) + 1`, an integer in [1, sides].
 *
 * @throws {Error} If `sides` is not a positive integer.
 * @throws {RandomSourceError} If `random` returns a value outside [0, 1).
 */
export function rollDie(sides: number, random: RandomSource = Math.random): number {
  if (!Number.isInteger(sides) || sides < 1) throw new Error('sides must be a positive integer');
  const value = random();
  if (!(value >= 0 && value < 1)) throw new RandomSourceError(value);
  return Math.floor(value * sides) + 1;
}

/**
 * Evaluate an expression: exactly `count` draws from `random`, summed, then
 * the signed modifier applied.
 */
export function evaluateRoll(expression: RollExpression, random: RandomSource): RollOutcome {
  const rolls: number[] = [];
  for (let i = 0; i < expression.count; i++) {
    rolls.push(rollDie(expression.sides, random));
  }
  const rawSum = rolls.reduce((acc, v) => acc + v, 0);
  const { min, max } = rollBounds(expression);
  return Object.freeze({
    expression,
    rolls: Object.freeze(rolls),
    rawSum,
    modifiedTotal: rawSum + signedModifier(expression),
    minPossible: min,
    maxPossible: max,
  });
}
