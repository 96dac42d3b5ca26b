import { OutOfRangeError } from './errors';
import { evaluateRoll } from './evaluator';
import { formatRollFragment, type RenderedRoll } from './formatter';
import { DEFAULT_DICE_LIMITS, parseClauseTokens, type DiceLimits, type RollExpression } from './parser';
import type { RandomSource } from './random';
import { sourceText, tokenize, type Token } from './tokenizer';

/**
 * Compound roll handling
 *
 * A `!roll` argument may hold several clauses joined by the `and` keyword
 * (`1d6 and 1d4+2 and 2d8-1`). All clauses are parsed before any dice are
 * rolled, so a bad clause anywhere means nothing is evaluated.
 *
 * @module dice/combiner
 */

export interface ParsedClause {
  readonly clause: string;
  readonly expression: RollExpression;
}

export type CompoundResult = readonly RenderedRoll[];

export interface CompoundOptions {
  random: RandomSource;
  limits?: DiceLimits;
}

/**
 * Split the argument into clause token groups at each `and` keyword.
 * Always returns at least one group; empty groups are kept so the parser
 * can reject them.
 */
export function splitClauses(argument: string): Array<{ clause: string; tokens: Token[] }> {
  const groups: Token[][] = [[]];
  for (const token of tokenize(argument)) {
    if (token.kind === 'and') groups.push([]);
    else groups[groups.length - 1].push(token);
  }
  return groups.map(tokens => ({ clause: sourceText(argument, tokens), tokens }));
}

/**
 * Parse every clause of a compound argument, in order.
 *
 * @throws {ParseError} on the first malformed clause.
 * @throws {OutOfRangeError} when a clause exceeds `limits`, or there are
 * more clauses than `limits.maxClauses`.
 */
export function parseCompound(
  argument: string,
  limits: DiceLimits = DEFAULT_DICE_LIMITS,
): ParsedClause[] {
  const groups = splitClauses(argument);
  if (groups.length > limits.maxClauses) {
    throw new OutOfRangeError('clauses', groups.length, limits.maxClauses, argument.trim());
  }
  return groups.map(({ clause, tokens }) => ({
    clause,
    expression: parseClauseTokens(tokens, clause, limits),
  }));
}

/**
 * Parse, evaluate and render every clause. The result has one entry per
 * clause in the order written.
 */
export function rollCompound(argument: string, options: CompoundOptions): CompoundResult {
  const parsed = parseCompound(argument, options.limits ?? DEFAULT_DICE_LIMITS);
  return parsed.map(({ clause, expression }) => {
    const outcome = evaluateRoll(expression, options.random);
    return { clause, outcome, text: formatRollFragment(clause, outcome) };
  });
}
