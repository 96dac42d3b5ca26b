import { OutOfRangeError, ParseError, type ParseFailure } from './errors';
import { sourceText, tokenize, type Token } from './tokenizer';

/**
 * Dice notation parser
 *
 * Recursive-descent parser for one roll clause:
 *
 * ```
 * clause   := count "d" sides [ sign modifier ]
 * sign     := "+" | "-"
 * count, sides, modifier := decimal integer
 * ```
 *
 * Examples:
 * ```ts
 * parseRollExpression('2d6+3') // -> { count: 2, sides: 6, modifier: 3, operator: '+' }
 * parseRollExpression('1d20')  // -> { count: 1, sides: 20, modifier: 0, operator: '+' }
 * parseRollExpression('d6')    // throws ParseError (missing-count)
 * ```
 *
 * @module dice/parser
 */

export type RollOperator = '+' | '-';

export interface RollExpression {
  readonly count: number;
  readonly sides: number;
  /** Magnitude of the written modifier; the sign lives in `operator`. */
  readonly modifier: number;
  readonly operator: RollOperator;
}

/**
 * Upper bounds enforced while parsing. Exceeding one raises
 * `OutOfRangeError` rather than `ParseError`.
 */
export interface DiceLimits {
  maxCount: number;
  maxSides: number;
  maxModifier: number;
  maxClauses: number;
}

export const DEFAULT_DICE_LIMITS: Readonly<DiceLimits> = Object.freeze({
  maxCount: 100,
  maxSides: 1000,
  maxModifier: 10000,
  maxClauses: 10,
});

const DESCRIBE: Record<Token['kind'], string> = {
  number: 'a number',
  d: '"d"',
  plus: '"+"',
  minus: '"-"',
  and: '"and"',
};

class TokenCursor {
  private pos = 0;

  constructor(
    private readonly tokens: readonly Token[],
    readonly clause: string,
  ) {}

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  next(): Token | undefined {
    const token = this.tokens[this.pos];
    if (token) this.pos++;
    return token;
  }

  fail(reason: ParseFailure, message: string): never {
    throw new ParseError(reason, this.clause, message);
  }
}

/**
 * Parse one clause from its tokens. `clause` is the text reported in errors.
 *
 * @throws {ParseError} for any deviation from the grammar.
 * @throws {OutOfRangeError} when a number exceeds `limits`.
 */
export function parseClauseTokens(
  tokens: readonly Token[],
  clause: string,
  limits: DiceLimits = DEFAULT_DICE_LIMITS,
): RollExpression {
  const cursor: TokenCursor = new TokenCursor(tokens, clause);
  if (tokens.length === 0) cursor.fail('empty', 'empty roll');
  if (tokens.some(t => t.kind === 'plus') && tokens.some(t => t.kind === 'minus')) {
    cursor.fail('ambiguous-sign', 'use either "+" or "-" for the modifier, not both');
  }

  const count = expectCount(cursor);
  expectD(cursor);
  const sides = expectSides(cursor);
  const { modifier, operator } = parseModifier(cursor);

  const rest = cursor.peek();
  if (rest) {
    if (rest.kind === 'd') cursor.fail('multiple-d', 'only one "d" is allowed per roll');
    if (rest.kind === 'plus' || rest.kind === 'minus') {
      cursor.fail('unexpected-token', 'only one modifier is allowed per roll');
    }
    cursor.fail('unexpected-token', `unexpected ${DESCRIBE[rest.kind]} after the roll`);
  }

  if (count <= 0) cursor.fail('non-positive-count', 'the number of dice must be at least 1');
  if (sides <= 0) cursor.fail('non-positive-sides', 'dice must have at least 1 side');
  if (count > limits.maxCount) throw new OutOfRangeError('count', count, limits.maxCount, clause);
  if (sides > limits.maxSides) throw new OutOfRangeError('sides', sides, limits.maxSides, clause);
  if (modifier > limits.maxModifier) {
    throw new OutOfRangeError('modifier', modifier, limits.maxModifier, clause);
  }

  return Object.freeze({ count, sides, modifier, operator });
}

/**
 * Parse a single clause string such as `1d20+4`. The `and` keyword is not
 * accepted here; compound input goes through the combiner.
 */
export function parseRollExpression(
  clause: string,
  limits: DiceLimits = DEFAULT_DICE_LIMITS,
): RollExpression {
  const tokens = tokenize(clause);
  return parseClauseTokens(tokens, sourceText(clause, tokens), limits);
}

function expectCount(cursor: TokenCursor): number {
  const token = cursor.next();
  if (token?.kind === 'number') return token.value;
  if (token?.kind === 'd') cursor.fail('missing-count', 'say how many dice to roll, e.g. 1d6');
  return cursor.fail(
    'unexpected-token',
    `expected the number of dice but found ${token ? DESCRIBE[token.kind] : 'nothing'}`,
  );
}

function expectD(cursor: TokenCursor): void {
  const token = cursor.next();
  if (token?.kind !== 'd') cursor.fail('missing-d', 'expected "d" between dice count and sides');
}

function expectSides(cursor: TokenCursor): number {
  const token = cursor.next();
  if (token?.kind === 'number') return token.value;
  if (token?.kind === 'd') cursor.fail('multiple-d', 'only one "d" is allowed per roll');
  return cursor.fail('missing-sides', 'say how many sides the dice have, e.g. 1d6');
}

function parseModifier(cursor: TokenCursor): { modifier: number; operator: RollOperator } {
  const sign = cursor.peek();
  if (sign?.kind !== 'plus' && sign?.kind !== 'minus') return { modifier: 0, operator: '+' };
  cursor.next();
  const operator: RollOperator = sign.kind === 'plus' ? '+' : '-';
  const token = cursor.next();
  if (token?.kind !== 'number') {
    return cursor.fail('missing-modifier', `expected a number after "${operator}"`);
  }
  return { modifier: token.value, operator };
}
