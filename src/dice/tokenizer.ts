import { ParseError } from './errors';

/**
 * Dice notation tokenizer
 *
 * Turns a raw `!roll` argument such as `2d6 + 3 and 1d20-1` into a flat
 * token stream. Whitespace is skipped; every other character must belong to
 * a number, the `d` separator, a sign, or the `and` keyword.
 *
 * @module dice/tokenizer
 */

interface Span {
  /** Offset of the first character in the source string. */
  start: number;
  /** Offset one past the last character. */
  end: number;
}

export type Token =
  | (Span & { kind: 'number'; raw: string; value: number })
  | (Span & { kind: 'd' })
  | (Span & { kind: 'plus' })
  | (Span & { kind: 'minus' })
  | (Span & { kind: 'and' });

export type TokenKind = Token['kind'];

const DIGIT = /[0-9]/;
const SPACE = /\s/;

/**
 * Tokenize dice notation.
 *
 * `d` and the `and` keyword are matched case-insensitively, so `1D6 AND 2d4`
 * and `1d6and2d4` both produce two clauses' worth of tokens.
 *
 * @throws {ParseError} `invalid-character` on anything outside the alphabet.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (SPACE.test(ch)) {
      i++;
      continue;
    }
    if (DIGIT.test(ch)) {
      let end = i + 1;
      while (end < input.length && DIGIT.test(input[end])) end++;
      const raw = input.slice(i, end);
      tokens.push({ kind: 'number', raw, value: Number(raw), start: i, end });
      i = end;
      continue;
    }
    if (ch === 'd' || ch === 'D') {
      tokens.push({ kind: 'd', start: i, end: i + 1 });
      i++;
      continue;
    }
    if (ch === '+' || ch === '-') {
      tokens.push({ kind: ch === '+' ? 'plus' : 'minus', start: i, end: i + 1 });
      i++;
      continue;
    }
    if (input.slice(i, i + 3).toLowerCase() === 'and') {
      tokens.push({ kind: 'and', start: i, end: i + 3 });
      i += 3;
      continue;
    }
    throw new ParseError(
      'invalid-character',
      enclosingClause(input, tokens, i),
      `unexpected character "${ch}" at position ${i + 1}`,
    );
  }
  return tokens;
}

/**
 * Text of the clause around offset `at`: from the end of the last `and`
 * already read up to the next `and` in the source.
 */
function enclosingClause(input: string, tokens: readonly Token[], at: number): string {
  let start = 0;
  for (const token of tokens) {
    if (token.kind === 'and') start = token.end;
  }
  const next = input.slice(at).search(/and/i);
  return compact(input.slice(start, next === -1 ? input.length : at + next));
}

/**
 * Source text covered by `tokens`, with whitespace removed. This is the
 * clause text echoed back in roll results.
 */
export function sourceText(input: string, tokens: readonly Token[]): string {
  if (tokens.length === 0) return '';
  return compact(input.slice(tokens[0].start, tokens[tokens.length - 1].end));
}

function compact(text: string): string {
  return text.replace(/\s+/g, '');
}
