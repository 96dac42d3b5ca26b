/**
 * Error types raised by the dice notation core.
 *
 * Every failure carries a stable `code` so command handlers can decide how
 * to present it without string matching on messages.
 *
 * @module dice/errors
 */

export type DiceErrorCode = 'PARSE_ERROR' | 'OUT_OF_RANGE' | 'RANDOM_SOURCE';

export class DiceError extends Error {
  constructor(
    message: string,
    public readonly code: DiceErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Enumerated reasons a roll clause can be rejected.
 */
export type ParseFailure =
  | 'empty'
  | 'invalid-character'
  | 'missing-count'
  | 'missing-d'
  | 'missing-sides'
  | 'multiple-d'
  | 'missing-modifier'
  | 'ambiguous-sign'
  | 'unexpected-token'
  | 'non-positive-count'
  | 'non-positive-sides';

/**
 * Malformed notation. `clause` is the offending clause with whitespace
 * removed (empty for an empty clause).
 */
export class ParseError extends DiceError {
  constructor(
    public readonly reason: ParseFailure,
    public readonly clause: string,
    message: string,
  ) {
    super(message, 'PARSE_ERROR');
  }
}

export type RangeField = 'count' | 'sides' | 'modifier' | 'clauses';

/**
 * Well-formed notation whose numbers exceed the configured dice limits.
 */
export class OutOfRangeError extends DiceError {
  constructor(
    public readonly field: RangeField,
    public readonly value: number,
    public readonly limit: number,
    public readonly clause: string,
  ) {
    super(describeRange(field, value, limit, clause), 'OUT_OF_RANGE');
  }
}

/**
 * The random source produced something other than a float in [0, 1).
 * Not user-correctable.
 */
export class RandomSourceError extends DiceError {
  constructor(public readonly value: number) {
    super(`random source returned ${value}, expected a number in [0, 1)`, 'RANDOM_SOURCE');
  }
}

function describeRange(field: RangeField, value: number, limit: number, clause: string): string {
  const got = Number.isFinite(value) ? String(value) : 'more';
  switch (field) {
    case 'clauses':
      return `Too many rolls at once: at most ${limit} (got ${got}).`;
    case 'count':
      return `${clause}: cannot roll more than ${limit} dice (got ${got}).`;
    case 'sides':
      return `${clause}: dice can have at most ${limit} sides (got ${got}).`;
    case 'modifier':
      return `${clause}: modifier must be at most ${limit} (got ${got}).`;
  }
}
