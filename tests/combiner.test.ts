import { parseCompound, rollCompound, splitClauses } from '../src/dice/combiner';
import { OutOfRangeError, ParseError } from '../src/dice/errors';
import { DEFAULT_DICE_LIMITS } from '../src/dice/parser';
import { sequence } from './helpers';

describe('splitClauses', () => {
  test('splits at "and" and keeps clause text', () => {
    expect(splitClauses('1d6 and 2d4 + 1').map(g => g.clause)).toEqual(['1d6', '2d4+1']);
  });

  test('a single clause gives one group', () => {
    expect(splitClauses('3d8').map(g => g.clause)).toEqual(['3d8']);
  });

  test('keeps empty groups', () => {
    expect(splitClauses('1d6 and').map(g => g.clause)).toEqual(['1d6', '']);
    expect(splitClauses('').map(g => g.clause)).toEqual(['']);
  });
});

describe('parseCompound', () => {
  test('an invalid character names only its own clause', () => {
    let caught: unknown;
    try {
      parseCompound('1d6 and 2d4 and 1x8');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({
      reason: 'invalid-character',
      clause: '1x8',
      message: 'unexpected character "x" at position 18',
    });
  });

  test('an invalid character in a middle clause stops at the next "and"', () => {
    let caught: unknown;
    try {
      parseCompound('1d6 and 2 x 4 AND 1d8');
    } catch (e) {
      caught = e;
    }
    expect(caught).toMatchObject({ reason: 'invalid-character', clause: '2x4' });
  });

  test('rejects a trailing "and"', () => {
    expect(() => parseCompound('1d6 and')).toThrow(ParseError);
  });

  test('limits the number of clauses', () => {
    const limits = { ...DEFAULT_DICE_LIMITS, maxClauses: 2 };
    let caught: unknown;
    try {
      parseCompound('1d6 and 1d6 and 1d6', limits);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(OutOfRangeError);
    expect(caught).toMatchObject({
      field: 'clauses',
      value: 3,
      limit: 2,
      message: 'Too many rolls at once: at most 2 (got 3).',
    });
  });
});

describe('rollCompound', () => {
  test('evaluates every clause in order', () => {
    const result = rollCompound('1d6 and 1d4+2 and 2d8-1', { random: sequence([0.5, 0.25, 0.5, 0]) });
    expect(result.map(r => r.clause)).toEqual(['1d6', '1d4+2', '2d8-1']);
    expect(result.map(r => r.outcome.modifiedTotal)).toEqual([4, 4, 5]);
    expect(result[2].outcome.rolls).toEqual([5, 1]);
    expect(result[1].text).toBe('*rolls a 4* _(1d4+2 = 2 + 2)_ _(min: 3, max: 6)_');
  });

  test('draws nothing when any clause is malformed', () => {
    const random = sequence([0.5, 0.5]);
    expect(() => rollCompound('1d6 and 1d', { random })).toThrow(ParseError);
    expect(random.calls()).toBe(0);
  });

  test('draws nothing when a later clause is out of range', () => {
    const random = sequence([0.5]);
    expect(() => rollCompound('1d6 and 1d5000', { random })).toThrow(OutOfRangeError);
    expect(random.calls()).toBe(0);
  });
});
