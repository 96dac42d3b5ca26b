import { evaluateRoll } from '../src/dice/evaluator';
import { formatRollFragment, formatRollMessage, MULTI_ROLL_SEPARATOR, type RenderedRoll } from '../src/dice/formatter';
import { parseRollExpression } from '../src/dice/parser';
import { sequence } from './helpers';

function rendered(clause: string, values: number[]): RenderedRoll {
  const outcome = evaluateRoll(parseRollExpression(clause), sequence(values));
  return { clause, outcome, text: formatRollFragment(clause, outcome) };
}

describe('formatRollFragment', () => {
  test('shows total, working and bounds', () => {
    const roll = rendered('2d6+3', [0.5, 0]);
    expect(roll.text).toBe('*rolls a 8* _(2d6+3 = 5 + 3)_ _(min: 5, max: 15)_');
  });

  test('shows a zero modifier as "+ 0"', () => {
    const roll = rendered('1d20', [0.5]);
    expect(roll.text).toBe('*rolls a 11* _(1d20 = 11 + 0)_ _(min: 1, max: 20)_');
  });

  test('shows a negative modifier with "-"', () => {
    const roll = rendered('2d8-1', [0.5, 0]);
    expect(roll.text).toBe('*rolls a 5* _(2d8-1 = 6 - 1)_ _(min: 1, max: 15)_');
  });
});

describe('formatRollMessage', () => {
  test('single roll is one line led by the name', () => {
    expect(formatRollMessage('Kim', [rendered('2d6+3', [0.5, 0])])).toBe(
      '*Kim* *rolls a 8* _(2d6+3 = 5 + 3)_ _(min: 5, max: 15)_',
    );
  });

  test('several rolls share the name and are joined one per line', () => {
    const a = rendered('1d6', [0.5]);
    const b = rendered('1d4+2', [0.25]);
    expect(formatRollMessage('Kim', [a, b])).toBe(
      '*Kim* *rolls a 4* _(1d6 = 4 + 0)_ _(min: 1, max: 6)_' +
        MULTI_ROLL_SEPARATOR +
        '*rolls a 4* _(1d4+2 = 2 + 2)_ _(min: 3, max: 6)_',
    );
    expect(MULTI_ROLL_SEPARATOR).toBe('\n\t and ');
  });
});
