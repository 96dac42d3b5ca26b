import { RandomSourceError } from '../src/dice/errors';
import { createDispatcher, isSuspicious, parseCommandText } from '../src/handler';
import { InMemoryQuestRepository } from '../src/quests/inMemoryQuestRepository';
import { loggingQueue } from '../src/queues';
import { FakeGateway, context, sequence } from './helpers';

describe('parseCommandText', () => {
  test('splits name and arguments', () => {
    expect(parseCommandText('!roll 1d6 and 2d4')).toEqual({ name: 'roll', args: '1d6 and 2d4' });
  });

  test('lower-cases the name and trims', () => {
    expect(parseCommandText('  !HELP  ')).toEqual({ name: 'help', args: '' });
  });

  test('ignores text that is not a command', () => {
    expect(parseCommandText('hello')).toBeNull();
    expect(parseCommandText('!')).toBeNull();
    expect(parseCommandText('! roll 1d6')).toBeNull();
  });

  test('honours a custom prefix', () => {
    expect(parseCommandText('?roll 2d6', '?')).toEqual({ name: 'roll', args: '2d6' });
    expect(parseCommandText('!roll 2d6', '?')).toBeNull();
  });
});

describe('isSuspicious', () => {
  test('flags long messages', () => {
    expect(isSuspicious('x'.repeat(501))).toBe(true);
    expect(isSuspicious('x'.repeat(500))).toBe(false);
  });

  test('flags code and substitutions', () => {
    expect(isSuspicious('!roll `1d6`')).toBe(true);
    expect(isSuspicious('!roll ${x}')).toBe(true);
    expect(isSuspicious('!roll $(id)')).toBe(true);
    expect(isSuspicious('data:text: aGVsbG8=')).toBe(true);
  });

  test('allows quest pipes and Slack mentions', () => {
    expect(isSuspicious('!quest new Find the ring | lost | <@U123>')).toBe(false);
  });
});

describe('createDispatcher', () => {
  afterEach(async () => {
    await loggingQueue.drain();
  });

  function setup(options: { enabled?: { roll?: boolean; quest?: boolean; help?: boolean } } = {}) {
    const gateway = new FakeGateway({ U1: 'Kim' });
    const dispatcher = createDispatcher({
      gateway,
      quests: new InMemoryQuestRepository(),
      random: sequence([0.5, 0]),
      enabled: options.enabled,
    });
    return { gateway, dispatcher };
  }

  test('routes !roll to the roll command', async () => {
    const { gateway, dispatcher } = setup();

    expect(await dispatcher.dispatch(context, '!roll 2d6+3')).toBe(true);

    expect(gateway.texts).toEqual(['*Kim* *rolls a 8* _(2d6+3 = 5 + 3)_ _(min: 5, max: 15)_']);
  });

  test('routes !quest and !help', async () => {
    const { gateway, dispatcher } = setup();

    await dispatcher.dispatch(context, '!quest list');
    await dispatcher.dispatch(context, '!help');

    expect(gateway.texts[0]).toBe('No active quests.');
    expect(gateway.texts[1]).toContain('    quest\n    roll');
  });

  test('ignores plain text and unknown commands', async () => {
    const { gateway, dispatcher } = setup();

    expect(await dispatcher.dispatch(context, 'hello')).toBe(false);
    expect(await dispatcher.dispatch(context, '!dance')).toBe(false);
    expect(gateway.posts).toEqual([]);
  });

  test('disabled commands are neither run nor listed in help', async () => {
    const { gateway, dispatcher } = setup({ enabled: { quest: false } });

    expect(dispatcher.commands).toEqual(['help', 'roll']);
    expect(await dispatcher.dispatch(context, '!quest list')).toBe(false);
    await dispatcher.dispatch(context, '!help');
    expect(gateway.texts).toEqual([
      '```\navailable help topics:\n    help\n    roll\n\nTry `!help [topic]` for information on a specific topic.\n```',
    ]);
  });

  test('command failures are rethrown', async () => {
    const gateway = new FakeGateway();
    const dispatcher = createDispatcher({
      gateway,
      quests: new InMemoryQuestRepository(),
      random: () => 2,
    });

    await expect(dispatcher.dispatch(context, '!roll 1d6')).rejects.toBeInstanceOf(RandomSourceError);
  });
});
