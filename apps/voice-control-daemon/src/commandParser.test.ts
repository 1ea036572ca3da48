import { createDefaultRegistry } from './actionRegistry';
import { classify, magnitudeOf, parseDelay, parsePercent, splitChain } from './commandParser';

const registry = createDefaultRegistry();

describe('splitChain', () => {
  it('splits on standalone and / then', () => {
    expect(splitChain('turn on and dim then brighten')).toEqual(['turn on', 'dim', 'brighten']);
    expect(splitChain('turn on and then dim')).toEqual(['turn on', 'dim']);
  });

  it('keeps words that merely contain the separators', () => {
    expect(splitChain('brandon thenar lights')).toEqual(['brandon thenar lights']);
  });

  it('drops empty parts', () => {
    expect(splitChain('turn on and ')).toEqual(['turn on']);
    expect(splitChain('   ')).toEqual([]);
  });
});

describe('parseDelay', () => {
  it('reads amount, unit and the deferred action', () => {
    expect(parseDelay('in 5 minutes turn off lights')).toEqual({
      amount: 5,
      unit: 'minute',
      actionText: 'turn off lights',
    });
    expect(parseDelay('after 1 hour dim')).toEqual({ amount: 1, unit: 'hour', actionText: 'dim' });
  });

  it('needs an action after the duration', () => {
    expect(parseDelay('in 5 minutes')).toBeNull();
  });
});

describe('parsePercent', () => {
  it('reads spoken percentages', () => {
    expect(parsePercent('set lights to 40 percent')).toBe(40);
    expect(parsePercent('75%')).toBe(75);
    expect(parsePercent('dim')).toBeNull();
  });
});

describe('magnitudeOf', () => {
  it('maps magnitude words', () => {
    expect(magnitudeOf('dim a little')).toBe('small');
    expect(magnitudeOf('brighten a lot')).toBe('large');
    expect(magnitudeOf('dim')).toBe('default');
  });
});

describe('classify', () => {
  it('puts delays first', () => {
    expect(classify('in 10 seconds undo', registry, 70)).toEqual({
      type: 'delay',
      amount: 10,
      unit: 'second',
      actionText: 'undo',
    });
  });

  it('recognizes undo and its aliases', () => {
    expect(classify('undo', registry, 70)).toEqual({ type: 'undo' });
    expect(classify('go back', registry, 70)).toEqual({ type: 'undo' });
    expect(classify('Cancel that', registry, 70)).toEqual({ type: 'undo' });
  });

  it('converts percentages to clamped brightness', () => {
    expect(classify('lights to 50 percent', registry, 70)).toEqual({ type: 'percent', percent: 50, brightness: 127 });
    expect(classify('150 percent', registry, 70)).toEqual({ type: 'percent', percent: 150, brightness: 254 });
    expect(classify('0 percent', registry, 70)).toEqual({ type: 'percent', percent: 0, brightness: 1 });
  });

  it('matches exact phrases with their magnitude', () => {
    const result = classify('dim the lights a little', registry, 70);
    expect(result.type === 'action' && [result.match.definition.action, result.how, result.magnitude]).toEqual([
      'dim',
      'exact',
      'small',
    ]);
  });

  it('falls back to fuzzy matching above the threshold', () => {
    const result = classify('turn of the lights', registry, 70);
    expect(result.type === 'action' && [result.match.definition.action, result.how]).toEqual([
      'turn off',
      'fuzzy',
    ]);
  });

  it('reports gibberish as unknown', () => {
    expect(classify('asdkjhasd', registry, 70).type).toBe('unknown');
  });
});
