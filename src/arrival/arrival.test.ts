import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors';
import type { RandomSource } from '../random';
import { ArrivalGenerator } from './arrivalGenerator';
import { ArrivalSequence } from './arrivalSequence';

class ScriptedRandomSource implements RandomSource {
  calls: Array<[number, number]> = [];
  constructor(private values: number[]) {}
  normal(mean: number, stddev: number): number {
    this.calls.push([mean, stddev]);
    const value = this.values.shift();
    if (value === undefined) {
      throw new Error('No scripted value left');
    }
    return value;
  }
}

const options = {
  meanArrivalsPerDay: 1,
  stddevArrivalsPerDay: 1,
  meanEffort: 6,
  stddevEffort: 4,
  minEffort: 1,
};

describe('ArrivalGenerator', () => {
  it('draws a count and then one effort per ticket', () => {
    const random = new ScriptedRandomSource([1.6, 3.2, -5]);
    const generator = new ArrivalGenerator(random, options);
    expect(generator.effortsForDay(0)).toEqual([3, 1]);
    expect(random.calls).toEqual([
      [1, 1],
      [6, 4],
      [6, 4],
    ]);
  });

  it('draws each day only once', () => {
    const random = new ScriptedRandomSource([1.6, 3.2, -5]);
    const generator = new ArrivalGenerator(random, options);
    const first = generator.effortsForDay(0);
    first.push(99);
    expect(generator.effortsForDay(0)).toEqual([3, 1]);
    expect(random.calls).toHaveLength(3);
  });

  it('never draws a negative count', () => {
    const random = new ScriptedRandomSource([-0.4, -3]);
    const generator = new ArrivalGenerator(random, options);
    expect(generator.effortsForDay(0)).toEqual([]);
    expect(generator.effortsForDay(1)).toEqual([]);
    expect(random.calls).toHaveLength(2);
  });

  it('keeps efforts at the configured minimum', () => {
    const random = new ScriptedRandomSource([1, 0.2]);
    const generator = new ArrivalGenerator(random, { ...options, minEffort: 2 });
    expect(generator.effortsForDay(0)).toEqual([2]);
  });
});

describe('ArrivalSequence', () => {
  it('replays the arrivals of each day in the given order', () => {
    const sequence = new ArrivalSequence([
      { day: 0, effort: 5 },
      { day: 2, effort: 3 },
      { day: 0, effort: 10 },
    ]);
    expect(sequence.effortsForDay(0)).toEqual([5, 10]);
    expect(sequence.effortsForDay(1)).toEqual([]);
    expect(sequence.effortsForDay(2)).toEqual([3]);
    expect(sequence.lastDay).toBe(2);
  });

  it('has no last day without arrivals', () => {
    expect(new ArrivalSequence([]).lastDay).toBeNull();
  });

  it('rejects negative days and efforts below one hour', () => {
    expect(() => new ArrivalSequence([{ day: -1, effort: 3 }])).toThrow(ConfigurationError);
    expect(() => new ArrivalSequence([{ day: 0, effort: 0 }])).toThrow(ConfigurationError);
    expect(() => new ArrivalSequence([{ day: 0, effort: 2.5 }])).toThrow(ConfigurationError);
  });
});
