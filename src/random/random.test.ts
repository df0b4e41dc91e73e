import { describe, it, expect } from 'vitest';
import { DistributionRandomSource } from './distributionRandomSource';
import { randomValueInt } from './randomSource';
import type { RandomSource } from './randomSource';
import { SeededRandomSource } from './seededRandomSource';

function constant(value: number): RandomSource {
  return { normal: () => value };
}

function draws(random: SeededRandomSource, count: number): number[] {
  return Array.from(Array(count)).map(() => random.normal(0, 1));
}

describe('randomValueInt', () => {
  it('rounds to the nearest integer', () => {
    expect(randomValueInt(constant(2.4), 0, 1, 0)).toBe(2);
    expect(randomValueInt(constant(2.5), 0, 1, 0)).toBe(3);
  });

  it('keeps the value at or above the lowest allowed', () => {
    expect(randomValueInt(constant(-4), 0, 1, 0)).toBe(0);
    expect(randomValueInt(constant(3), 0, 1, 5)).toBe(5);
  });
});

describe('SeededRandomSource', () => {
  it('repeats the same draws for the same seed', () => {
    expect(draws(new SeededRandomSource(42), 6)).toEqual(draws(new SeededRandomSource(42), 6));
  });

  it('draws differently for another seed', () => {
    expect(draws(new SeededRandomSource(1), 6)).not.toEqual(draws(new SeededRandomSource(2), 6));
  });

  it('draws uniform values in [0, 1)', () => {
    const random = new SeededRandomSource(7);
    for (let i = 0; i < 100; i++) {
      const value = random.uniform();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('returns the mean without spread', () => {
    expect(new SeededRandomSource(3).normal(10, 0)).toBe(10);
  });
});

describe('DistributionRandomSource', () => {
  it('returns the mean without spread', () => {
    expect(new DistributionRandomSource().normal(6, 0)).toBe(6);
  });

  it('draws finite values', () => {
    const random = new DistributionRandomSource();
    for (let i = 0; i < 20; i++) {
      expect(Number.isFinite(random.normal(6, 4))).toBe(true);
    }
  });
});
