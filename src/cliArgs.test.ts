import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './cliArgs';
import { USAGE, UsageError } from './errors';

describe('parseCliArgs', () => {
  it('takes no options without arguments', () => {
    expect(parseCliArgs([])).toEqual({});
  });

  it('reads the number of days', () => {
    expect(parseCliArgs(['100'])).toEqual({ days: 100 });
  });

  it('reads a seed', () => {
    expect(parseCliArgs(['50', '--seed', '7'])).toEqual({ days: 50, seed: 7 });
    expect(parseCliArgs(['--seed=3'])).toEqual({ seed: 3 });
  });

  it('rejects more than one positional argument', () => {
    expect(() => parseCliArgs(['10', '20'])).toThrow(UsageError);
  });

  it('rejects days that are not a number', () => {
    expect(() => parseCliArgs(['ten'])).toThrow(USAGE);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(UsageError);
  });
});
