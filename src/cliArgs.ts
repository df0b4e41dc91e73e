import { parseArgs } from 'node:util';
import { UsageError } from './errors';

export interface CliOptions {
  days?: number;
  seed?: number;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError();
  }
  return Number(value);
}

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: { seed: { type: 'string' } },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(args: string[]): CliOptions {
  const { values, positionals } = readArgs(args);
  if (positionals.length > 1) {
    throw new UsageError();
  }
  const options: CliOptions = {};
  if (positionals.length === 1) {
    options.days = parseInteger(positionals[0]);
  }
  if (values.seed !== undefined) {
    options.seed = parseInteger(values.seed);
  }
  return options;
}
