import { AgeWeightedShortestFirstPolicy } from './ageWeightedShortestFirstPolicy';
import { EqualWorkingPolicy } from './equalWorkingPolicy';
import { OldestFirstPolicy } from './oldestFirstPolicy';
import { OldestShortestFirstPolicy } from './oldestShortestFirstPolicy';
import { PolicyKind } from './policy';
import type { Policy } from './policy';
import { ShortestFirstPolicy } from './shortestFirstPolicy';

export interface PolicyOptions {
  wipCapHoursPerTicket: number;
}

export function createPolicy(kind: PolicyKind, options: PolicyOptions): Policy {
  switch (kind) {
    case PolicyKind.EqualWorking:
      return new EqualWorkingPolicy(options.wipCapHoursPerTicket);
    case PolicyKind.OldestFirst:
      return new OldestFirstPolicy();
    case PolicyKind.ShortestFirst:
      return new ShortestFirstPolicy();
    case PolicyKind.OldestShortestFirst:
      return new OldestShortestFirstPolicy();
    case PolicyKind.AgeWeightedShortestFirst:
      return new AgeWeightedShortestFirstPolicy();
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unknown policy: ${String(unknownKind)}`);
    }
  }
}
