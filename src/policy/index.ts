export * from './ageWeightedShortestFirstPolicy';
export * from './createPolicy';
export * from './equalWorkingPolicy';
export * from './oldestFirstPolicy';
export * from './oldestShortestFirstPolicy';
export * from './policy';
export * from './shortestFirstPolicy';
