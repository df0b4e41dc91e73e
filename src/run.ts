import { ArrivalGenerator } from './arrival';
import type { ArrivalSource } from './arrival';
import type { SimulationConfig } from './config';
import { DistributionRandomSource, SeededRandomSource } from './random';
import type { RandomSource } from './random';
import { SimulationSet } from './simulationSet';

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? new DistributionRandomSource() : new SeededRandomSource(seed);
}

export function runSimulation(
  config: SimulationConfig,
  arrivals: ArrivalSource = new ArrivalGenerator(createRandomSource(config.seed), config),
): SimulationSet {
  return new SimulationSet(config).simulate(arrivals);
}
