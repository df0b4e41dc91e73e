import { describe, it, expect } from 'vitest';
import { ArrivalSequence } from './arrival';
import { parseSimulationConfig } from './config';
import { ConfigurationError } from './errors';
import { DistributionRandomSource, SeededRandomSource } from './random';
import { createRandomSource, runSimulation } from './run';

describe('createRandomSource', () => {
  it('seeds the generator when a seed is given', () => {
    expect(createRandomSource(5)).toBeInstanceOf(SeededRandomSource);
    expect(createRandomSource()).toBeInstanceOf(DistributionRandomSource);
  });
});

describe('runSimulation', () => {
  it('repeats a seeded run exactly', () => {
    const config = parseSimulationConfig({ days: 30, seed: 11 });
    const run = () => {
      const set = runSimulation(config);
      return {
        arrivals: set.arrivalLog.map((entry) => entry.tickets.map((ticket) => ticket.effort)),
        leadTimes: set.simulations.map((sim) => sim.tickets.map((ticket) => ticket.leadTime)),
      };
    };
    expect(run()).toEqual(run());
  });

  it('replays given arrivals against every policy', () => {
    const config = parseSimulationConfig({ days: 3 });
    const set = runSimulation(config, new ArrivalSequence([{ day: 0, effort: 4 }]));
    expect(set.simulations).toHaveLength(5);
    for (const sim of set.simulations) {
      expect(sim.tickets[0].leadTime).toBe(1);
    }
  });

  it('holds given arrivals to the configured minimum effort', () => {
    const config = parseSimulationConfig({ days: 3, minEffort: 4 });
    expect(() => runSimulation(config, new ArrivalSequence([{ day: 0, effort: 1 }]))).toThrow(ConfigurationError);
  });
});
