export interface RandomSource {
  // a single draw from a normal distribution
  normal(mean: number, stddev: number): number;
}

/**
 * Draws from a normal distribution, rounds to the nearest integer and keeps the
 * result at or above `lowest`.
 */
export function randomValueInt(random: RandomSource, mean: number, stddev: number, lowest: number): number {
  const value = Math.round(random.normal(mean, stddev));
  return Math.max(lowest, value);
}
