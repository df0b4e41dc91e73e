import PD from 'probability-distributions';
import type { RandomSource } from './randomSource';

export class DistributionRandomSource implements RandomSource {
  normal(mean: number, stddev: number): number {
    if (stddev === 0) {
      return mean;
    }
    return PD.rnorm(1, mean, stddev)[0];
  }
}
