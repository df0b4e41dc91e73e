import type { RandomSource } from './randomSource';

/**
 * Reproducible normal draws for a given seed. Uniform values come from a
 * mulberry32 generator and are turned into normal values with the Box-Muller
 * transform, keeping the spare value for the next call.
 */
export class SeededRandomSource implements RandomSource {
  private state: number;
  private spare: number | null = null;
  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }
  uniform(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
  standardNormal(): number {
    if (this.spare !== null) {
      const value = this.spare;
      this.spare = null;
      return value;
    }
    // 1 - u keeps the logarithm away from 0
    const u = 1 - this.uniform();
    const v = this.uniform();
    const radius = Math.sqrt(-2 * Math.log(u));
    this.spare = radius * Math.sin(2 * Math.PI * v);
    return radius * Math.cos(2 * Math.PI * v);
  }
  normal(mean: number, stddev: number): number {
    return this.standardNormal() * stddev + mean;
  }
}
