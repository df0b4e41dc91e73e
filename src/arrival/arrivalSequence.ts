import { ConfigurationError } from '../errors';
import type { Arrival, ArrivalSource } from './arrivalSource';

/**
 * A fixed list of arrivals, replayed as given. Arrivals on the same day keep
 * their relative order.
 */
export class ArrivalSequence implements ArrivalSource {
  private effortsByDay = new Map<number, number[]>();
  constructor(readonly arrivals: readonly Arrival[]) {
    for (const { day, effort } of arrivals) {
      if (!Number.isInteger(day) || day < 0) {
        throw new ConfigurationError(`Arrival day must be a non-negative integer, got ${day}`, { day });
      }
      if (!Number.isInteger(effort) || effort < 1) {
        throw new ConfigurationError(`Arrival effort must be a positive integer, got ${effort}`, { effort });
      }
      const efforts = this.effortsByDay.get(day) ?? [];
      efforts.push(effort);
      this.effortsByDay.set(day, efforts);
    }
  }
  get lastDay(): number | null {
    if (this.arrivals.length === 0) {
      return null;
    }
    return Math.max(...this.arrivals.map((arrival) => arrival.day));
  }
  effortsForDay(day: number): number[] {
    return (this.effortsByDay.get(day) ?? []).slice();
  }
}
