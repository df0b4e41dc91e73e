import type { SimulationConfig } from '../config';
import { randomValueInt } from '../random';
import type { RandomSource } from '../random';
import type { ArrivalSource } from './arrivalSource';

export type ArrivalGeneratorOptions = Pick<
  SimulationConfig,
  'meanArrivalsPerDay' | 'stddevArrivalsPerDay' | 'meanEffort' | 'stddevEffort' | 'minEffort'
>;

export class ArrivalGenerator implements ArrivalSource {
  private effortsByDay = new Map<number, number[]>();
  constructor(
    public random: RandomSource,
    public options: ArrivalGeneratorOptions,
  ) {}
  generateDay(): number[] {
    const { meanArrivalsPerDay, stddevArrivalsPerDay, meanEffort, stddevEffort, minEffort } = this.options;
    const count = randomValueInt(this.random, meanArrivalsPerDay, stddevArrivalsPerDay, 0);
    const efforts: number[] = [];
    for (let i = 0; i < count; i++) {
      efforts.push(randomValueInt(this.random, meanEffort, stddevEffort, minEffort));
    }
    return efforts;
  }
  effortsForDay(day: number): number[] {
    // A day is drawn once. Asking again hands back the same efforts, so every
    // consumer of a day sees the same arrivals.
    let efforts = this.effortsByDay.get(day);
    if (efforts === undefined) {
      efforts = this.generateDay();
      this.effortsByDay.set(day, efforts);
    }
    return efforts.slice();
  }
}
