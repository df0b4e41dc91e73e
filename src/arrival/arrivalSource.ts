export interface ArrivalSource {
  // the efforts of the tickets arriving on the given day, in arrival order
  effortsForDay(day: number): number[];
  // the last day with an arrival, for sources that know it up front
  readonly lastDay?: number | null;
}

export interface Arrival {
  day: number;
  effort: number;
}
