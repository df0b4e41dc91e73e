import type { Ticket } from '../ticket';
import { compareByArrival, GreedyPolicy, PolicyKind } from './policy';

export class OldestShortestFirstPolicy extends GreedyPolicy {
  readonly kind = PolicyKind.OldestShortestFirst;
  order(day: number, tickets: readonly Ticket[]): Ticket[] {
    return tickets
      .slice()
      .sort(
        (a, b) =>
          a.startDay - b.startDay || a.remainingOn(day) - b.remainingOn(day) || compareByArrival(a, b),
      );
  }
}
