import type { Ticket } from '../ticket';
import { compareByArrival, GreedyPolicy, PolicyKind } from './policy';

export class ShortestFirstPolicy extends GreedyPolicy {
  readonly kind = PolicyKind.ShortestFirst;
  order(day: number, tickets: readonly Ticket[]): Ticket[] {
    return tickets.slice().sort((a, b) => a.remainingOn(day) - b.remainingOn(day) || compareByArrival(a, b));
  }
}
