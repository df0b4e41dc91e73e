import type { Ticket } from '../ticket';
import { compareByArrival, GreedyPolicy, PolicyKind } from './policy';

export class AgeWeightedShortestFirstPolicy extends GreedyPolicy {
  readonly kind = PolicyKind.AgeWeightedShortestFirst;
  weight(day: number, ticket: Ticket): number {
    // a ticket that arrived today is 1 day old, so the age is never 0
    const age = day + 1 - ticket.startDay;
    return Math.floor(ticket.remainingOn(day) / age);
  }
  order(day: number, tickets: readonly Ticket[]): Ticket[] {
    return tickets
      .slice()
      .sort((a, b) => this.weight(day, a) - this.weight(day, b) || compareByArrival(a, b));
  }
}
