import type { Ticket } from '../ticket';
import { GreedyPolicy, PolicyKind } from './policy';

export class OldestFirstPolicy extends GreedyPolicy {
  readonly kind = PolicyKind.OldestFirst;
  order(_day: number, tickets: readonly Ticket[]): Ticket[] {
    // simulations keep their tickets in arrival order
    return tickets.slice();
  }
}
