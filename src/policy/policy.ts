import type { Ticket } from '../ticket';

export enum PolicyKind {
  /** Every open ticket gets a capped share of the day before any leftover is handed out. */
  EqualWorking = 'Equal working',
  /** Tickets are worked in the order they arrived. */
  OldestFirst = 'Oldest first',
  /** The ticket with the least remaining work goes first. */
  ShortestFirst = 'Shortest first',
  /** Earlier arrivals go first, and within one arrival day the shortest. */
  OldestShortestFirst = 'Oldest, shortest first',
  /** Remaining work divided by the days the ticket has been open, smallest first. */
  AgeWeightedShortestFirst = 'Age weighted, shortest first',
}

export const POLICY_KINDS: readonly PolicyKind[] = [
  PolicyKind.EqualWorking,
  PolicyKind.OldestFirst,
  PolicyKind.ShortestFirst,
  PolicyKind.OldestShortestFirst,
  PolicyKind.AgeWeightedShortestFirst,
];

export interface Allocation {
  day: number;
  // hours spent on each ticket, by ticket id, for every ticket that was offered work
  hoursByTicket: Map<number, number>;
  // the hours of the first pass alone; only equal working makes a second pass
  firstPassHoursByTicket: Map<number, number>;
  totalHours: number;
}

export abstract class Policy {
  abstract readonly kind: PolicyKind;
  get name(): string {
    return this.kind;
  }
  /**
   * Burns down one day of `capacity` hours over the given tickets, which must all
   * have arrived by `day`. Every ticket is carried forward into the next day,
   * whether or not it got any work.
   */
  abstract allocate(day: number, tickets: readonly Ticket[], capacity: number): Allocation;
  protected emptyAllocation(day: number): Allocation {
    return { day, hoursByTicket: new Map(), firstPassHoursByTicket: new Map(), totalHours: 0 };
  }
  protected burn(
    allocation: Allocation,
    ticket: Ticket,
    hoursLeft: number,
    hoursOffered: number,
    firstPass: boolean = true,
  ): number {
    const left = ticket.burnDownHours(allocation.day, hoursLeft, hoursOffered);
    const spent = hoursLeft - left;
    allocation.hoursByTicket.set(ticket.id, (allocation.hoursByTicket.get(ticket.id) ?? 0) + spent);
    if (firstPass) {
      allocation.firstPassHoursByTicket.set(ticket.id, spent);
    }
    allocation.totalHours += spent;
    return left;
  }
}

/**
 * A single pass over the tickets in priority order, offering each one whatever
 * is left of the day. Subclasses only decide the order.
 */
export abstract class GreedyPolicy extends Policy {
  abstract order(day: number, tickets: readonly Ticket[]): Ticket[];
  allocate(day: number, tickets: readonly Ticket[], capacity: number): Allocation {
    const allocation = this.emptyAllocation(day);
    let hoursLeft = capacity;
    for (const ticket of this.order(day, tickets)) {
      hoursLeft = this.burn(allocation, ticket, hoursLeft, hoursLeft);
    }
    return allocation;
  }
}

export function compareByArrival(a: Ticket, b: Ticket): number {
  return a.id - b.id;
}
