import type { Ticket } from '../ticket';
import { Policy, PolicyKind } from './policy';
import type { Allocation } from './policy';

export class EqualWorkingPolicy extends Policy {
  readonly kind = PolicyKind.EqualWorking;
  constructor(public hoursPerTicket: number = 2) {
    super();
  }
  allocate(day: number, tickets: readonly Ticket[], capacity: number): Allocation {
    const allocation = this.emptyAllocation(day);
    let hoursLeft = capacity;
    for (const ticket of tickets) {
      hoursLeft = this.burn(allocation, ticket, hoursLeft, this.hoursPerTicket);
    }
    if (hoursLeft > 0) {
      // hand the rest of the day out in arrival order, without the cap
      for (const ticket of tickets) {
        hoursLeft = this.burn(allocation, ticket, hoursLeft, hoursLeft, false);
      }
    }
    return allocation;
  }
}
