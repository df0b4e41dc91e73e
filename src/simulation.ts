import { HorizonError, SimulationStateError } from './errors';
import type { Allocation, Policy } from './policy';
import { summarizeLeadTime } from './statistics';
import type { LeadTimeSummary } from './statistics';
import type { Ticket } from './ticket';

export class Simulation {
  tickets: Ticket[] = [];
  allocations: Allocation[] = [];
  hoursSpentByDay: number[];
  constructor(
    public policy: Policy,
    public totalDays: number,
    public dailyCapacityHours: number,
  ) {
    this.hoursSpentByDay = Array.from(Array(totalDays)).map(() => 0);
  }
  get name(): string {
    return this.policy.name;
  }
  addTickets(tickets: readonly Ticket[]) {
    // Each simulation works on its own copies, as every policy burns the tickets
    // down differently. A ticket is stored at the index of its id, so tickets have
    // to come in arrival order.
    for (const ticket of tickets) {
      if (ticket.id !== this.tickets.length) {
        throw new SimulationStateError(
          `Ticket ${ticket.id} added out of arrival order, expected ticket ${this.tickets.length}`,
        );
      }
      this.tickets.push(ticket.clone());
    }
  }
  burnDown(day: number): Allocation {
    if (day + 1 >= this.totalDays) {
      throw new HorizonError(day, this.totalDays);
    }
    const allocation = this.policy.allocate(day, this.tickets, this.dailyCapacityHours);
    this.allocations.push(allocation);
    this.hoursSpentByDay[day] = allocation.totalHours;
    return allocation;
  }
  openTicketCount(day: number): number {
    return this.tickets.filter((ticket) => ticket.startDay <= day && ticket.remainingOn(day) > 0).length;
  }
  leadTimeSummary(): LeadTimeSummary {
    return summarizeLeadTime(this.tickets);
  }
}
