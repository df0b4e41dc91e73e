import { Ticket } from './ticket';

export class TicketFactory {
  public ticketsMade: number = 0;
  constructor(public totalDays: number) {}
  createTicketsForDay(day: number, efforts: readonly number[]): Ticket[] {
    // ticket numbers follow arrival order across the whole run, which is also the
    // index each simulation stores the ticket under
    return efforts.map((effort) => {
      const ticket = new Ticket(this.ticketsMade, day, effort, this.totalDays);
      this.ticketsMade += 1;
      return ticket;
    });
  }
}
