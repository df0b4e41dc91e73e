import { HorizonError } from './errors';

export class Ticket {
  public remaining: number[];
  public leadTime: number = 0;
  public endDay: number | null = null;
  // the day this ticket was last burned down, so a second pass on the same day
  // continues from what the first pass left
  private lastBurnedDay: number | null = null;
  constructor(
    readonly id: number,
    readonly startDay: number,
    readonly effort: number,
    readonly totalDays: number,
  ) {
    // The remaining effort at the start of each day of the simulation, indexed by
    // day. Days before the ticket arrived stay at 0 and are never looked at.
    this.remaining = Array.from(Array(totalDays)).map(() => 0);
    this.remaining[startDay] = effort;
  }
  clone(): Ticket {
    const copy = new Ticket(this.id, this.startDay, this.effort, this.totalDays);
    copy.remaining = this.remaining.slice();
    copy.leadTime = this.leadTime;
    copy.endDay = this.endDay;
    copy.lastBurnedDay = this.lastBurnedDay;
    return copy;
  }
  remainingOn(day: number): number {
    return this.remaining[day] ?? 0;
  }
  hoursSpentOn(day: number): number {
    if (day < this.startDay || day + 1 >= this.totalDays) {
      return 0;
    }
    return this.remainingOn(day) - this.remainingOn(day + 1);
  }
  isDoneBy(day: number): boolean {
    return day >= this.startDay && this.remainingOn(day) === 0;
  }
  burnDownHours(day: number, hoursLeft: number, hoursOffered: number): number {
    // Spends at most hoursOffered of the hoursLeft for the day on this ticket and
    // returns what is left of the day's capacity. The remaining effort is always
    // carried forward into the next day, even if no work was done.
    const nextDay = day + 1;
    if (nextDay >= this.totalDays) {
      throw new HorizonError(day, this.totalDays);
    }
    let workRemaining = this.lastBurnedDay === day ? this.remaining[nextDay] : this.remaining[day];
    if (workRemaining > 0 && hoursLeft > 0) {
      const hours = Math.min(workRemaining, hoursOffered, hoursLeft);
      if (hours > 0) {
        workRemaining -= hours;
        hoursLeft -= hours;
        this.endDay = day;
        this.leadTime = nextDay - this.startDay;
      }
    }
    this.remaining[nextDay] = workRemaining;
    this.lastBurnedDay = day;
    return hoursLeft;
  }
  toString(): string {
    const end = this.endDay === null ? '-' : this.endDay;
    return `{${this.startDay} ${this.leadTime} ${end} ${this.effort} [${this.remaining.join(' ')}]}`;
  }
}
