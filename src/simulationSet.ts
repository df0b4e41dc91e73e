import type { ArrivalSource } from './arrival';
import { parseConfig, simulationSetConfigSchema } from './config';
import type { SimulationSetConfig, SimulationSetConfigInput } from './config';
import { ConfigurationError, SimulationStateError } from './errors';
import { createPolicy, POLICY_KINDS } from './policy';
import type { PolicyKind } from './policy';
import { Simulation } from './simulation';
import type { Ticket } from './ticket';
import { TicketFactory } from './ticketFactory';

export interface ArrivalLogEntry {
  day: number;
  // snapshots of the tickets as they arrived, before any work
  tickets: Ticket[];
}

export class SimulationSet {
  config: SimulationSetConfig;
  simulations: Simulation[];
  arrivalLog: ArrivalLogEntry[] = [];
  ticketFactory: TicketFactory;
  private simulated: boolean = false;
  constructor(
    input: SimulationSetConfigInput,
    public policyKinds: readonly PolicyKind[] = POLICY_KINDS,
  ) {
    const config = parseConfig(simulationSetConfigSchema, input);
    this.config = config;
    this.ticketFactory = new TicketFactory(config.days);
    this.simulations = policyKinds.map(
      (kind) =>
        new Simulation(
          createPolicy(kind, { wipCapHoursPerTicket: config.wipCapHoursPerTicket }),
          config.days,
          config.dailyCapacityHours,
        ),
    );
  }
  get totalDays(): number {
    return this.config.days;
  }
  get totalArrivals(): number {
    return this.arrivalLog.reduce((sum, entry) => sum + entry.tickets.length, 0);
  }
  get totalEffort(): number {
    return this.arrivalLog.reduce(
      (sum, entry) => sum + entry.tickets.reduce((daySum, ticket) => daySum + ticket.effort, 0),
      0,
    );
  }
  get meanArrivalsPerDay(): number {
    return this.totalArrivals / this.totalDays;
  }
  get meanEffortPerDay(): number {
    return this.totalEffort / this.totalDays;
  }
  simulation(kind: PolicyKind): Simulation {
    const simulation = this.simulations.find((sim) => sim.policy.kind === kind);
    if (simulation === undefined) {
      throw new SimulationStateError(`No simulation for policy '${kind}' in this set`);
    }
    return simulation;
  }
  addTickets(tickets: readonly Ticket[]) {
    for (const simulation of this.simulations) {
      simulation.addTickets(tickets);
    }
  }
  burnDown(day: number) {
    for (const simulation of this.simulations) {
      simulation.burnDown(day);
    }
  }
  private checkEfforts(day: number, efforts: readonly number[]) {
    const { minEffort } = this.config;
    for (const effort of efforts) {
      if (!Number.isInteger(effort) || effort < minEffort) {
        throw new ConfigurationError(
          `Arrival on day ${day} has effort ${effort}, expected a whole number of at least ${minEffort} hours`,
          { day, effort, minEffort },
        );
      }
    }
  }
  simulate(arrivals: ArrivalSource): this {
    if (this.simulated) {
      throw new SimulationStateError('A simulation set can only simulate once');
    }
    const lastDay = arrivals.lastDay ?? null;
    if (lastDay !== null && lastDay >= this.totalDays) {
      throw new ConfigurationError(`Arrival on day ${lastDay} is outside the ${this.totalDays} day horizon`, {
        day: lastDay,
      });
    }
    // every day is drawn once and checked before any work starts
    const effortsByDay = Array.from(Array(this.totalDays)).map((_, day) => arrivals.effortsForDay(day));
    effortsByDay.forEach((efforts, day) => this.checkEfforts(day, efforts));
    this.simulated = true;
    for (let day = 0; day < this.totalDays; day++) {
      // every simulation gets its own copy of the day's arrivals
      const tickets = this.ticketFactory.createTicketsForDay(day, effortsByDay[day]);
      this.arrivalLog.push({ day, tickets: tickets.map((ticket) => ticket.clone()) });
      this.addTickets(tickets);
      // the last day has no following day to carry the remaining work into
      if (day < this.totalDays - 1) {
        this.burnDown(day);
      }
    }
    return this;
  }
}
