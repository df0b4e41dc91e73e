import type { Simulation } from './simulation';
import type { SimulationSet } from './simulationSet';
import type { LeadTimeSummary } from './statistics';

export function formatLeadTimeSummary(summary: LeadTimeSummary): string {
  if (!summary.hasData) {
    return 'Leadtime of tickets: no tickets';
  }
  const { mean, stdev, meanPlusStdev } = summary;
  return `Leadtime of tickets mean: ${mean.toFixed(2)} stdev: ${stdev.toFixed(2)} mean+stdev: ${meanPlusStdev.toFixed(2)}`;
}

export function formatSimulation(simulation: Simulation, detailDays: number): string[] {
  const lines = [simulation.name, formatLeadTimeSummary(simulation.leadTimeSummary())];
  if (simulation.tickets.length <= detailDays) {
    lines.push('# start leadtime end effort [remaining per day]');
    for (const ticket of simulation.tickets) {
      lines.push(`${ticket.id} ${ticket.toString()}`);
    }
  }
  return lines;
}

export function formatArrivals(set: SimulationSet): string[] {
  const lines = ['day, count, effort, ticket{start leadtime end effort [remaining/day]}'];
  for (const { day, tickets } of set.arrivalLog) {
    if (tickets.length === 0) {
      lines.push(`${day} 0`);
    }
    for (const ticket of tickets) {
      lines.push(`${day} ${tickets.length} ${ticket.effort} ${ticket.toString()}`);
    }
  }
  return lines;
}

/**
 * Renders a finished run: the arrivals (for short runs), the arrival averages and
 * each policy's lead time summary.
 */
export function formatReport(set: SimulationSet, detailDays: number): string {
  const detailed = set.totalDays <= detailDays;
  const lines = [`Simulating ${set.totalDays} days`];
  if (detailed) {
    lines.push(...formatArrivals(set));
  }
  lines.push(
    '',
    `mean ticket count per day: ${set.meanArrivalsPerDay}`,
    `mean ticket effort per day: ${set.meanEffortPerDay}`,
    '',
  );
  for (const simulation of set.simulations) {
    lines.push(...formatSimulation(simulation, detailDays), '');
  }
  return lines.join('\n');
}
