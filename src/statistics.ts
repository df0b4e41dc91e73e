import type { Ticket } from './ticket';

export type LeadTimeSummary =
  | { hasData: false }
  | {
      hasData: true;
      count: number;
      mean: number;
      // population standard deviation
      stdev: number;
      meanPlusStdev: number;
    };

export function summarizeLeadTime(tickets: readonly Ticket[]): LeadTimeSummary {
  if (tickets.length === 0) {
    return { hasData: false };
  }
  let sum = 0;
  let sumSq = 0;
  for (const ticket of tickets) {
    sum += ticket.leadTime;
    sumSq += ticket.leadTime * ticket.leadTime;
  }
  const count = tickets.length;
  const mean = sum / count;
  // rounding can leave the variance a hair below 0
  const variance = Math.max(sumSq / count - mean * mean, 0);
  const stdev = Math.sqrt(variance);
  return { hasData: true, count, mean, stdev, meanPlusStdev: mean + stdev };
}
