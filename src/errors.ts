export class ConfigurationError extends Error {
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

export class HorizonError extends Error {
  public day: number;
  public totalDays: number;

  constructor(day: number, totalDays: number) {
    super(`Day ${day} has no following day within the ${totalDays} day horizon`);
    this.name = 'HorizonError';
    this.day = day;
    this.totalDays = totalDays;
  }
}

export class SimulationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationStateError';
  }
}

export const USAGE = 'usage: wip-sim [days] [--seed <n>]';

export class UsageError extends Error {
  constructor(detail?: string) {
    super(detail ? `${USAGE}\n${detail}` : USAGE);
    this.name = 'UsageError';
  }
}
