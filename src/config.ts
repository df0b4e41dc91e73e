import { z } from 'zod';
import { ConfigurationError } from './errors';

export const simulationConfigSchema = z.object({
  days: z.number().int().min(1).default(20),
  meanArrivalsPerDay: z.number().nonnegative().default(1.0),
  stddevArrivalsPerDay: z.number().nonnegative().default(1.0),
  meanEffort: z.number().default(6.0),
  stddevEffort: z.number().nonnegative().default(4.0),
  minEffort: z.number().int().min(1).default(1),
  dailyCapacityHours: z.number().int().nonnegative().default(8),
  wipCapHoursPerTicket: z.number().int().min(1).default(2),
  // runs of at most this many days print every arrival and ticket
  detailDays: z.number().int().nonnegative().default(20),
  seed: z.number().int().optional(),
});

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;

export const simulationSetConfigSchema = simulationConfigSchema.pick({
  days: true,
  dailyCapacityHours: true,
  wipCapHoursPerTicket: true,
  minEffort: true,
});

export type SimulationSetConfig = z.infer<typeof simulationSetConfigSchema>;
export type SimulationSetConfigInput = z.input<typeof simulationSetConfigSchema>;

export function parseConfig<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid simulation configuration: ${issues.join('; ')}`, {
      fieldErrors: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}

export function parseSimulationConfig(input: unknown = {}): SimulationConfig {
  return parseConfig(simulationConfigSchema, input);
}
