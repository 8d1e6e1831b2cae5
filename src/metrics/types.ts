import { z } from 'zod';
import { AGENT_TYPES } from '../params/catalog.js';

export const OutcomeName = z.string().regex(/^[a-z][a-z0-9_]*$/, 'outcome names are snake_case');

export const RunMetricInputSchema = z.object({
  agentType: z.enum(AGENT_TYPES),
  counts: z.record(OutcomeName, z.number().int().nonnegative()).default({}),
  derivedRates: z.record(OutcomeName, z.number().min(0).max(1)).optional(),
});

export const RunMetricSchema = RunMetricInputSchema.extend({
  id: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
});

/** What a finished agent run reports. */
export type RunMetricInput = z.input<typeof RunMetricInputSchema>;

/** One immutable record in the metrics log. */
export type RunMetric = z.infer<typeof RunMetricSchema>;

export interface MetricsStorage {
  /** Appends one record; throws StorageError without losing earlier records. */
  append(metric: RunMetric): Promise<void>;
  /** Most recent `limit` records for the agent type, oldest first. */
  recent(agentType: string, limit: number): Promise<RunMetric[]>;
  all(): Promise<RunMetric[]>;
  count(agentType?: string): Promise<number>;
}
