import { randomUUID } from 'node:crypto';
import {
  RunMetricInputSchema,
  type MetricsStorage,
  type RunMetric,
  type RunMetricInput,
} from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('metrics');

/**
 * MetricsRecorder: stamps a finished run's outcome counts with an id and a
 * timestamp and appends them to the metrics log.
 */
export class MetricsRecorder {
  private storage: MetricsStorage;
  private now: () => Date;

  constructor(storage: MetricsStorage, now: () => Date = () => new Date()) {
    this.storage = storage;
    this.now = now;
  }

  async record(input: RunMetricInput): Promise<RunMetric> {
    const parsed = RunMetricInputSchema.parse(input);
    const metric: RunMetric = {
      ...parsed,
      id: randomUUID(),
      timestamp: this.now().toISOString(),
    };

    await this.storage.append(metric);
    const total = Object.values(metric.counts).reduce((a, b) => a + b, 0);
    log.debug(`Recorded ${metric.agentType} run ${metric.id.slice(0, 8)} (${total} outcome events)`);
    return metric;
  }

  async recent(agentType: string, limit: number): Promise<RunMetric[]> {
    return this.storage.recent(agentType, limit);
  }
}
