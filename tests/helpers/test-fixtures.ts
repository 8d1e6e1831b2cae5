/**
 * Test fixtures: config, temp dirs, in-memory metrics storage.
 */

import { mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RuntuneConfigSchema, type RuntuneConfig } from '../../src/config/schema.js';
import type { MetricsStorage, RunMetric } from '../../src/metrics/types.js';
import type { AgentType } from '../../src/params/catalog.js';

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'runtune-test-'));
}

export function createTestConfig(overrides?: Partial<Record<string, unknown>>): RuntuneConfig {
  return RuntuneConfigSchema.parse({
    workspace: { dir: createTempDir() },
    database: { enabled: false },
    log: { level: 'error' },
    ...overrides,
  });
}

export class MockMetricsStorage implements MetricsStorage {
  records: RunMetric[] = [];

  async append(metric: RunMetric): Promise<void> {
    this.records.push(metric);
  }

  async recent(agentType: string, limit: number): Promise<RunMetric[]> {
    return this.records.filter(r => r.agentType === agentType).slice(-limit);
  }

  async all(): Promise<RunMetric[]> {
    return [...this.records];
  }

  async count(agentType?: string): Promise<number> {
    return agentType ? this.records.filter(r => r.agentType === agentType).length : this.records.length;
  }
}

let seq = 0;

export function makeMetric(
  agentType: AgentType,
  counts: Record<string, number> = {},
  overrides: Partial<RunMetric> = {},
): RunMetric {
  seq++;
  return {
    id: `run-${seq}`,
    agentType,
    timestamp: new Date(Date.UTC(2026, 0, 1, 0, 0, seq % 60, seq)).toISOString(),
    counts,
    ...overrides,
  };
}
