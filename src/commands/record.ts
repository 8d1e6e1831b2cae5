/**
 * `runtune record`: append one run's outcome counts, then tune its agent type.
 */

import { readFile } from 'node:fs/promises';
import type { AppDeps } from '../bootstrap.js';
import type { AgentType } from '../params/catalog.js';
import type { RunMetric } from '../metrics/types.js';
import type { TuningReport } from '../tuner/tuning-engine.js';

export interface RecordOptions {
  counts?: Array<[string, number]>;
  rates?: Array<[string, number]>;
  /** JSON file with `counts` and optional `derivedRates` objects. */
  file?: string;
  tune?: boolean;
}

export interface RecordResult {
  metric: RunMetric;
  report?: TuningReport;
}

export async function runRecord(app: AppDeps, agentType: AgentType, opts: RecordOptions): Promise<RecordResult> {
  const fromFile = opts.file ? await readMetricFile(opts.file) : {};
  const counts: Record<string, unknown> = { ...recordOf(fromFile.counts), ...Object.fromEntries(opts.counts ?? []) };
  const rates: Record<string, unknown> = { ...recordOf(fromFile.derivedRates), ...Object.fromEntries(opts.rates ?? []) };

  // Values are validated by RunMetricInputSchema inside the recorder
  const metric = await app.recorder.record({
    agentType,
    counts: numbersOnly(counts, 'count'),
    ...(Object.keys(rates).length > 0 ? { derivedRates: numbersOnly(rates, 'rate') } : {}),
  });

  if (opts.tune === false) return { metric };
  return { metric, report: await app.tuner.tune(agentType) };
}

async function readMetricFile(path: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
  return recordOf(parsed);
}

function recordOf(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function numbersOnly(values: Record<string, unknown>, what: string): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [name, value] of Object.entries(values)) {
    if (typeof value !== 'number') throw new TypeError(`${what} "${name}" must be a number`);
    result[name] = value;
  }
  return result;
}
