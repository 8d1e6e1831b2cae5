import {
  AGENT_TYPES,
  clampValue,
  parameterSpec,
  type AgentType,
  type ParameterKey,
  type ParameterSpec,
} from '../params/catalog.js';
import type { TuningMarker } from '../params/parameter-store.js';
import type { RunMetric } from '../metrics/types.js';
import { TUNING_RULES, rateKey, type TuningRule } from './rules.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('tuner');

export interface TuningOptions {
  /** Number of most recent runs considered. */
  window: number;
  /** Fewer runs than this and the agent type is not tuned at all. */
  minRecords: number;
  lowThreshold: number;
  highThreshold: number;
  /** Relative step for `ms` parameters when slowing down. */
  increaseRatio: number;
  /** Relative step for `ms` parameters when speeding up. */
  decreaseRatio: number;
}

export const DEFAULT_TUNING: TuningOptions = {
  window: 5,
  minRecords: 2,
  lowThreshold: 0.7,
  highThreshold: 0.95,
  increaseRatio: 0.2,
  decreaseRatio: 0.1,
};

/** The slice of the metrics log the engine reads. */
export interface MetricsWindowSource {
  recent(agentType: string, limit: number): Promise<RunMetric[]>;
}

/** The slice of the parameter store the engine reads and writes. */
export interface TunableParameters {
  get(key: ParameterKey): number;
  setMany(updates: Array<[string, number]>, marker?: TuningMarker): Promise<number[]>;
  tunedThrough(agentType: AgentType): string | undefined;
}

export type Evidence =
  | { source: 'counts'; successes: number; failures: number; rate: number }
  | { source: 'derived_rates'; samples: number; rate: number }
  | { source: 'none' };

export type TuningAction = 'increase' | 'decrease' | 'hold';

export type DecisionReason =
  | 'low_rate'
  | 'high_rate'
  | 'nominal'
  | 'no_evidence'
  | 'window_not_full'
  | 'at_bound';

export interface RuleDecision {
  key: ParameterKey;
  rule: TuningRule;
  evidence: Evidence;
  action: TuningAction;
  reason: DecisionReason;
  previous: number;
  next: number;
}

export type SkipReason = 'insufficient_records' | 'already_tuned';

export interface TuningReport {
  agentType: AgentType;
  windowSize: number;
  skipped?: SkipReason;
  decisions: RuleDecision[];
}

/**
 * Sums the rule's success/failure counts over the window. With no counted
 * attempts, falls back to the mean of caller-supplied rates.
 */
export function aggregateEvidence(rule: TuningRule, window: RunMetric[]): Evidence {
  let successes = 0;
  let failures = 0;
  for (const metric of window) {
    successes += metric.counts[rule.success] ?? 0;
    failures += metric.counts[rule.failure] ?? 0;
  }
  if (successes + failures > 0) {
    return { source: 'counts', successes, failures, rate: successes / (successes + failures) };
  }

  const key = rateKey(rule);
  const rates: number[] = [];
  for (const metric of window) {
    const rate = metric.derivedRates?.[key];
    if (rate !== undefined) rates.push(rate);
  }
  if (rates.length === 0) return { source: 'none' };
  return {
    source: 'derived_rates',
    samples: rates.length,
    rate: rates.reduce((a, b) => a + b, 0) / rates.length,
  };
}

/**
 * TuningEngine: turns the recent success rates of an agent type into
 * adjusted timeouts and retry counts.
 *
 * Slow-down steps are larger than speed-up steps, and speeding up needs a
 * full window, so one bad run slows an agent quickly while recovery takes
 * sustained good runs. A window is applied once: re-running without new
 * metrics reports `already_tuned`.
 */
export class TuningEngine {
  private metrics: MetricsWindowSource;
  private params: TunableParameters;
  private options: TuningOptions;

  constructor(metrics: MetricsWindowSource, params: TunableParameters, options: Partial<TuningOptions> = {}) {
    this.metrics = metrics;
    this.params = params;
    this.options = { ...DEFAULT_TUNING, ...options };
    if (!Number.isInteger(this.options.window) || this.options.window < 1) {
      throw new RangeError(`Tuning window must be a positive integer, got ${this.options.window}`);
    }
  }

  async tune(agentType: AgentType): Promise<TuningReport> {
    const window = await this.metrics.recent(agentType, this.options.window);
    const report: TuningReport = { agentType, windowSize: window.length, decisions: [] };

    if (window.length === 0 || window.length < this.options.minRecords) {
      log.debug(`${agentType}: ${window.length} run(s) recorded, need ${this.options.minRecords}; skipping`);
      return { ...report, skipped: 'insufficient_records' };
    }

    const newest = window[window.length - 1];
    if (this.params.tunedThrough(agentType) === newest.id) {
      log.debug(`${agentType}: window ending at ${newest.id.slice(0, 8)} already applied`);
      return { ...report, skipped: 'already_tuned' };
    }

    const full = window.length >= this.options.window;
    for (const rule of TUNING_RULES[agentType]) {
      const spec = parameterSpec(`${agentType}.${rule.parameter}`);
      if (!spec) throw new Error(`Rule for ${agentType} targets unknown parameter ${rule.parameter}`);
      report.decisions.push(this.decide(spec, rule, aggregateEvidence(rule, window), full));
    }

    const changed = report.decisions.filter(d => d.next !== d.previous);
    if (changed.length > 0) {
      await this.params.setMany(
        changed.map((d): [string, number] => [d.key, d.next]),
        { agentType, through: newest.id },
      );
      for (const d of changed) {
        const rate = d.evidence.source === 'none' ? '' : ` (${formatRate(d.evidence.rate)})`;
        log.info(`${d.action === 'increase' ? 'Low' : 'High'} ${d.rule.success} rate${rate}: ${d.key} ${d.previous} -> ${d.next}`);
      }
    } else {
      log.debug(`${agentType}: all parameters held`);
    }

    return report;
  }

  async tuneAll(): Promise<TuningReport[]> {
    const reports: TuningReport[] = [];
    for (const agentType of AGENT_TYPES) {
      reports.push(await this.tune(agentType));
    }
    return reports;
  }

  private decide(spec: ParameterSpec, rule: TuningRule, evidence: Evidence, full: boolean): RuleDecision {
    const previous = this.params.get(spec.key);
    const hold = (reason: DecisionReason): RuleDecision => ({
      key: spec.key, rule, evidence, action: 'hold', reason, previous, next: previous,
    });

    if (evidence.source === 'none') return hold('no_evidence');

    if (evidence.rate < this.options.lowThreshold) {
      const next = this.stepUp(spec, previous);
      return next > previous
        ? { key: spec.key, rule, evidence, action: 'increase', reason: 'low_rate', previous, next }
        : hold('at_bound');
    }

    if (evidence.rate >= this.options.highThreshold) {
      if (!full) return hold('window_not_full');
      const next = this.stepDown(spec, previous);
      return next < previous
        ? { key: spec.key, rule, evidence, action: 'decrease', reason: 'high_rate', previous, next }
        : hold('at_bound');
    }

    return hold('nominal');
  }

  private stepUp(spec: ParameterSpec, current: number): number {
    const step = spec.step ? spec.step.increase : current * this.options.increaseRatio;
    return clampValue(spec, current + Math.max(1, step));
  }

  private stepDown(spec: ParameterSpec, current: number): number {
    const step = spec.step ? spec.step.decrease : current * this.options.decreaseRatio;
    return clampValue(spec, current - Math.max(1, step));
  }
}

export function formatRate(rate: number): string {
  return rate.toFixed(2);
}
