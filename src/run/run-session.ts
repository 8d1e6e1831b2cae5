import { parameterSpec, type AgentType, type ParameterKey } from '../params/catalog.js';
import type { ParameterProvider } from '../params/parameter-store.js';
import { OutcomeName, type RunMetric, type RunMetricInput } from '../metrics/types.js';
import type { TuningReport } from '../tuner/tuning-engine.js';
import { ConfigCorruptError, StorageError } from '../utils/errors.js';
import { retryWithBackoff, type RetryOptions } from '../utils/retry.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface RunSessionDeps {
  params: ParameterProvider;
  recorder: { record(input: RunMetricInput): Promise<RunMetric> };
  tuner?: { tune(agentType: AgentType): Promise<TuningReport> };
}

export interface OutcomePair {
  success: string;
  failure: string;
}

export interface FinishResult {
  metric?: RunMetric;
  report?: TuningReport;
  /** Storage failure while recording or tuning; the run itself still counts as done. */
  error?: StorageError | ConfigCorruptError;
}

/**
 * RunSession: what one agent workflow holds while it runs: its parameters,
 * its outcome counters, and the end-of-run hand-off to the metrics log and
 * the tuner.
 */
export class RunSession {
  readonly agentType: AgentType;
  private deps: RunSessionDeps;
  private counts = new Map<string, number>();
  private rates = new Map<string, number>();
  private finished = false;
  private log: Logger;

  constructor(agentType: AgentType, deps: RunSessionDeps) {
    this.agentType = agentType;
    this.deps = deps;
    this.log = createLogger(agentType);
  }

  /** Current value of one of this agent type's parameters. */
  param(name: string): number {
    const key: ParameterKey = `${this.agentType}.${name}`;
    if (!parameterSpec(key)) throw new RangeError(`${this.agentType} has no parameter ${name}`);
    return this.deps.params.get(key);
  }

  count(outcome: string, n = 1): void {
    assertOutcomeName(outcome);
    if (!Number.isInteger(n) || n < 0) throw new RangeError(`Count for ${outcome} must be a non-negative integer`);
    this.counts.set(outcome, (this.counts.get(outcome) ?? 0) + n);
  }

  /** Precomputed success rate for outcomes the workflow cannot count directly. */
  setRate(key: string, rate: number): void {
    assertOutcomeName(key);
    if (!(rate >= 0 && rate <= 1)) throw new RangeError(`Rate ${key} must be within [0, 1]`);
    this.rates.set(key, rate);
  }

  counted(outcome: string): number {
    return this.counts.get(outcome) ?? 0;
  }

  /**
   * Runs a gated action with a retry budget, counting each failed try under
   * `outcomes.failure` and the eventual success under `outcomes.success`.
   */
  async attempt<T>(
    outcomes: OutcomePair,
    fn: (attempt: number) => Promise<T>,
    opts: Partial<RetryOptions> = {},
  ): Promise<T> {
    assertOutcomeName(outcomes.success);
    assertOutcomeName(outcomes.failure);
    const result = await retryWithBackoff(fn, {
      ...opts,
      onFailedAttempt: (err, attempt) => {
        this.count(outcomes.failure);
        this.log.debug(`${outcomes.failure} (attempt ${attempt}): ${err.message}`);
        opts.onFailedAttempt?.(err, attempt);
      },
    });
    this.count(outcomes.success);
    return result;
  }

  toMetricInput(): RunMetricInput {
    return {
      agentType: this.agentType,
      counts: Object.fromEntries(this.counts),
      ...(this.rates.size > 0 ? { derivedRates: Object.fromEntries(this.rates) } : {}),
    };
  }

  /**
   * Records the run and, unless disabled, tunes this agent type.
   * Storage problems are logged and returned, never thrown: the run's own
   * work is already done and must not be reported as failed.
   */
  async finish(opts: { tune?: boolean } = {}): Promise<FinishResult> {
    if (this.finished) throw new Error(`${this.agentType} run already finished`);
    this.finished = true;

    const result: FinishResult = {};
    try {
      result.metric = await this.deps.recorder.record(this.toMetricInput());
      if (opts.tune !== false && this.deps.tuner) {
        result.report = await this.deps.tuner.tune(this.agentType);
      }
    } catch (err) {
      if (!(err instanceof StorageError || err instanceof ConfigCorruptError)) throw err;
      this.log.error(`Run bookkeeping failed, continuing without tuning: ${err.message}`);
      result.error = err;
    }
    return result;
  }
}

function assertOutcomeName(name: string): void {
  if (!OutcomeName.safeParse(name).success) {
    throw new RangeError(`Outcome name ${JSON.stringify(name)} must be snake_case`);
  }
}
