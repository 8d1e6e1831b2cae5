import chalk from 'chalk';
import type { AppDeps } from '../bootstrap.js';
import type { AgentType } from '../params/catalog.js';
import { formatRate, type RuleDecision, type TuningReport } from '../tuner/tuning-engine.js';

export async function runTune(app: AppDeps, agentType?: AgentType): Promise<TuningReport[]> {
  return agentType ? [await app.tuner.tune(agentType)] : app.tuner.tuneAll();
}

export function formatReport(report: TuningReport): string[] {
  const head = `${chalk.bold(report.agentType)} (${report.windowSize} run${report.windowSize === 1 ? '' : 's'} in window)`;
  if (report.skipped === 'insufficient_records') return [`${head}: not enough runs yet`];
  if (report.skipped === 'already_tuned') return [`${head}: no new runs since last tuning`];
  return [head, ...report.decisions.map(d => `  ${formatDecision(d)}`)];
}

export function formatDecision(d: RuleDecision): string {
  const evidence = d.evidence.source === 'counts'
    ? `${d.evidence.successes}/${d.evidence.successes + d.evidence.failures} = ${formatRate(d.evidence.rate)}`
    : d.evidence.source === 'derived_rates'
      ? `mean rate ${formatRate(d.evidence.rate)} over ${d.evidence.samples} run(s)`
      : 'no evidence';

  switch (d.action) {
    case 'increase':
      return `${chalk.yellow('▲')} ${d.key} ${d.previous} -> ${d.next} (${evidence})`;
    case 'decrease':
      return `${chalk.green('▼')} ${d.key} ${d.previous} -> ${d.next} (${evidence})`;
    case 'hold':
      return `${chalk.gray('=')} ${d.key} ${d.previous} [${d.reason.replace(/_/g, ' ')}] (${evidence})`;
  }
}
