import type { AppDeps } from '../bootstrap.js';
import type { AgentType } from '../params/catalog.js';

export async function listMetrics(app: AppDeps, agentType: AgentType, limit: number): Promise<string[]> {
  const records = await app.metrics.recent(agentType, limit);
  if (records.length === 0) return [`No runs recorded for ${agentType}`];

  return records.map(r => {
    const counts = Object.entries(r.counts)
      .filter(([, n]) => n > 0)
      .map(([name, n]) => `${name}=${n}`)
      .join(' ');
    const rates = Object.entries(r.derivedRates ?? {})
      .map(([name, rate]) => `${name}=${rate}`)
      .join(' ');
    return [r.timestamp, r.id.slice(0, 8), counts || '(no outcomes)', rates].filter(Boolean).join('  ');
  });
}
