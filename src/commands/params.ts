import type { AppDeps } from '../bootstrap.js';
import { isParameterKey, parameterSpec, type AgentType } from '../params/catalog.js';

export function listParams(app: AppDeps, agentType?: AgentType): string[] {
  return app.params.snapshot(agentType).map(({ spec, value, isDefault }) =>
    `${spec.key} = ${value} ${spec.unit}  [${spec.min}..${spec.max}]${isDefault ? ' (default)' : ''}`,
  );
}

export function getParam(app: AppDeps, key: string): number {
  if (!isParameterKey(key)) throw new RangeError(`Unknown parameter: ${key}`);
  return app.params.get(key);
}

/** Returns the value actually stored, which may have been clamped. */
export async function setParam(app: AppDeps, key: string, value: number): Promise<{ stored: number; clamped: boolean }> {
  const spec = parameterSpec(key);
  if (!spec) throw new RangeError(`Unknown parameter: ${key}`);
  const stored = await app.params.set(key, value);
  return { stored, clamped: stored !== Math.round(value) };
}

export async function resetParams(app: AppDeps, agentType?: AgentType): Promise<void> {
  await app.params.reset(agentType);
}
