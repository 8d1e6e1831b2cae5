/**
 * Parameter catalog: the fixed schema of tunable run parameters.
 *
 * Each agent type owns a disjoint set of parameters. Bounds and steps are
 * design-time constants and are never persisted.
 */

export const AGENT_TYPES = ['outreach_agent', 'invite_withdrawal', 'notification_agent'] as const;

export type AgentType = (typeof AGENT_TYPES)[number];

export type ParameterUnit = 'ms' | 'seconds' | 'count';

/** Dotted key, e.g. `outreach_agent.scroll_wait`. */
export type ParameterKey = `${AgentType}.${string}`;

export interface ParameterDefinition {
  default: number;
  min: number;
  max: number;
  unit: ParameterUnit;
  /**
   * Absolute step for units where a percentage is meaningless (retry counts,
   * whole seconds). `ms` parameters use the engine's ratio steps instead.
   */
  step?: { increase: number; decrease: number };
  description: string;
}

export interface ParameterSpec extends ParameterDefinition {
  key: ParameterKey;
  agentType: AgentType;
  name: string;
}

const CATALOG: Record<AgentType, Record<string, ParameterDefinition>> = {
  outreach_agent: {
    scroll_wait: {
      default: 3000, min: 1000, max: 30_000, unit: 'ms',
      description: 'Wait after each scroll of the connections list',
    },
    message_send_wait: {
      default: 3000, min: 1000, max: 10_000, unit: 'ms',
      description: 'Wait before verifying a sent message',
    },
    chat_open_retries: {
      default: 3, min: 1, max: 6, unit: 'count', step: { increase: 1, decrease: 1 },
      description: 'Attempts to open a chat window',
    },
    identity_poll_retries: {
      default: 15, min: 5, max: 30, unit: 'count', step: { increase: 5, decrease: 2 },
      description: 'Polls while verifying the chat recipient identity',
    },
    file_upload_wait: {
      default: 5000, min: 2000, max: 15_000, unit: 'ms',
      description: 'Wait for an attachment upload to finish',
    },
  },
  invite_withdrawal: {
    dialog_timeout: {
      default: 3000, min: 2000, max: 8000, unit: 'ms',
      description: 'Timeout for the withdraw confirmation dialog',
    },
  },
  notification_agent: {
    delay_between_invites: {
      default: 5, min: 3, max: 15, unit: 'seconds', step: { increase: 2, decrease: 1 },
      description: 'Pause between connection invites',
    },
  },
};

const specs = new Map<string, ParameterSpec>();
for (const agentType of AGENT_TYPES) {
  for (const [name, def] of Object.entries(CATALOG[agentType])) {
    const key: ParameterKey = `${agentType}.${name}`;
    specs.set(key, { ...def, key, agentType, name });
  }
}

export function isAgentType(value: string): value is AgentType {
  return AGENT_TYPES.some(t => t === value);
}

export function isParameterKey(key: string): key is ParameterKey {
  return specs.has(key);
}

export function parameterSpec(key: string): ParameterSpec | undefined {
  return specs.get(key);
}

export function listParameters(agentType?: AgentType): ParameterSpec[] {
  const all = [...specs.values()];
  return agentType ? all.filter(s => s.agentType === agentType) : all;
}

export function parameterNames(agentType: AgentType): string[] {
  return Object.keys(CATALOG[agentType]);
}

/** Rounds to an integer and clamps into the parameter's closed bounds. */
export function clampValue(spec: ParameterDefinition, value: number): number {
  return Math.min(spec.max, Math.max(spec.min, Math.round(value)));
}
