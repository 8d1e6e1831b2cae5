import { InvalidArgumentError } from 'commander';
import { isAgentType, AGENT_TYPES, type AgentType } from '../params/catalog.js';

/** Parses `name=value` into a tuple; used as a repeatable commander option. */
export function parseAssignment(raw: string): [string, number] {
  const eq = raw.indexOf('=');
  if (eq <= 0) throw new InvalidArgumentError(`Expected name=value, got "${raw}"`);
  const name = raw.slice(0, eq).trim();
  const value = Number(raw.slice(eq + 1));
  if (!Number.isFinite(value)) throw new InvalidArgumentError(`"${raw}" does not end in a number`);
  return [name, value];
}

export function collectAssignment(raw: string, previous: Array<[string, number]> = []): Array<[string, number]> {
  return [...previous, parseAssignment(raw)];
}

export function parseAgentType(raw: string): AgentType {
  if (!isAgentType(raw)) {
    throw new InvalidArgumentError(`Unknown agent type "${raw}" (expected one of: ${AGENT_TYPES.join(', ')})`);
  }
  return raw;
}

export function parsePositiveInt(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError(`"${raw}" is not a positive integer`);
  return n;
}

export function parseNumber(raw: string): number {
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) throw new InvalidArgumentError(`"${raw}" is not a number`);
  return n;
}
