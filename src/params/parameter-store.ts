import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  AGENT_TYPES,
  clampValue,
  listParameters,
  parameterNames,
  parameterSpec,
  type AgentType,
  type ParameterKey,
  type ParameterSpec,
} from './catalog.js';
import { ConfigCorruptError, StorageError, isErrnoCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('params');

/** Read-only view handed to agent workflows. */
export interface ParameterProvider {
  get(key: ParameterKey, fallback?: number): number;
}

export interface ParameterEntry {
  spec: ParameterSpec;
  value: number;
  isDefault: boolean;
}

export interface TuningMarker {
  agentType: AgentType;
  /** Id of the newest metric in the window that produced the update. */
  through: string;
}

function agentValuesSchema(agentType: AgentType) {
  const shape: Record<string, z.ZodOptional<z.ZodNumber>> = {};
  for (const name of parameterNames(agentType)) {
    shape[name] = z.number().finite().optional();
  }
  return z.object(shape).strict();
}

const valuesShape: Record<string, z.ZodOptional<ReturnType<typeof agentValuesSchema>>> = {};
const markersShape: Record<string, z.ZodOptional<z.ZodString>> = {};
for (const agentType of AGENT_TYPES) {
  valuesShape[agentType] = agentValuesSchema(agentType).optional();
  markersShape[agentType] = z.string().min(1).optional();
}

export const ParameterFileSchema = z.object({
  version: z.literal(1).default(1),
  values: z.object(valuesShape).strict().default({}),
  tunedThrough: z.object(markersShape).strict().default({}),
}).strict();

export type ParameterFile = z.infer<typeof ParameterFileSchema>;

/**
 * Read and validate a parameter file.
 * Returns null when the file does not exist.
 */
export async function readParameterFile(path: string): Promise<ParameterFile | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return null;
    throw new StorageError('read', path, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigCorruptError(path, [err instanceof Error ? err.message : 'invalid JSON']);
  }

  const parsed = ParameterFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigCorruptError(
      path,
      parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`),
    );
  }
  return parsed.data;
}

/**
 * Current run parameters, persisted as one JSON file.
 * Every mutation is written through before the call returns.
 */
export class ParameterStore implements ParameterProvider {
  private filePath: string;
  private values = new Map<string, number>();
  private markers = new Map<AgentType, string>();
  private loadError: ConfigCorruptError | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get path(): string {
    return this.filePath;
  }

  /** Corruption found by the last `load()`, if defaults had to be substituted. */
  get lastLoadError(): ConfigCorruptError | null {
    return this.loadError;
  }

  /**
   * Load from disk. A missing file means defaults. A corrupt file is reported
   * as a warning and replaced by defaults in memory; the next persist repairs it.
   */
  async load(): Promise<void> {
    this.values.clear();
    this.markers.clear();
    this.loadError = null;

    let file: ParameterFile | null;
    try {
      file = await readParameterFile(this.filePath);
    } catch (err) {
      if (!(err instanceof ConfigCorruptError)) throw err;
      this.loadError = err;
      log.warn(`${err.message}; using built-in defaults`);
      return;
    }
    if (!file) {
      log.debug(`No parameter file at ${this.filePath}, using defaults`);
      return;
    }

    for (const agentType of AGENT_TYPES) {
      const stored = file.values[agentType] ?? {};
      for (const [name, value] of Object.entries(stored)) {
        if (value === undefined) continue;
        this.values.set(`${agentType}.${name}`, this.clamp(`${agentType}.${name}`, value));
      }
      const marker = file.tunedThrough[agentType];
      if (marker) this.markers.set(agentType, marker);
    }
    log.debug(`Loaded ${this.values.size} stored parameter(s) from ${this.filePath}`);
  }

  get(key: ParameterKey, fallback?: number): number {
    const stored = this.values.get(key);
    if (stored !== undefined) return stored;
    if (fallback !== undefined) return fallback;
    return parameterSpec(key)?.default ?? 0;
  }

  /** Clamp, store and persist one value. Returns the value actually stored. */
  async set(key: string, value: number): Promise<number> {
    const [stored] = await this.setMany([[key, value]]);
    return stored;
  }

  /**
   * Clamp and store several values with a single write.
   * The optional marker records which metrics window produced the update.
   */
  async setMany(updates: Array<[string, number]>, marker?: TuningMarker): Promise<number[]> {
    for (const [key, value] of updates) {
      if (!parameterSpec(key)) throw new RangeError(`Unknown parameter: ${key}`);
      if (!Number.isFinite(value)) throw new RangeError(`Parameter ${key} must be a finite number`);
    }

    const values = new Map(this.values);
    const markers = new Map(this.markers);
    const stored = updates.map(([key, value]) => {
      const next = this.clamp(key, value);
      values.set(key, next);
      return next;
    });
    if (marker) markers.set(marker.agentType, marker.through);

    await this.commit(values, markers);
    return stored;
  }

  /** Restore catalog defaults for one agent type, or for all of them. */
  async reset(agentType?: AgentType): Promise<void> {
    const values = new Map(this.values);
    const markers = new Map(this.markers);
    for (const spec of listParameters(agentType)) {
      values.delete(spec.key);
    }
    if (agentType) markers.delete(agentType);
    else markers.clear();

    await this.commit(values, markers);
  }

  tunedThrough(agentType: AgentType): string | undefined {
    return this.markers.get(agentType);
  }

  snapshot(agentType?: AgentType): ParameterEntry[] {
    return listParameters(agentType).map(spec => ({
      spec,
      value: this.get(spec.key),
      isDefault: !this.values.has(spec.key),
    }));
  }

  /** Rewrite the file from the current in-memory state. */
  async persist(): Promise<void> {
    await this.commit(this.values, this.markers);
  }

  /**
   * Write the given state, then adopt it. On a failed write the previous
   * state stays in memory, matching what is still on disk.
   */
  private async commit(values: Map<string, number>, markers: Map<AgentType, string>): Promise<void> {
    const file: ParameterFile = { version: 1, values: {}, tunedThrough: {} };
    for (const agentType of AGENT_TYPES) {
      const section: Record<string, number> = {};
      for (const spec of listParameters(agentType)) {
        section[spec.name] = values.get(spec.key) ?? spec.default;
      }
      file.values[agentType] = section;
      const marker = markers.get(agentType);
      if (marker) file.tunedThrough[agentType] = marker;
    }

    const tempPath = `${this.filePath}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(file, null, 2) + '\n', 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      await rm(tempPath, { force: true }).catch(rmErr => log.debug(`Temp file cleanup failed: ${String(rmErr)}`));
      throw new StorageError('write', this.filePath, err);
    }
    this.values = values;
    this.markers = markers;
    this.loadError = null;
  }

  private clamp(key: string, value: number): number {
    const spec = parameterSpec(key);
    return spec ? clampValue(spec, value) : value;
  }
}
