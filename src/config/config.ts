import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { RuntuneConfigSchema, type RuntuneConfig } from './schema.js';
import * as log from '../utils/logger.js';

export interface LoadConfigOptions {
  /** Explicit config file; replaces the workspace `runtune.json`. */
  path?: string;
  overrides?: Record<string, unknown>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config with priority: CLI overrides > env vars > workspace json > user json > defaults
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<RuntuneConfig> {
  const env = opts.env ?? process.env;

  // 1. Workspace (or explicit) config
  const workspaceConfig = await loadJSON(resolve(opts.path ?? 'runtune.json'));

  // 2. User config
  const home = env.HOME || env.USERPROFILE || '';
  const userConfig = home ? await loadJSON(resolve(home, '.runtune', 'config.json')) : {};

  // 3. Env vars
  const envConfig = loadEnvVars(env);

  // 4. Merge: defaults < user < workspace < env < overrides
  const merged = deepMerge(userConfig, workspaceConfig, envConfig, opts.overrides ?? {});

  return RuntuneConfigSchema.parse(merged);
}

function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  if (env.RUNTUNE_DATA_DIR) {
    result.workspace = { dataDir: env.RUNTUNE_DATA_DIR };
  }
  if (env.RUNTUNE_LOG_LEVEL) {
    result.log = { level: env.RUNTUNE_LOG_LEVEL };
  }
  if (env.RUNTUNE_DB_PATH) {
    result.database = { enabled: true, path: env.RUNTUNE_DB_PATH };
  }

  return result;
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed)) return parsed;
    log.warn(`Ignoring ${path}: top level is not an object`);
  } catch (err) {
    log.warn(`Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return {};
}

/**
 * Save config updates to the workspace config file, merged over what is there.
 */
export async function saveConfig(updates: Record<string, unknown>, path = 'runtune.json'): Promise<void> {
  const target = resolve(path);
  await mkdir(dirname(target), { recursive: true });

  const existing = await loadJSON(target);
  const merged = deepMerge(existing, updates);
  await writeFile(target, JSON.stringify(merged, null, 2) + '\n', 'utf-8');
}

/** Absolute paths of the files the stores use. */
export function resolvePaths(config: RuntuneConfig) {
  const dataDir = resolve(config.workspace.dir, config.workspace.dataDir);
  return {
    dataDir,
    metricsFile: resolve(dataDir, config.workspace.metricsFile),
    parametersFile: resolve(dataDir, config.workspace.parametersFile),
    historyDir: resolve(dataDir, config.workspace.historyDir),
    databaseFile: resolve(dataDir, config.database.path),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const current = result[key];
      if (isRecord(value) && isRecord(current)) {
        result[key] = deepMerge(current, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
