/**
 * Shared bootstrap: creates the stores and the tuner, wires them together.
 * Used by the CLI (index.ts) and by agent processes embedding the library.
 */

import { join } from 'node:path';
import type { RuntuneConfig } from './config/schema.js';
import { resolvePaths } from './config/config.js';
import { tryCreateDatabase, type Database } from './db/database.js';
import type { MetricsStorage } from './metrics/types.js';
import { JSONLMetricsStorage } from './metrics/storage.js';
import { SQLiteMetricsStorage } from './metrics/sqlite-storage.js';
import { MetricsRecorder } from './metrics/recorder.js';
import { ParameterStore } from './params/parameter-store.js';
import type { AgentType } from './params/catalog.js';
import { TuningEngine } from './tuner/tuning-engine.js';
import { RunSession } from './run/run-session.js';
import { ActionHistory } from './history/action-history.js';

export interface AppDeps {
  config: RuntuneConfig;
  paths: ReturnType<typeof resolvePaths>;
  db: Database | null;
  metrics: MetricsStorage;
  recorder: MetricsRecorder;
  params: ParameterStore;
  tuner: TuningEngine;
  /** Starts bookkeeping for one agent run. */
  startRun(agentType: AgentType): RunSession;
  /** Loads the named action history (e.g. `messaged`, `withdrawn`). */
  openHistory(name: string): Promise<ActionHistory>;
  close(): void;
}

export async function createApp(config: RuntuneConfig): Promise<AppDeps> {
  const paths = resolvePaths(config);

  // 1. Metrics log: SQLite when enabled and openable, JSONL otherwise
  const db = config.database.enabled ? tryCreateDatabase(paths.databaseFile) : null;
  const metrics: MetricsStorage = db
    ? new SQLiteMetricsStorage(db)
    : new JSONLMetricsStorage(paths.metricsFile);
  const recorder = new MetricsRecorder(metrics);

  // 2. Parameters (corrupt file → defaults, see ParameterStore.load)
  const params = new ParameterStore(paths.parametersFile);
  await params.load();

  // 3. Tuner
  const tuner = new TuningEngine(metrics, params, config.tuner);

  return {
    config,
    paths,
    db,
    metrics,
    recorder,
    params,
    tuner,
    startRun: agentType => new RunSession(agentType, { params, recorder, tuner }),
    openHistory: async name => {
      const history = new ActionHistory(join(paths.historyDir, `${name.replace(/[^a-zA-Z0-9_-]/g, '_')}.json`));
      await history.load();
      return history;
    },
    close: () => db?.close(),
  };
}
