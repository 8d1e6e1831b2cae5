/**
 * Library surface for agent processes that embed the tuner.
 */

export { createApp, type AppDeps } from './bootstrap.js';
export { loadConfig, saveConfig, resolvePaths } from './config/config.js';
export { RuntuneConfigSchema, type RuntuneConfig, type TunerConfig } from './config/schema.js';
export {
  AGENT_TYPES,
  isAgentType,
  isParameterKey,
  listParameters,
  parameterSpec,
  type AgentType,
  type ParameterKey,
  type ParameterSpec,
} from './params/catalog.js';
export { ParameterStore, readParameterFile, type ParameterProvider } from './params/parameter-store.js';
export { JSONLMetricsStorage } from './metrics/storage.js';
export { SQLiteMetricsStorage } from './metrics/sqlite-storage.js';
export { MetricsRecorder } from './metrics/recorder.js';
export type { MetricsStorage, RunMetric, RunMetricInput } from './metrics/types.js';
export {
  TuningEngine,
  DEFAULT_TUNING,
  type TuningOptions,
  type TuningReport,
  type RuleDecision,
} from './tuner/tuning-engine.js';
export { TUNING_RULES, type TuningRule } from './tuner/rules.js';
export { RunSession, type FinishResult } from './run/run-session.js';
export { ActionHistory } from './history/action-history.js';
export { StorageError, ConfigCorruptError } from './utils/errors.js';
export { setLogLevel, createLogger, type LogLevel } from './utils/logger.js';
