import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';
import { DEFAULT_TUNING } from '../tuner/tuning-engine.js';

const WorkspaceSchema = z.object({
  dir: z.string().default('.'),
  dataDir: z.string().default('data'),
  metricsFile: z.string().default('run-metrics.jsonl'),
  parametersFile: z.string().default('parameters.json'),
  historyDir: z.string().default('history'),
});

const DatabaseSchema = z.object({
  enabled: z.boolean().default(false),
  /** Relative to the data directory, like the other store files. */
  path: z.string().default('runtune.db'),
});

const Ratio = z.number().min(0).max(1);

const TunerSchema = z.object({
  window: z.number().int().positive().default(DEFAULT_TUNING.window),
  minRecords: z.number().int().positive().default(DEFAULT_TUNING.minRecords),
  lowThreshold: Ratio.default(DEFAULT_TUNING.lowThreshold),
  highThreshold: Ratio.default(DEFAULT_TUNING.highThreshold),
  increaseRatio: z.number().positive().default(DEFAULT_TUNING.increaseRatio),
  decreaseRatio: z.number().positive().max(1).default(DEFAULT_TUNING.decreaseRatio),
}).refine(t => t.highThreshold > t.lowThreshold, {
  message: 'highThreshold must be greater than lowThreshold',
  path: ['highThreshold'],
}).refine(t => t.minRecords <= t.window, {
  message: 'minRecords cannot exceed window',
  path: ['minRecords'],
});

const LogSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

export const RuntuneConfigSchema = z.object({
  workspace: WorkspaceSchema.optional().transform(v => WorkspaceSchema.parse(v ?? {})),
  database: DatabaseSchema.optional().transform(v => DatabaseSchema.parse(v ?? {})),
  tuner: TunerSchema.optional().transform(v => TunerSchema.parse(v ?? {})),
  log: LogSchema.optional().transform(v => LogSchema.parse(v ?? {})),
});

export type RuntuneConfig = z.infer<typeof RuntuneConfigSchema>;
export type TunerConfig = RuntuneConfig['tuner'];
