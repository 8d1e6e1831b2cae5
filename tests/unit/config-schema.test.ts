import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { RuntuneConfigSchema } from '../../src/config/schema.js';
import { loadConfig, resolvePaths, saveConfig } from '../../src/config/config.js';
import { createTempDir } from '../helpers/test-fixtures.js';

describe('RuntuneConfigSchema', () => {
  it('should produce all defaults from empty object', () => {
    const config = RuntuneConfigSchema.parse({});

    expect(config.workspace.dir).toBe('.');
    expect(config.workspace.dataDir).toBe('data');
    expect(config.workspace.metricsFile).toBe('run-metrics.jsonl');
    expect(config.workspace.parametersFile).toBe('parameters.json');
    expect(config.database.enabled).toBe(false);
    expect(config.tuner.window).toBe(5);
    expect(config.tuner.minRecords).toBe(2);
    expect(config.tuner.lowThreshold).toBe(0.7);
    expect(config.tuner.highThreshold).toBe(0.95);
    expect(config.tuner.increaseRatio).toBe(0.2);
    expect(config.tuner.decreaseRatio).toBe(0.1);
    expect(config.log.level).toBe('info');
  });

  it('should accept custom values', () => {
    const config = RuntuneConfigSchema.parse({
      tuner: { window: 10, lowThreshold: 0.5 },
      database: { enabled: true, path: '/tmp/test.db' },
      log: { level: 'debug' },
    });

    expect(config.tuner.window).toBe(10);
    expect(config.tuner.lowThreshold).toBe(0.5);
    expect(config.tuner.highThreshold).toBe(0.95);
    expect(config.database.path).toBe('/tmp/test.db');
    expect(config.log.level).toBe('debug');
  });

  it('should reject thresholds in the wrong order', () => {
    expect(() => RuntuneConfigSchema.parse({
      tuner: { lowThreshold: 0.9, highThreshold: 0.8 },
    })).toThrow(/highThreshold must be greater than lowThreshold/);
  });

  it('should reject a minimum larger than the window', () => {
    expect(() => RuntuneConfigSchema.parse({ tuner: { window: 3, minRecords: 4 } })).toThrow();
  });

  it('should reject invalid types', () => {
    expect(() => RuntuneConfigSchema.parse({ tuner: { window: 'five' } })).toThrow();
    expect(() => RuntuneConfigSchema.parse({ log: { level: 'verbose' } })).toThrow();
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should merge user file < workspace file < env < overrides', async () => {
    mkdirSync(join(tempDir, 'home', '.runtune'), { recursive: true });
    writeFileSync(join(tempDir, 'home', '.runtune', 'config.json'), JSON.stringify({
      tuner: { window: 8, minRecords: 3 },
      log: { level: 'warn' },
    }));
    writeFileSync(join(tempDir, 'runtune.json'), JSON.stringify({
      tuner: { window: 6 },
      workspace: { dataDir: 'from-file' },
    }));

    const config = await loadConfig({
      path: join(tempDir, 'runtune.json'),
      env: { HOME: join(tempDir, 'home'), RUNTUNE_DATA_DIR: 'from-env' },
      overrides: { log: { level: 'error' } },
    });

    expect(config.tuner.window).toBe(6);
    expect(config.tuner.minRecords).toBe(3);
    expect(config.workspace.dataDir).toBe('from-env');
    expect(config.log.level).toBe('error');
  });

  it('should ignore a config file that is not JSON', async () => {
    writeFileSync(join(tempDir, 'runtune.json'), '{ nope');
    const config = await loadConfig({ path: join(tempDir, 'runtune.json'), env: {} });
    expect(config.tuner.window).toBe(5);
  });

  it('should enable SQLite when a database path is given in the environment', async () => {
    const config = await loadConfig({ path: join(tempDir, 'missing.json'), env: { RUNTUNE_DB_PATH: 'x.db' } });
    expect(config.database).toEqual({ enabled: true, path: 'x.db' });
  });

  it('should save updates merged over the existing file', async () => {
    const path = join(tempDir, 'runtune.json');
    writeFileSync(path, JSON.stringify({ tuner: { window: 7 } }));

    await saveConfig({ tuner: { lowThreshold: 0.6 } }, path);
    const config = await loadConfig({ path, env: {} });
    expect(config.tuner.window).toBe(7);
    expect(config.tuner.lowThreshold).toBe(0.6);
  });

  it('should resolve store paths under the data directory', () => {
    const config = RuntuneConfigSchema.parse({ workspace: { dir: '/srv/agents' } });
    const paths = resolvePaths(config);
    expect(paths.metricsFile).toBe('/srv/agents/data/run-metrics.jsonl');
    expect(paths.parametersFile).toBe('/srv/agents/data/parameters.json');
    expect(paths.historyDir).toBe('/srv/agents/data/history');
    expect(paths.databaseFile).toBe('/srv/agents/data/runtune.db');
  });

  it('should move the database along with the data directory', async () => {
    const config = await loadConfig({
      path: join(tempDir, 'missing.json'),
      env: { RUNTUNE_DATA_DIR: '/var/lib/runtune' },
      overrides: { workspace: { dir: '/srv/agents' }, database: { enabled: true } },
    });
    const paths = resolvePaths(config);
    expect(paths.parametersFile).toBe('/var/lib/runtune/parameters.json');
    expect(paths.databaseFile).toBe('/var/lib/runtune/runtune.db');
  });
});
