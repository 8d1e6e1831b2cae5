/**
 * End-to-end: agent runs record outcomes, the tuner adjusts parameters on
 * disk, and the next run reads the adjusted values.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { createApp, type AppDeps } from '../../src/bootstrap.js';
import { SQLiteMetricsStorage } from '../../src/metrics/sqlite-storage.js';
import { JSONLMetricsStorage } from '../../src/metrics/storage.js';
import { ConfigCorruptError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { createTestConfig } from '../helpers/test-fixtures.js';
import type { RuntuneConfig } from '../../src/config/schema.js';

async function runOutreach(app: AppDeps, counts: Record<string, number>) {
  const session = app.startRun('outreach_agent');
  for (const [outcome, n] of Object.entries(counts)) session.count(outcome, n);
  return session.finish();
}

describe('tuning loop', () => {
  let config: RuntuneConfig;
  let app: AppDeps;

  beforeEach(async () => {
    setLogLevel('error');
    config = createTestConfig();
    app = await createApp(config);
  });

  afterEach(() => {
    app.close();
    rmSync(config.workspace.dir, { recursive: true, force: true });
  });

  it('should use the JSONL log by default', () => {
    expect(app.db).toBeNull();
    expect(app.metrics).toBeInstanceOf(JSONLMetricsStorage);
  });

  it('should slow down after bad runs and the next process should see it', async () => {
    for (let i = 0; i < 5; i++) {
      await runOutreach(app, { scroll_success: 1, scroll_failure: 2, message_verified: 10 });
    }

    // Each run from the second on slows scrolling by 20%: 3600, 4320, 5184, 6221.
    // Messages only speed up once the window is full, on the fifth run.
    const next = await createApp(config);
    expect(next.params.get('outreach_agent.scroll_wait')).toBe(6221);
    expect(next.params.get('outreach_agent.message_send_wait')).toBe(2700);
    expect(next.startRun('outreach_agent').param('scroll_wait')).toBe(6221);
    next.close();
  });

  it('should recover from a corrupt parameter file without manual repair', async () => {
    app.close();
    mkdirSync(app.paths.dataDir, { recursive: true });
    writeFileSync(app.paths.parametersFile, '{"values": {"outreach_agent": {"scroll_wait": "fast"}}}');

    app = await createApp(config);
    expect(app.params.lastLoadError).toBeInstanceOf(ConfigCorruptError);
    expect(app.params.get('outreach_agent.scroll_wait')).toBe(3000);

    await runOutreach(app, { scroll_failure: 1 });
    const result = await runOutreach(app, { scroll_failure: 1 });
    expect(result.error).toBeUndefined();

    const repaired = JSON.parse(readFileSync(app.paths.parametersFile, 'utf-8'));
    expect(repaired.values.outreach_agent.scroll_wait).toBe(3600);
  });

  it('should keep an action history per workflow', async () => {
    const messaged = await app.openHistory('messaged');
    await messaged.add('profile/jane-doe');

    const again = await app.openHistory('messaged');
    expect(again.has('profile/jane-doe')).toBe(true);
    expect((await app.openHistory('withdrawn')).size).toBe(0);
  });
});

describe('tuning loop on SQLite', () => {
  let config: RuntuneConfig;
  let app: AppDeps;

  beforeEach(async () => {
    setLogLevel('error');
    const base = createTestConfig();
    config = { ...base, database: { enabled: true, path: 'runtune.db' } };
    app = await createApp(config);
  });

  afterEach(() => {
    app.close();
    rmSync(config.workspace.dir, { recursive: true, force: true });
  });

  it('should record into SQLite and tune from it', async () => {
    expect(app.metrics).toBeInstanceOf(SQLiteMetricsStorage);

    await runOutreach(app, { chat_open_failure: 3 });
    const result = await runOutreach(app, { chat_open_failure: 3 });

    expect(result.report?.decisions.find(d => d.key === 'outreach_agent.chat_open_retries')?.next).toBe(4);
    expect(await app.metrics.count('outreach_agent')).toBe(2);
  });
});
