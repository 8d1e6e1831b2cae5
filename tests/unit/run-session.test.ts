import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { RunSession } from '../../src/run/run-session.js';
import { MetricsRecorder } from '../../src/metrics/recorder.js';
import { ParameterStore } from '../../src/params/parameter-store.js';
import { TuningEngine } from '../../src/tuner/tuning-engine.js';
import { StorageError } from '../../src/utils/errors.js';
import { MockMetricsStorage, createTempDir } from '../helpers/test-fixtures.js';

let tempDir: string;
let storage: MockMetricsStorage;
let params: ParameterStore;
let recorder: MetricsRecorder;
let tuner: TuningEngine;

beforeEach(async () => {
  tempDir = createTempDir();
  storage = new MockMetricsStorage();
  params = new ParameterStore(join(tempDir, 'parameters.json'));
  await params.load();
  recorder = new MetricsRecorder(storage);
  tuner = new TuningEngine(storage, params);
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('RunSession', () => {
  it('should read its own parameters', async () => {
    await params.set('outreach_agent.scroll_wait', 4200);
    const session = new RunSession('outreach_agent', { params, recorder, tuner });

    expect(session.param('scroll_wait')).toBe(4200);
    expect(session.param('chat_open_retries')).toBe(3);
    expect(() => session.param('delay_between_invites')).toThrow(RangeError);
  });

  it('should accumulate outcome counts into the recorded metric', async () => {
    const session = new RunSession('notification_agent', { params, recorder, tuner });
    session.count('invite_sent');
    session.count('invite_sent', 2);
    session.count('invite_error');
    session.setRate('invite_sent_rate', 0.75);

    const result = await session.finish({ tune: false });

    expect(result.metric?.counts).toEqual({ invite_sent: 3, invite_error: 1 });
    expect(result.metric?.derivedRates).toEqual({ invite_sent_rate: 0.75 });
    expect(result.report).toBeUndefined();
    expect(storage.records).toHaveLength(1);
  });

  it('should reject rates outside [0, 1]', () => {
    const session = new RunSession('outreach_agent', { params, recorder });
    expect(() => session.setRate('scroll_success_rate', 1.2)).toThrow(RangeError);
  });

  it('should reject outcome names the metrics log would refuse', () => {
    const session = new RunSession('outreach_agent', { params, recorder });
    expect(() => session.count('messageVerified')).toThrow(RangeError);
    expect(() => session.count('scroll failure')).toThrow(RangeError);
    expect(() => session.setRate('ScrollRate', 0.5)).toThrow(RangeError);
    expect(session.counted('messageVerified')).toBe(0);
  });

  it('should reject negative and fractional counts', () => {
    const session = new RunSession('outreach_agent', { params, recorder });
    expect(() => session.count('scroll_success', -1)).toThrow(RangeError);
    expect(() => session.count('scroll_success', 1.5)).toThrow(RangeError);
    expect(session.counted('scroll_success')).toBe(0);
  });

  it('should still record the run after a rejected count', async () => {
    const session = new RunSession('outreach_agent', { params, recorder });
    session.count('scroll_success', 3);
    expect(() => session.count('messageVerified')).toThrow(RangeError);

    const result = await session.finish({ tune: false });
    expect(result.error).toBeUndefined();
    expect(result.metric?.counts).toEqual({ scroll_success: 3 });
    expect(storage.records).toHaveLength(1);
  });

  it('should tune after recording', async () => {
    const first = new RunSession('outreach_agent', { params, recorder, tuner });
    first.count('scroll_failure', 4);
    const firstResult = await first.finish();
    expect(firstResult.report?.skipped).toBe('insufficient_records');

    const second = new RunSession('outreach_agent', { params, recorder, tuner });
    second.count('scroll_failure', 4);
    const secondResult = await second.finish();

    expect(secondResult.report?.skipped).toBeUndefined();
    expect(params.get('outreach_agent.scroll_wait')).toBe(3600);
  });

  it('should not finish twice', async () => {
    const session = new RunSession('outreach_agent', { params, recorder });
    await session.finish();
    await expect(session.finish()).rejects.toThrow(/already finished/);
  });

  it('should return storage errors instead of throwing', async () => {
    const failing = {
      record: vi.fn().mockRejectedValue(new StorageError('write', '/data/run-metrics.jsonl', new Error('ENOSPC'))),
    };
    const session = new RunSession('outreach_agent', { params, recorder: failing, tuner });

    const result = await session.finish();
    expect(result.error).toBeInstanceOf(StorageError);
    expect(result.metric).toBeUndefined();
  });

  it('should keep the recorded metric when tuning fails', async () => {
    const brokenTuner = {
      tune: vi.fn().mockRejectedValue(new StorageError('write', '/data/parameters.json')),
    };
    const session = new RunSession('outreach_agent', { params, recorder, tuner: brokenTuner });

    const result = await session.finish();
    expect(result.metric).toBeDefined();
    expect(result.error?.message).toBe('Storage write failed for /data/parameters.json: unknown error');
  });

  it('should rethrow errors that are not storage errors', async () => {
    const buggy = { record: vi.fn().mockRejectedValue(new TypeError('bad input')) };
    const session = new RunSession('outreach_agent', { params, recorder: buggy });
    await expect(session.finish()).rejects.toThrow(TypeError);
  });

  describe('attempt', () => {
    it('should count each failed try and the final success', async () => {
      const session = new RunSession('outreach_agent', { params, recorder });
      const fn = vi.fn()
        .mockRejectedValueOnce(new Error('chat did not open'))
        .mockRejectedValueOnce(new Error('chat did not open'))
        .mockResolvedValue('opened');

      const result = await session.attempt(
        { success: 'chat_open_success', failure: 'chat_open_failure' },
        fn,
        { attempts: session.param('chat_open_retries'), baseDelayMs: 0 },
      );

      expect(result).toBe('opened');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(session.counted('chat_open_failure')).toBe(2);
      expect(session.counted('chat_open_success')).toBe(1);
    });

    it('should rethrow once the budget is spent', async () => {
      const session = new RunSession('outreach_agent', { params, recorder });
      const fn = vi.fn().mockRejectedValue(new Error('upload stalled'));

      await expect(session.attempt(
        { success: 'file_upload_success', failure: 'file_upload_failure' },
        fn,
        { attempts: 2, baseDelayMs: 0 },
      )).rejects.toThrow('upload stalled');

      expect(session.counted('file_upload_failure')).toBe(2);
      expect(session.counted('file_upload_success')).toBe(0);
    });
  });
});
