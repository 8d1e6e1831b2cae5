/**
 * SQLite-based metrics storage: same MetricsStorage interface as the JSONL log.
 * Rows are ordered by insertion (rowid), which is chronological under the
 * single-writer model.
 */

import type BetterSqlite3 from 'better-sqlite3';
import type { Database } from '../db/database.js';
import { RunMetricSchema, type MetricsStorage, type RunMetric } from './types.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('metrics');

export class SQLiteMetricsStorage implements MetricsStorage {
  private db: BetterSqlite3.Database;
  private path: string;

  constructor(database: Database) {
    this.db = database.db;
    this.path = database.path;
  }

  async append(metric: RunMetric): Promise<void> {
    try {
      this.db.prepare(`
        INSERT INTO run_metrics (id, agent_type, timestamp, counts, derived_rates)
        VALUES (?, ?, ?, ?, ?)
      `).run(
        metric.id,
        metric.agentType,
        metric.timestamp,
        JSON.stringify(metric.counts),
        metric.derivedRates ? JSON.stringify(metric.derivedRates) : null,
      );
    } catch (err) {
      throw new StorageError('write', this.path, err);
    }
  }

  async recent(agentType: string, limit: number): Promise<RunMetric[]> {
    if (limit <= 0) return [];
    return this.query(
      'SELECT * FROM run_metrics WHERE agent_type = ? ORDER BY seq DESC LIMIT ?',
      agentType,
      limit,
    ).reverse();
  }

  async all(): Promise<RunMetric[]> {
    return this.query('SELECT * FROM run_metrics ORDER BY seq');
  }

  async count(agentType?: string): Promise<number> {
    try {
      const row = agentType
        ? this.db.prepare('SELECT COUNT(*) AS n FROM run_metrics WHERE agent_type = ?').get(agentType)
        : this.db.prepare('SELECT COUNT(*) AS n FROM run_metrics').get();
      return isCountRow(row) ? row.n : 0;
    } catch (err) {
      throw new StorageError('read', this.path, err);
    }
  }

  private query(sql: string, ...params: Array<string | number>): RunMetric[] {
    let rows: unknown[];
    try {
      rows = this.db.prepare(sql).all(...params);
    } catch (err) {
      throw new StorageError('read', this.path, err);
    }

    const records: RunMetric[] = [];
    for (const row of rows) {
      const parsed = isRawRow(row) ? RunMetricSchema.safeParse(toMetric(row)) : null;
      if (parsed?.success) records.push(parsed.data);
      else log.debug('Skipping malformed run_metrics row');
    }
    return records;
  }
}

interface RawRow {
  seq: number;
  id: string;
  agent_type: string;
  timestamp: string;
  counts: string;
  derived_rates: string | null;
}

function isRawRow(row: unknown): row is RawRow {
  return typeof row === 'object' && row !== null
    && 'id' in row && typeof row.id === 'string'
    && 'agent_type' in row && typeof row.agent_type === 'string'
    && 'timestamp' in row && typeof row.timestamp === 'string'
    && 'counts' in row && typeof row.counts === 'string';
}

function isCountRow(row: unknown): row is { n: number } {
  return typeof row === 'object' && row !== null && 'n' in row && typeof row.n === 'number';
}

function toMetric(row: RawRow): unknown {
  try {
    return {
      id: row.id,
      agentType: row.agent_type,
      timestamp: row.timestamp,
      counts: JSON.parse(row.counts),
      ...(row.derived_rates ? { derivedRates: JSON.parse(row.derived_rates) } : {}),
    };
  } catch {
    return null;
  }
}
