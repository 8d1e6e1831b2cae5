import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { RunMetricSchema, type MetricsStorage, type RunMetric } from './types.js';
import { StorageError, isErrnoCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('metrics');

/**
 * JSONL-based metrics log.
 * Each line is a JSON-encoded RunMetric. Appends rewrite the whole file
 * through a temp file and a rename, so a failed append leaves the previous
 * log intact.
 */
export class JSONLMetricsStorage implements MetricsStorage {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async append(metric: RunMetric): Promise<void> {
    const existing = await this.readContent();
    const prefix = existing.length > 0 && !existing.endsWith('\n') ? existing + '\n' : existing;
    const tempPath = `${this.filePath}.${randomUUID().slice(0, 8)}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, prefix + JSON.stringify(metric) + '\n', 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      await rm(tempPath, { force: true }).catch(rmErr => log.debug(`Temp file cleanup failed: ${String(rmErr)}`));
      throw new StorageError('write', this.filePath, err);
    }
  }

  async recent(agentType: string, limit: number): Promise<RunMetric[]> {
    if (limit <= 0) return [];
    const records = await this.readRecords();
    return records.filter(r => r.agentType === agentType).slice(-limit);
  }

  async all(): Promise<RunMetric[]> {
    return this.readRecords();
  }

  async count(agentType?: string): Promise<number> {
    const records = await this.readRecords();
    return agentType ? records.filter(r => r.agentType === agentType).length : records.length;
  }

  private async readContent(): Promise<string> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return '';
      throw new StorageError('read', this.filePath, err);
    }
  }

  private async readRecords(): Promise<RunMetric[]> {
    const content = await this.readContent();
    const lines = content.split('\n').filter(line => line.trim().length > 0);
    const records: RunMetric[] = [];
    lines.forEach((line, i) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        log.debug(`Skipping invalid JSONL line ${i + 1} in ${this.filePath}`);
        return;
      }
      const parsed = RunMetricSchema.safeParse(raw);
      if (parsed.success) records.push(parsed.data);
      else log.debug(`Skipping malformed metric on line ${i + 1} in ${this.filePath}`);
    });
    return records;
  }
}
