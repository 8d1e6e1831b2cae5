import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { StorageError, isErrnoCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('history');

const HistoryEntrySchema = z.object({
  at: z.string(),
  data: z.record(z.string(), z.unknown()).optional(),
});

const HistoryFileSchema = z.record(z.string(), HistoryEntrySchema);

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

/**
 * Per-workflow record of actions already taken (people messaged, posts
 * commented, invites withdrawn), so a rerun does not repeat them.
 * Stored as one JSON object keyed by action id.
 */
export class ActionHistory {
  private filePath: string;
  private entries = new Map<string, HistoryEntry>();
  private now: () => Date;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.now = now;
  }

  async load(): Promise<void> {
    this.entries.clear();
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return;
      throw new StorageError('read', this.filePath, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      log.warn(`History ${this.filePath} is not valid JSON, starting empty`);
      return;
    }
    const parsed = HistoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`History ${this.filePath} has an unexpected shape, starting empty`);
      return;
    }
    for (const [id, entry] of Object.entries(parsed.data)) {
      this.entries.set(id, entry);
    }
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  list(): Array<[string, HistoryEntry]> {
    return [...this.entries.entries()];
  }

  async add(id: string, data?: Record<string, unknown>): Promise<void> {
    const next = new Map(this.entries);
    next.set(id, { at: this.now().toISOString(), ...(data ? { data } : {}) });
    await this.commit(next);
  }

  /** Drops entries older than `maxAgeDays`. Returns how many were removed. */
  async prune(maxAgeDays: number): Promise<number> {
    const cutoff = this.now().getTime() - maxAgeDays * 24 * 60 * 60 * 1000;
    const next = new Map(this.entries);
    for (const [id, entry] of this.entries) {
      const at = Date.parse(entry.at);
      if (Number.isNaN(at) || at < cutoff) next.delete(id);
    }
    const removed = this.entries.size - next.size;
    if (removed > 0) {
      await this.commit(next);
      log.debug(`Pruned ${removed} entr${removed === 1 ? 'y' : 'ies'} from ${this.filePath}`);
    }
    return removed;
  }

  /** Atomic rewrite; memory only takes the new entries once they are on disk. */
  private async commit(entries: Map<string, HistoryEntry>): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(Object.fromEntries(entries), null, 2) + '\n', 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      await rm(tempPath, { force: true }).catch(rmErr => log.debug(`Temp file cleanup failed: ${String(rmErr)}`));
      throw new StorageError('write', this.filePath, err);
    }
    this.entries = entries;
  }
}
