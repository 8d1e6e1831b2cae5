/**
 * SQLite handle: opens the database with WAL mode and applies numbered migrations.
 * If SQLite fails to init, callers fall back to the JSONL metrics log.
 */

import BetterSqlite3 from 'better-sqlite3';
import type BetterSqlite3Type from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { migrations } from './migrations.js';
import * as log from '../utils/logger.js';

export class Database {
  readonly db: BetterSqlite3Type.Database;
  readonly path: string;

  constructor(dbPath: string) {
    this.path = dbPath;
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.applyMigrations();
    log.debug(`Database opened: ${dbPath}`);
  }

  private applyMigrations(): void {
    const version = this.db.pragma('user_version', { simple: true });
    const currentVersion = typeof version === 'number' ? version : 0;

    for (let i = currentVersion; i < migrations.length; i++) {
      log.info(`Applying migration ${i + 1}/${migrations.length}...`);
      this.db.exec(migrations[i]);
    }

    if (currentVersion < migrations.length) {
      this.db.pragma(`user_version = ${migrations.length}`);
      log.debug(`Database migrated to version ${migrations.length}`);
    }
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Try to create a Database instance. Returns null on failure (caller should fall back).
 */
export function tryCreateDatabase(dbPath: string): Database | null {
  try {
    return new Database(dbPath);
  } catch (err) {
    log.warn(`Database init failed (falling back to the JSONL metrics log): ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
