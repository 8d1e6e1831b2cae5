/**
 * Database migrations: numbered SQL statements applied in order.
 * Each migration runs once; applied version tracked in the `user_version` pragma.
 */

export const migrations: string[] = [
  // Migration 1: run_metrics
  `
  CREATE TABLE IF NOT EXISTS run_metrics (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    agent_type TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    counts TEXT NOT NULL,
    derived_rates TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_run_metrics_agent_type ON run_metrics(agent_type, seq);
  `,
];
