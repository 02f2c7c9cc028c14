import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import type { BackupRunRecord, BackupRunStatus } from '../types/addon-backup.js';

export interface BackupRunRow {
  id: string;
  profile_name: string;
  backup_path: string;
  status: BackupRunStatus;
  copied_count: number;
  skipped_count: number;
  failed_count: number;
  validation_error_count: number;
  total_bytes: number;
  detail: string | null;
  started_at: string;
  completed_at: string;
}

// ── Backup Run History ───────────────────────────────────────────────────────

export class BackupHistoryStore {
  readonly #db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.#db = new Database(dbPath);
    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS backup_runs (
        id TEXT PRIMARY KEY,
        profile_name TEXT NOT NULL,
        backup_path TEXT NOT NULL,
        status TEXT NOT NULL,
        copied_count INTEGER NOT NULL DEFAULT 0,
        skipped_count INTEGER NOT NULL DEFAULT 0,
        failed_count INTEGER NOT NULL DEFAULT 0,
        validation_error_count INTEGER NOT NULL DEFAULT 0,
        total_bytes INTEGER NOT NULL DEFAULT 0,
        detail TEXT,
        started_at TEXT NOT NULL,
        completed_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_backup_runs_completed
        ON backup_runs(completed_at DESC);
    `);
  }

  record(run: BackupRunRecord): void {
    this.#db.prepare(`
      INSERT INTO backup_runs (
        id,
        profile_name,
        backup_path,
        status,
        copied_count,
        skipped_count,
        failed_count,
        validation_error_count,
        total_bytes,
        detail,
        started_at,
        completed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        copied_count = excluded.copied_count,
        skipped_count = excluded.skipped_count,
        failed_count = excluded.failed_count,
        validation_error_count = excluded.validation_error_count,
        total_bytes = excluded.total_bytes,
        detail = excluded.detail,
        completed_at = excluded.completed_at
    `).run(
      run.id,
      run.profileName,
      run.backupPath,
      run.status,
      run.copiedCount,
      run.skippedCount,
      run.failedCount,
      run.validationErrorCount,
      run.totalBytes,
      run.detail,
      run.startedAt,
      run.completedAt,
    );
  }

  list(limit = 20): BackupRunRecord[] {
    const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit)));
    const rows = this.#db.prepare(`
      SELECT
        id,
        profile_name,
        backup_path,
        status,
        copied_count,
        skipped_count,
        failed_count,
        validation_error_count,
        total_bytes,
        detail,
        started_at,
        completed_at
      FROM backup_runs
      ORDER BY completed_at DESC
      LIMIT ?
    `).all(boundedLimit) as BackupRunRow[];
    return rows.map(toRunRecord);
  }

  close(): void {
    this.#db.close();
  }
}

function toRunRecord(row: BackupRunRow): BackupRunRecord {
  return {
    id: row.id,
    profileName: row.profile_name,
    backupPath: row.backup_path,
    status: row.status,
    copiedCount: row.copied_count,
    skippedCount: row.skipped_count,
    failedCount: row.failed_count,
    validationErrorCount: row.validation_error_count,
    totalBytes: row.total_bytes,
    detail: row.detail,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}
