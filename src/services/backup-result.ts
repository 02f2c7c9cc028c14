import type {
  BackupRunStatus,
  BackupSummary,
  BackupValidationIssue,
  FailedFile,
} from '../types/addon-backup.js';

/** Accumulates the outcome of one backup run. Never reused across runs. */
export class BackupResult {
  readonly copiedFiles: string[] = [];
  readonly skippedFiles: string[] = [];
  readonly failedFiles: FailedFile[] = [];
  readonly validationErrors: BackupValidationIssue[] = [];
  totalBytes = 0;
  startedAt: Date | null = null;
  completedAt: Date | null = null;
  cancelled = false;
  #success = false;

  /** Only meaningful once `finalize()` has run. */
  get success(): boolean {
    return this.#success;
  }

  get durationMs(): number | null {
    if (!this.startedAt || !this.completedAt) {
      return null;
    }
    return this.completedAt.getTime() - this.startedAt.getTime();
  }

  get status(): BackupRunStatus {
    if (this.cancelled) {
      return 'cancelled';
    }
    return this.success ? 'succeeded' : 'failed';
  }

  addCopiedFile(filePath: string, size: number): void {
    this.copiedFiles.push(filePath);
    this.totalBytes += size;
  }

  addSkippedFile(filePath: string): void {
    this.skippedFiles.push(filePath);
  }

  addFailedFile(filePath: string, error: string): void {
    this.failedFiles.push({ path: filePath, error });
  }

  addValidationError(issue: BackupValidationIssue): void {
    this.validationErrors.push(issue);
  }

  finalize(completedAt: Date): void {
    this.completedAt = completedAt;
    this.#success = this.failedFiles.length === 0 && this.validationErrors.length === 0;
  }

  toSummary(): BackupSummary {
    return {
      success: this.success,
      cancelled: this.cancelled,
      copiedFiles: [...this.copiedFiles],
      skippedFiles: [...this.skippedFiles],
      failedFiles: this.failedFiles.map((entry) => ({ ...entry })),
      validationErrors: this.validationErrors.map((issue) => ({ ...issue })),
      totalBytes: this.totalBytes,
      startedAt: this.startedAt?.toISOString() ?? null,
      completedAt: this.completedAt?.toISOString() ?? null,
      durationMs: this.durationMs,
    };
  }
}
