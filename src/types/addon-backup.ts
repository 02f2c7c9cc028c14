import type { GameInstallation } from './game-installation.js';

export type ConflictStrategy = 'overwrite' | 'skip' | 'backup' | 'prompt';

export type ConflictAction = 'overwrite' | 'skip' | 'backup' | 'cancel';

/** How far a `cancel` decision reaches: the current addon's remaining files, or the whole run. */
export type CancelScope = 'addon' | 'run';

export type IntegrityAlgorithm = 'md5' | 'sha256' | 'sha1' | 'sha512';

export interface AddonProfile {
  readonly name: string;
  readonly addons: readonly string[];
  readonly installation: GameInstallation | null;
  readonly accountName: string | null;
}

export interface BackupConfig {
  destinationPath: string;
  createTimestampFolder: boolean;
  validateIntegrity: boolean;
  writeMetadata: boolean;
}

export interface ConflictSettings {
  strategy: ConflictStrategy;
  backupSuffix: string;
  cancelScope: CancelScope;
}

export interface IntegrityOptions {
  algorithms: IntegrityAlgorithm[];
  chunkSize: number;
}

export interface FailedFile {
  path: string;
  error: string;
}

export type BackupValidationReason = 'destination file not found' | 'integrity check failed';

export interface BackupValidationIssue {
  sourcePath: string;
  destinationPath: string;
  reason: BackupValidationReason;
}

export type BackupFileStatus = 'copied' | 'skipped' | 'failed';

export interface BackupProgressEvent {
  addon: string;
  sourcePath: string;
  status: BackupFileStatus;
  current: number;
  total: number;
}

export interface BackupRunOptions {
  signal?: AbortSignal;
  onProgress?: (event: BackupProgressEvent) => void;
}

/** On-disk manifest; key names are a compatibility contract. */
export interface BackupMetadata {
  profile_name: string;
  account_name: string | null;
  wow_installation: string | null;
  wow_version: string | null;
  created_at: string;
  addons: Record<string, { files: string[]; count: number }>;
  total_files: number;
  total_size: number;
}

export interface BackupListing {
  path: string;
  info: BackupMetadata;
}

export interface BackupSummary {
  success: boolean;
  cancelled: boolean;
  copiedFiles: string[];
  skippedFiles: string[];
  failedFiles: FailedFile[];
  validationErrors: BackupValidationIssue[];
  totalBytes: number;
  startedAt: string | null;
  completedAt: string | null;
  durationMs: number | null;
}

export type BackupRunStatus = 'succeeded' | 'failed' | 'cancelled';

export interface BackupRunRecord {
  id: string;
  profileName: string;
  backupPath: string;
  status: BackupRunStatus;
  copiedCount: number;
  skippedCount: number;
  failedCount: number;
  validationErrorCount: number;
  totalBytes: number;
  detail: string | null;
  startedAt: string;
  completedAt: string;
}
