import { readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { AddonProfile, BackupListing, BackupMetadata } from '../types/addon-backup.js';
import type { AddonFileMap } from '../types/game-installation.js';
import { classifyCopyError } from './file-copier.js';

export const METADATA_FILE_NAME = 'backup_metadata.json';

export function buildBackupMetadata(
  profile: AddonProfile,
  addonFiles: AddonFileMap,
  totalBytes: number,
  createdAt: Date,
): BackupMetadata {
  const addons: BackupMetadata['addons'] = {};
  let totalFiles = 0;
  for (const [addonName, files] of addonFiles) {
    addons[addonName] = {
      files: files.map((file) => path.basename(file)),
      count: files.length,
    };
    totalFiles += files.length;
  }

  return {
    profile_name: profile.name,
    account_name: profile.accountName,
    wow_installation: profile.installation?.path ?? null,
    wow_version: profile.installation?.flavor ?? null,
    created_at: createdAt.toISOString(),
    addons,
    total_files: totalFiles,
    total_size: totalBytes,
  };
}

/** Writes `backup_metadata.json` under `backupRoot`; permission failures surface as `PermissionDeniedError`. */
export async function writeBackupMetadata(backupRoot: string, metadata: BackupMetadata): Promise<string> {
  const metadataPath = path.join(backupRoot, METADATA_FILE_NAME);
  try {
    await writeFile(metadataPath, `${JSON.stringify(metadata, null, 2)}\n`, 'utf8');
  } catch (error) {
    throw classifyCopyError(error, metadataPath, 'write metadata');
  }
  return metadataPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAddonEntry(value: unknown): value is { files: string[]; count: number } {
  if (!isRecord(value)) {
    return false;
  }
  return (
    Array.isArray(value.files) &&
    value.files.every((file) => typeof file === 'string') &&
    typeof value.count === 'number'
  );
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

export function isBackupMetadata(value: unknown): value is BackupMetadata {
  if (!isRecord(value)) {
    return false;
  }
  if (!isRecord(value.addons)) {
    return false;
  }
  return (
    typeof value.profile_name === 'string' &&
    isNullableString(value.account_name) &&
    isNullableString(value.wow_installation) &&
    isNullableString(value.wow_version) &&
    typeof value.created_at === 'string' &&
    typeof value.total_files === 'number' &&
    typeof value.total_size === 'number' &&
    Object.values(value.addons).every(isAddonEntry)
  );
}

/** Manifest of a backup directory, or null when it is missing or unreadable. */
export async function readBackupMetadata(backupDir: string): Promise<BackupMetadata | null> {
  let raw: string;
  try {
    raw = await readFile(path.join(backupDir, METADATA_FILE_NAME), 'utf8');
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isBackupMetadata(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Subdirectories of `backupsDir` holding a valid manifest, newest `created_at` first. */
export async function listBackupDirectories(backupsDir: string): Promise<BackupListing[]> {
  const entries = await readdir(backupsDir, { withFileTypes: true }).catch(() => null);
  if (!entries) {
    return [];
  }

  const listings: BackupListing[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const backupPath = path.join(backupsDir, entry.name);
    const info = await readBackupMetadata(backupPath);
    if (info) {
      listings.push({ path: backupPath, info });
    }
  }

  return listings.sort((left, right) => compareDescending(left.info.created_at, right.info.created_at));
}

function compareDescending(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? 1 : -1;
}
