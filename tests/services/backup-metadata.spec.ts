import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildBackupMetadata,
  isBackupMetadata,
  listBackupDirectories,
  METADATA_FILE_NAME,
  readBackupMetadata,
  writeBackupMetadata,
} from '../../src/services/backup-metadata.js';
import type { AddonProfile, BackupMetadata } from '../../src/types/addon-backup.js';

const profile: AddonProfile = {
  name: 'raid-setup',
  addons: ['WeakAuras', 'Details'],
  installation: { path: '/games/wow/_retail_', flavor: 'retail', clientVersion: '11.0.2' },
  accountName: 'ACCOUNT1',
};

function metadataFor(profileName: string, createdAt: string): BackupMetadata {
  return {
    profile_name: profileName,
    account_name: null,
    wow_installation: null,
    wow_version: null,
    created_at: createdAt,
    addons: {},
    total_files: 0,
    total_size: 0,
  };
}

describe('backup metadata', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'addonkeeper-metadata-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('describes the profile, addons and totals with stable keys', () => {
    const metadata = buildBackupMetadata(
      profile,
      new Map([
        ['WeakAuras', ['/sv/WeakAuras.lua', '/sv/WeakAuras.lua.bak']],
        ['Details', ['/sv/Details.lua']],
      ]),
      1234,
      new Date(Date.UTC(2026, 9, 18, 12, 30, 0)),
    );

    expect(metadata).toEqual({
      profile_name: 'raid-setup',
      account_name: 'ACCOUNT1',
      wow_installation: '/games/wow/_retail_',
      wow_version: 'retail',
      created_at: '2026-10-18T12:30:00.000Z',
      addons: {
        WeakAuras: { files: ['WeakAuras.lua', 'WeakAuras.lua.bak'], count: 2 },
        Details: { files: ['Details.lua'], count: 1 },
      },
      total_files: 3,
      total_size: 1234,
    });
  });

  it('uses nulls when no installation is attached', () => {
    const metadata = buildBackupMetadata(
      { ...profile, installation: null, accountName: null },
      new Map(),
      0,
      new Date(0),
    );

    expect(metadata.wow_installation).toBeNull();
    expect(metadata.wow_version).toBeNull();
    expect(metadata.account_name).toBeNull();
    expect(metadata.total_files).toBe(0);
  });

  it('writes a readable document that reads back identically', async () => {
    const metadata = metadataFor('raid-setup', '2026-10-18T12:30:00.000Z');

    const written = await writeBackupMetadata(workspace, metadata);

    expect(written).toBe(path.join(workspace, METADATA_FILE_NAME));
    expect(await readFile(written, 'utf8')).toBe(`${JSON.stringify(metadata, null, 2)}\n`);
    await expect(readBackupMetadata(workspace)).resolves.toEqual(metadata);
  });

  it('returns null for missing, malformed or foreign manifests', async () => {
    await expect(readBackupMetadata(workspace)).resolves.toBeNull();

    await writeFile(path.join(workspace, METADATA_FILE_NAME), '{ not json', 'utf8');
    await expect(readBackupMetadata(workspace)).resolves.toBeNull();

    await writeFile(path.join(workspace, METADATA_FILE_NAME), '{"profile_name": 5}', 'utf8');
    await expect(readBackupMetadata(workspace)).resolves.toBeNull();
  });

  it('rejects addon entries with the wrong shape', () => {
    const bad = { ...metadataFor('p', '2026-01-01T00:00:00.000Z'), addons: { X: { files: 'a.lua', count: 1 } } };
    expect(isBackupMetadata(bad)).toBe(false);
  });

  it('lists backups with valid manifests, newest first', async () => {
    const backupsDir = path.join(workspace, 'Backup');
    for (const [folder, createdAt] of [
      ['older', '2026-10-01T08:00:00.000Z'],
      ['newest', '2026-10-18T08:00:00.000Z'],
      ['middle', '2026-10-10T08:00:00.000Z'],
    ]) {
      await mkdir(path.join(backupsDir, folder), { recursive: true });
      await writeBackupMetadata(path.join(backupsDir, folder), metadataFor(folder, createdAt));
    }
    await mkdir(path.join(backupsDir, 'no-manifest'), { recursive: true });
    await writeFile(path.join(backupsDir, 'stray.txt'), 'x', 'utf8');

    const listings = await listBackupDirectories(backupsDir);

    expect(listings.map((listing) => listing.info.profile_name)).toEqual(['newest', 'middle', 'older']);
    expect(listings[0].path).toBe(path.join(backupsDir, 'newest'));
  });

  it('lists nothing for a missing directory', async () => {
    await expect(listBackupDirectories(path.join(workspace, 'absent'))).resolves.toEqual([]);
  });
});
