import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConflictResolver,
  isConflictStrategy,
  nextAvailableBackupPath,
} from '../../src/services/conflict-resolver.js';

describe('ConflictResolver', () => {
  it.each([
    ['overwrite', 'overwrite'],
    ['skip', 'skip'],
    ['backup', 'backup'],
  ] as const)('maps the %s strategy to the %s action', async (strategy, action) => {
    const resolver = new ConflictResolver(strategy);
    await expect(resolver.resolve('/src/a.lua', '/dest/a.lua')).resolves.toBe(action);
  });

  it('asks the injected decider under the prompt strategy', async () => {
    const decide = vi.fn(async () => 'cancel' as const);
    const resolver = new ConflictResolver('prompt', decide);

    await expect(resolver.resolve('/src/a.lua', '/dest/a.lua')).resolves.toBe('cancel');
    expect(decide).toHaveBeenCalledWith('/src/a.lua', '/dest/a.lua');
  });

  it('falls back to skip under the prompt strategy when no decider is wired', async () => {
    const resolver = new ConflictResolver('prompt');
    await expect(resolver.resolve('/src/a.lua', '/dest/a.lua')).resolves.toBe('skip');
  });

  it('ignores the decider for non-prompt strategies', async () => {
    const decide = vi.fn(async () => 'cancel' as const);
    const resolver = new ConflictResolver('overwrite', decide);

    await expect(resolver.resolve('/src/a.lua', '/dest/a.lua')).resolves.toBe('overwrite');
    expect(decide).not.toHaveBeenCalled();
  });

  it('recognizes only the four strategies', () => {
    expect(isConflictStrategy('backup')).toBe(true);
    expect(isConflictStrategy('cancel')).toBe(false);
    expect(isConflictStrategy('')).toBe(false);
  });
});

describe('nextAvailableBackupPath', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'addonkeeper-conflict-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('appends the suffix when the name is free', async () => {
    const target = path.join(workspace, 'AddonX.lua');
    await expect(nextAvailableBackupPath(target, '.backup')).resolves.toBe(`${target}.backup`);
  });

  it('adds a counter when earlier backups exist', async () => {
    const target = path.join(workspace, 'AddonX.lua');
    await writeFile(`${target}.backup`, 'one', 'utf8');
    await writeFile(`${target}.backup.1`, 'two', 'utf8');

    await expect(nextAvailableBackupPath(target, '.backup')).resolves.toBe(`${target}.backup.2`);
  });
});
