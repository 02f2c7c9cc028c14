import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { backupDestinationFor, IntegrityValidator } from '../../src/services/integrity-validator.js';

describe('IntegrityValidator', () => {
  let workspace: string;
  let sourceDir: string;
  let backupRoot: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'addonkeeper-validator-'));
    sourceDir = path.join(workspace, 'src');
    backupRoot = path.join(workspace, 'backup');
    await mkdir(sourceDir, { recursive: true });
    await mkdir(path.join(backupRoot, 'AddonX'), { recursive: true });
    await mkdir(path.join(backupRoot, 'AddonY'), { recursive: true });
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  async function seed(addon: string, fileName: string, source: string, copy: string | null): Promise<string> {
    const sourcePath = path.join(sourceDir, fileName);
    await writeFile(sourcePath, source, 'utf8');
    if (copy !== null) {
      await writeFile(path.join(backupRoot, addon, fileName), copy, 'utf8');
    }
    return sourcePath;
  }

  it('derives the destination from the addon folder and source file name', () => {
    expect(backupDestinationFor('/b', 'AddonX', '/games/SV/AddonX.lua.bak')).toBe(
      path.join('/b', 'AddonX', 'AddonX.lua.bak'),
    );
  });

  it('reports nothing when every copy is identical', async () => {
    const x = await seed('AddonX', 'AddonX.lua', 'data=1', 'data=1');
    const y = await seed('AddonY', 'AddonY.lua', 'data=2', 'data=2');

    const issues = await new IntegrityValidator().validate(
      new Map([['AddonX', [x]], ['AddonY', [y]]]),
      backupRoot,
    );

    expect(issues).toEqual([]);
  });

  it('flags exactly the tampered copy and leaves the others alone', async () => {
    const x = await seed('AddonX', 'AddonX.lua', 'data=1', 'data=1');
    const y = await seed('AddonY', 'AddonY.lua', 'data=2', 'data=9');

    const issues = await new IntegrityValidator().validate(
      new Map([['AddonX', [x]], ['AddonY', [y]]]),
      backupRoot,
    );

    expect(issues).toEqual([
      {
        sourcePath: y,
        destinationPath: path.join(backupRoot, 'AddonY', 'AddonY.lua'),
        reason: 'integrity check failed',
      },
    ]);
  });

  it('keeps going after the first problem', async () => {
    const missing = await seed('AddonX', 'AddonX.lua', 'data=1', null);
    const tampered = await seed('AddonX', 'AddonX.lua.bak', 'data=1', 'data=2');

    const issues = await new IntegrityValidator().validate(new Map([['AddonX', [missing, tampered]]]), backupRoot);

    expect(issues.map((issue) => [issue.sourcePath, issue.reason])).toEqual([
      [missing, 'destination file not found'],
      [tampered, 'integrity check failed'],
    ]);
  });
});
