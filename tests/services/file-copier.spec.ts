import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
}));

import { classifyCopyError, FileCopier } from '../../src/services/file-copier.js';
import { AddonKeeperError, PermissionDeniedError } from '../../src/types/errors.js';

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe('FileCopier', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'addonkeeper-copier-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('creates missing parent directories and reports the bytes written', async () => {
    const source = path.join(workspace, 'AddonX.lua');
    const destination = path.join(workspace, 'out', 'nested', 'AddonX.lua');
    await writeFile(source, 'data=1', 'utf8');

    const bytes = await new FileCopier().copy(source, destination);

    expect(bytes).toBe(6);
    expect(await readFile(destination, 'utf8')).toBe('data=1');
  });

  it('fully replaces longer existing destination content', async () => {
    const source = path.join(workspace, 'AddonX.lua');
    const destination = path.join(workspace, 'dest.lua');
    await writeFile(source, 'short', 'utf8');
    await writeFile(destination, 'a much longer previous value', 'utf8');

    await new FileCopier().copy(source, destination);

    expect(await readFile(destination, 'utf8')).toBe('short');
  });

  it('streams content across many small chunks', async () => {
    const source = path.join(workspace, 'big.lua');
    const destination = path.join(workspace, 'copy.lua');
    const content = 'SavedVar = { 1, 2, 3 }\n'.repeat(50);
    await writeFile(source, content, 'utf8');

    const bytes = await new FileCopier({ chunkSize: 7 }).copy(source, destination);

    expect(bytes).toBe(Buffer.byteLength(content));
    expect(await readFile(destination, 'utf8')).toBe(content);
  });

  it('rejects without creating the destination when the source is missing', async () => {
    const destination = path.join(workspace, 'dest.lua');

    await expect(new FileCopier().copy(path.join(workspace, 'nope.lua'), destination)).rejects.toThrow(/ENOENT/);
    const names = await readdir(workspace);
    expect(names).not.toContain('dest.lua');
  });
});

describe('classifyCopyError', () => {
  it('maps EACCES to a permission error on the destination', () => {
    const error = classifyCopyError(errnoError('EACCES', 'EACCES: permission denied'), '/backup/a.lua');

    expect(error).toBeInstanceOf(PermissionDeniedError);
    expect(error).toMatchObject({ operation: 'write file', path: '/backup/a.lua' });
    expect(error.message).toBe('Permission denied for write file on /backup/a.lua (Path: /backup/a.lua)');
  });

  it('maps EPERM using the given operation name', () => {
    const error = classifyCopyError(errnoError('EPERM', 'EPERM'), '/backup', 'create directory');
    expect(error).toMatchObject({ name: 'PermissionDeniedError', operation: 'create directory' });
  });

  it('keeps the underlying message for other failures', () => {
    const error = classifyCopyError(errnoError('ENOSPC', 'ENOSPC: no space left on device'), '/backup/a.lua');

    expect(error).not.toBeInstanceOf(PermissionDeniedError);
    expect(error.message).toBe('ENOSPC: no space left on device');
  });

  it('passes domain errors through unchanged', () => {
    const original = new AddonKeeperError('already classified');
    expect(classifyCopyError(original, '/x')).toBe(original);
  });
});
