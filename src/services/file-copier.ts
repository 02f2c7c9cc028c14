import { createReadStream, createWriteStream } from 'node:fs';
import { rename, rm, stat } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { AddonKeeperError, PermissionDeniedError } from '../types/errors.js';
import { ensureParentDir, errorCode, errorMessage } from '../utils/fs-paths.js';
import { logThought } from '../utils/logger.js';

export const DEFAULT_COPY_CHUNK_SIZE = 1024 * 1024;

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

/**
 * Maps a low-level copy failure to a permission error on `destinationPath`,
 * or to a plain Error carrying the underlying message.
 */
export function classifyCopyError(error: unknown, destinationPath: string, operation = 'write file'): Error {
  if (error instanceof AddonKeeperError) {
    return error;
  }
  const code = errorCode(error);
  if (code && PERMISSION_CODES.has(code)) {
    return new PermissionDeniedError(destinationPath, operation);
  }
  return new Error(errorMessage(error));
}

export interface FileCopierOptions {
  chunkSize?: number;
}

export class FileCopier {
  readonly #chunkSize: number;

  constructor(options: FileCopierOptions = {}) {
    this.#chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_COPY_CHUNK_SIZE);
  }

  /**
   * Streams `sourcePath` into a sibling temp file and renames it over
   * `destinationPath`, so a failed copy never leaves a truncated destination.
   * Resolves with the number of bytes written.
   */
  async copy(sourcePath: string, destinationPath: string): Promise<number> {
    const tempPath = `${destinationPath}.${Date.now()}.tmp`;
    try {
      await ensureParentDir(destinationPath);
      await pipeline(
        createReadStream(sourcePath, { highWaterMark: this.#chunkSize }),
        createWriteStream(tempPath, { highWaterMark: this.#chunkSize }),
      );
      const { size } = await stat(tempPath);
      await rename(tempPath, destinationPath);
      return size;
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) =>
        logThought(`[FileCopier] Could not remove temp file ${tempPath}: ${errorMessage(cleanupError)}`),
      );
      throw classifyCopyError(error, destinationPath);
    }
  }
}
