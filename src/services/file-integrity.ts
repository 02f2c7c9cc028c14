import { createHash, type Hash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { IntegrityAlgorithm, IntegrityOptions } from '../types/addon-backup.js';

export const DEFAULT_INTEGRITY_OPTIONS: IntegrityOptions = {
  algorithms: ['md5', 'sha256'],
  chunkSize: 4096,
};

/**
 * Size, modification time and content digests of one file.
 *
 * A record computed for a missing or unreadable file keeps a null size and
 * empty digests. Two such records still `match` each other; use
 * `isComplete()` when "both missing" must be told apart from "equal".
 */
export class FileIntegrity {
  readonly filePath: string;
  size: number | null = null;
  modifiedTime: Date | null = null;
  readonly digests: Map<IntegrityAlgorithm, string> = new Map();
  readonly #options: IntegrityOptions;

  constructor(filePath: string, options: Partial<IntegrityOptions> = {}) {
    this.filePath = filePath;
    this.#options = {
      algorithms: options.algorithms ?? DEFAULT_INTEGRITY_OPTIONS.algorithms,
      chunkSize: Math.max(1, options.chunkSize ?? DEFAULT_INTEGRITY_OPTIONS.chunkSize),
    };
    for (const algorithm of this.#options.algorithms) {
      this.digests.set(algorithm, '');
    }
  }

  static async of(filePath: string, options: Partial<IntegrityOptions> = {}): Promise<FileIntegrity> {
    const integrity = new FileIntegrity(filePath, options);
    await integrity.calculate();
    return integrity;
  }

  get md5Hash(): string {
    return this.digests.get('md5') ?? '';
  }

  get sha256Hash(): string {
    return this.digests.get('sha256') ?? '';
  }

  async calculate(): Promise<void> {
    try {
      const fileStat = await stat(this.filePath);
      this.size = fileStat.size;
      this.modifiedTime = fileStat.mtime;
    } catch {
      this.size = null;
      this.modifiedTime = null;
      this.#resetDigests();
      return;
    }

    const hashes = new Map<IntegrityAlgorithm, Hash>(
      this.#options.algorithms.map((algorithm) => [algorithm, createHash(algorithm)]),
    );
    try {
      const stream = createReadStream(this.filePath, { highWaterMark: this.#options.chunkSize });
      for await (const chunk of stream) {
        for (const hash of hashes.values()) {
          hash.update(chunk);
        }
      }
    } catch {
      this.#resetDigests();
      return;
    }

    for (const [algorithm, hash] of hashes) {
      this.digests.set(algorithm, hash.digest('hex'));
    }
  }

  matches(other: FileIntegrity): boolean {
    if (this.size !== other.size) {
      return false;
    }
    const algorithms = new Set([...this.digests.keys(), ...other.digests.keys()]);
    for (const algorithm of algorithms) {
      if ((this.digests.get(algorithm) ?? '') !== (other.digests.get(algorithm) ?? '')) {
        return false;
      }
    }
    return true;
  }

  isComplete(): boolean {
    return this.size !== null && [...this.digests.values()].every((digest) => digest !== '');
  }

  #resetDigests(): void {
    for (const algorithm of this.digests.keys()) {
      this.digests.set(algorithm, '');
    }
  }
}
