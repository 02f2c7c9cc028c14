import type { ConflictAction, ConflictStrategy } from '../types/addon-backup.js';
import { pathExists } from '../utils/fs-paths.js';

/** Asked for a decision when the strategy is `prompt`. */
export type ConflictDecider = (sourcePath: string, destinationPath: string) => Promise<ConflictAction>;

/** Decision used for `prompt` when no decider is wired up. */
export const PROMPT_FALLBACK_ACTION: ConflictAction = 'skip';

export class ConflictResolver {
  readonly strategy: ConflictStrategy;
  readonly #decide?: ConflictDecider;

  constructor(strategy: ConflictStrategy, decide?: ConflictDecider) {
    this.strategy = strategy;
    this.#decide = decide;
  }

  /** Called only when `destinationPath` already exists. */
  async resolve(sourcePath: string, destinationPath: string): Promise<ConflictAction> {
    switch (this.strategy) {
      case 'overwrite':
        return 'overwrite';
      case 'skip':
        return 'skip';
      case 'backup':
        return 'backup';
      case 'prompt':
        return this.#decide ? this.#decide(sourcePath, destinationPath) : PROMPT_FALLBACK_ACTION;
    }
  }
}

export function isConflictStrategy(value: string): value is ConflictStrategy {
  return value === 'overwrite' || value === 'skip' || value === 'backup' || value === 'prompt';
}

/** `<file><suffix>`, then `<file><suffix>.1`, `.2`, ... until a free name is found. */
export async function nextAvailableBackupPath(filePath: string, suffix: string): Promise<string> {
  let candidate = `${filePath}${suffix}`;
  let counter = 1;
  while (await pathExists(candidate)) {
    candidate = `${filePath}${suffix}.${counter}`;
    counter += 1;
  }
  return candidate;
}
