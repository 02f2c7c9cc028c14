import path from 'node:path';
import type { BackupValidationIssue, IntegrityOptions } from '../types/addon-backup.js';
import type { AddonFileMap } from '../types/game-installation.js';
import { pathExists } from '../utils/fs-paths.js';
import { FileIntegrity } from './file-integrity.js';

export function backupDestinationFor(backupRoot: string, addonName: string, sourcePath: string): string {
  return path.join(backupRoot, addonName, path.basename(sourcePath));
}

export class IntegrityValidator {
  readonly #integrityOptions: Partial<IntegrityOptions>;

  constructor(integrityOptions: Partial<IntegrityOptions> = {}) {
    this.#integrityOptions = integrityOptions;
  }

  /** Checks every (source, destination) pair; never stops at the first issue. */
  async validate(addonFiles: AddonFileMap, backupRoot: string): Promise<BackupValidationIssue[]> {
    const issues: BackupValidationIssue[] = [];

    for (const [addonName, files] of addonFiles) {
      for (const sourcePath of files) {
        const destinationPath = backupDestinationFor(backupRoot, addonName, sourcePath);

        if (!(await pathExists(destinationPath))) {
          issues.push({ sourcePath, destinationPath, reason: 'destination file not found' });
          continue;
        }

        const sourceIntegrity = await FileIntegrity.of(sourcePath, this.#integrityOptions);
        const destinationIntegrity = await FileIntegrity.of(destinationPath, this.#integrityOptions);
        if (!sourceIntegrity.matches(destinationIntegrity)) {
          issues.push({ sourcePath, destinationPath, reason: 'integrity check failed' });
        }
      }
    }

    return issues;
  }
}
