import { randomUUID } from 'node:crypto';
import { copyFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type {
  AddonProfile,
  BackupConfig,
  BackupFileStatus,
  BackupListing,
  BackupMetadata,
  BackupRunOptions,
  ConflictAction,
  ConflictSettings,
  IntegrityOptions,
} from '../types/addon-backup.js';
import type { AddonFileMap } from '../types/game-installation.js';
import { InsufficientSpaceError } from '../types/errors.js';
import { errorMessage, fileSize, nearestExistingAncestor, pathExists } from '../utils/fs-paths.js';
import { logThought } from '../utils/logger.js';
import type { BackupHistoryStore } from './backup-history.js';
import {
  buildBackupMetadata,
  listBackupDirectories,
  readBackupMetadata,
  writeBackupMetadata,
} from './backup-metadata.js';
import { BackupResult } from './backup-result.js';
import { BackupSessionRegistry } from './backup-session-registry.js';
import { ConflictResolver, nextAvailableBackupPath, type ConflictDecider } from './conflict-resolver.js';
import { getFreeSpace, type FreeSpaceProbe } from './disk-space.js';
import { classifyCopyError, FileCopier } from './file-copier.js';
import { backupDestinationFor, IntegrityValidator } from './integrity-validator.js';

export const BACKUP_FOLDER_NAME = 'Backup';
export const OPERATION_FAILURE_PATH = 'backup_operation';
export const SOURCE_NOT_FOUND_MESSAGE = 'source file not found';

interface BackupPhaseContext {
  profile: AddonProfile;
  addonFiles: AddonFileMap;
  backupRoot: string;
  result: BackupResult;
}

/** Post-copy step, run in list order when enabled. */
interface BackupPhase {
  name: string;
  enabled: boolean;
  run(context: BackupPhaseContext): Promise<void>;
}

type FileOutcome = BackupFileStatus | 'cancel';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function folderTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export interface AddonBackupManagerOptions {
  config: BackupConfig;
  conflicts: ConflictSettings;
  integrity?: Partial<IntegrityOptions>;
  decideConflict?: ConflictDecider;
  registry?: BackupSessionRegistry;
  history?: BackupHistoryStore;
  freeSpace?: FreeSpaceProbe;
  copier?: FileCopier;
  now?: () => Date;
}

export class AddonBackupManager {
  readonly #config: BackupConfig;
  readonly #conflicts: ConflictSettings;
  readonly #resolver: ConflictResolver;
  readonly #validator: IntegrityValidator;
  readonly #registry: BackupSessionRegistry;
  readonly #history?: BackupHistoryStore;
  readonly #freeSpace: FreeSpaceProbe;
  readonly #copier: FileCopier;
  readonly #now: () => Date;

  constructor(options: AddonBackupManagerOptions) {
    this.#config = options.config;
    this.#conflicts = options.conflicts;
    this.#resolver = new ConflictResolver(options.conflicts.strategy, options.decideConflict);
    this.#validator = new IntegrityValidator(options.integrity);
    this.#registry = options.registry ?? new BackupSessionRegistry();
    this.#history = options.history;
    this.#freeSpace = options.freeSpace ?? getFreeSpace;
    this.#copier = options.copier ?? new FileCopier();
    this.#now = options.now ?? (() => new Date());
  }

  get backupsDir(): string {
    return path.join(this.#config.destinationPath, BACKUP_FOLDER_NAME);
  }

  /** `<destination>/Backup/<profile>[_YYYYMMDD_HHMMSS]` */
  resolveBackupPath(profileName: string, at: Date = this.#now()): string {
    const folder = this.#config.createTimestampFolder
      ? `${profileName}_${folderTimestamp(at)}`
      : profileName;
    return path.join(this.backupsDir, folder);
  }

  /**
   * Copies every file of `addonFiles` under the profile's backup folder,
   * then runs the enabled post-copy phases.
   *
   * Throws before touching any file when the destination lacks space or
   * cannot be created, and when the same session identity is already
   * running. Every other failure is recorded on the returned result.
   */
  async createBackup(
    profile: AddonProfile,
    addonFiles: AddonFileMap,
    options: BackupRunOptions = {},
  ): Promise<BackupResult> {
    const startedAt = this.#now();
    const identity = `${profile.name}_${startedAt.toISOString()}`;

    return this.#registry.run(identity, async () => {
      const backupRoot = this.resolveBackupPath(profile.name, startedAt);
      await this.#validateRequirements(backupRoot, addonFiles);

      const result = new BackupResult();
      result.startedAt = startedAt;
      const context: BackupPhaseContext = { profile, addonFiles, backupRoot, result };

      try {
        await mkdir(backupRoot, { recursive: true });
        await this.#copyAddonFiles(context, options);
        if (!result.cancelled) {
          for (const phase of this.#postCopyPhases()) {
            if (phase.enabled) {
              await phase.run(context);
            }
          }
        }
      } catch (error) {
        result.addFailedFile(OPERATION_FAILURE_PATH, errorMessage(error));
      }

      result.finalize(this.#now());
      await this.#recordRun(profile, backupRoot, result);
      await logThought(
        `[AddonBackup] Backup '${profile.name}' ${result.status}: copied=${result.copiedFiles.length} ` +
          `skipped=${result.skippedFiles.length} failed=${result.failedFiles.length} ` +
          `validationErrors=${result.validationErrors.length} bytes=${result.totalBytes} path=${backupRoot}`,
      );
      return result;
    });
  }

  async getBackupInfo(backupPath: string): Promise<BackupMetadata | null> {
    return readBackupMetadata(backupPath);
  }

  async listBackups(backupsDir: string = this.backupsDir): Promise<BackupListing[]> {
    return listBackupDirectories(backupsDir);
  }

  async #validateRequirements(backupRoot: string, addonFiles: AddonFileMap): Promise<void> {
    let requiredBytes = 0;
    for (const files of addonFiles.values()) {
      for (const file of files) {
        requiredBytes += (await fileSize(file)) ?? 0;
      }
    }

    const backupsDir = path.dirname(backupRoot);
    const availableBytes = await this.#freeSpace(await nearestExistingAncestor(backupsDir));
    if (availableBytes < requiredBytes) {
      throw new InsufficientSpaceError(requiredBytes, availableBytes, backupsDir);
    }

    try {
      await mkdir(backupsDir, { recursive: true });
    } catch (error) {
      throw classifyCopyError(error, backupsDir, 'create directory');
    }
  }

  async #copyAddonFiles(context: BackupPhaseContext, options: BackupRunOptions): Promise<void> {
    const { addonFiles, backupRoot, result } = context;
    const total = [...addonFiles.values()].reduce((sum, files) => sum + files.length, 0);
    let current = 0;

    addonLoop: for (const [addonName, files] of addonFiles) {
      if (options.signal?.aborted) {
        result.cancelled = true;
        break;
      }
      await mkdir(path.join(backupRoot, addonName), { recursive: true });

      for (const sourcePath of files) {
        if (options.signal?.aborted) {
          result.cancelled = true;
          break addonLoop;
        }

        current += 1;
        const destinationPath = backupDestinationFor(backupRoot, addonName, sourcePath);
        const outcome = await this.#backupFile(sourcePath, destinationPath, result);

        if (outcome === 'cancel') {
          if (this.#conflicts.cancelScope === 'run') {
            result.cancelled = true;
            break addonLoop;
          }
          break;
        }
        options.onProgress?.({ addon: addonName, sourcePath, status: outcome, current, total });
      }
    }
  }

  async #backupFile(sourcePath: string, destinationPath: string, result: BackupResult): Promise<FileOutcome> {
    if (!(await pathExists(sourcePath))) {
      result.addFailedFile(sourcePath, SOURCE_NOT_FOUND_MESSAGE);
      return 'failed';
    }

    if (await pathExists(destinationPath)) {
      let action: ConflictAction;
      try {
        action = await this.#resolver.resolve(sourcePath, destinationPath);
      } catch (error) {
        result.addFailedFile(sourcePath, `conflict resolution failed: ${errorMessage(error)}`);
        return 'failed';
      }

      if (action === 'skip') {
        result.addSkippedFile(sourcePath);
        return 'skipped';
      }
      if (action === 'cancel') {
        return 'cancel';
      }
      if (action === 'backup') {
        const asidePath = await nextAvailableBackupPath(destinationPath, this.#conflicts.backupSuffix);
        try {
          await copyFile(destinationPath, asidePath);
        } catch (error) {
          result.addFailedFile(sourcePath, classifyCopyError(error, asidePath, 'create backup').message);
          return 'failed';
        }
      }
    }

    try {
      const bytes = await this.#copier.copy(sourcePath, destinationPath);
      result.addCopiedFile(sourcePath, bytes);
      return 'copied';
    } catch (error) {
      result.addFailedFile(sourcePath, errorMessage(error));
      return 'failed';
    }
  }

  #postCopyPhases(): BackupPhase[] {
    return [
      {
        name: 'integrity',
        enabled: this.#config.validateIntegrity,
        run: async ({ addonFiles, backupRoot, result }) => {
          const issues = await this.#validator.validate(addonFiles, backupRoot);
          for (const issue of issues) {
            result.addValidationError(issue);
          }
        },
      },
      {
        name: 'metadata',
        enabled: this.#config.writeMetadata,
        run: async ({ profile, addonFiles, backupRoot, result }) => {
          const metadata = buildBackupMetadata(profile, addonFiles, result.totalBytes, this.#now());
          await writeBackupMetadata(backupRoot, metadata);
        },
      },
    ];
  }

  async #recordRun(profile: AddonProfile, backupRoot: string, result: BackupResult): Promise<void> {
    if (!this.#history || !result.startedAt || !result.completedAt) {
      return;
    }
    const firstFailure = result.failedFiles[0];
    try {
      this.#history.record({
        id: randomUUID(),
        profileName: profile.name,
        backupPath: backupRoot,
        status: result.status,
        copiedCount: result.copiedFiles.length,
        skippedCount: result.skippedFiles.length,
        failedCount: result.failedFiles.length,
        validationErrorCount: result.validationErrors.length,
        totalBytes: result.totalBytes,
        detail: firstFailure ? `${firstFailure.path}: ${firstFailure.error}` : null,
        startedAt: result.startedAt.toISOString(),
        completedAt: result.completedAt.toISOString(),
      });
    } catch (error) {
      await logThought(`[BackupHistory] Failed to record run for '${profile.name}': ${errorMessage(error)}`);
    }
  }
}
