import * as readline from 'node:readline';
import { readConfig, type AddonKeeperConfig } from '../config/json-config.js';
import { AddonBackupManager } from '../services/addon-backup.js';
import { BackupHistoryStore } from '../services/backup-history.js';
import type { BackupResult } from '../services/backup-result.js';
import { isConflictStrategy, PROMPT_FALLBACK_ACTION, type ConflictDecider } from '../services/conflict-resolver.js';
import type { FreeSpaceProbe } from '../services/disk-space.js';
import { GameScanner } from '../services/game-scanner.js';
import type { AddonProfile, ConflictAction, ConflictStrategy } from '../types/addon-backup.js';
import { InstallationNotFoundError } from '../types/errors.js';
import type { AddonFileMap, GameInstallation } from '../types/game-installation.js';
import { errorMessage } from '../utils/fs-paths.js';

const MAX_LISTED_PROBLEMS = 5;

export interface BackupCliDeps {
  loadConfig?: () => Promise<AddonKeeperConfig>;
  openHistory?: (dbPath: string) => BackupHistoryStore;
  decideConflict?: ConflictDecider;
  freeSpace?: FreeSpaceProbe;
}

export interface ParsedBackupArgs {
  installationPath: string;
  accountName: string;
  addons: string[];
  profileName?: string;
  destinationPath?: string;
  strategy?: ConflictStrategy;
  validateIntegrity?: boolean;
  writeMetadata?: boolean;
  createTimestampFolder?: boolean;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const next = argv[index + 1];
  if (!next || next.startsWith('--')) {
    throw new Error(`Missing value for ${flag}.`);
  }
  return next;
}

export function parseBackupArgs(argv: string[]): ParsedBackupArgs {
  if (argv[0] !== 'backup') {
    throw new Error('Backup parser expects argv beginning with "backup".');
  }
  const installationPath = argv[1];
  const accountName = argv[2];
  if (!installationPath || installationPath.startsWith('--') || !accountName || accountName.startsWith('--')) {
    throw new Error('Usage: backup <installation> <account> [options].');
  }

  const parsed: ParsedBackupArgs = { installationPath, accountName, addons: [] };

  for (let i = 3; i < argv.length; i += 1) {
    const token = argv[i];
    switch (token) {
      case '--addons':
        parsed.addons = requireValue(argv, i, token)
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name !== '');
        i += 1;
        break;
      case '--name':
        parsed.profileName = requireValue(argv, i, token);
        i += 1;
        break;
      case '--dest':
        parsed.destinationPath = requireValue(argv, i, token);
        i += 1;
        break;
      case '--strategy': {
        const strategy = requireValue(argv, i, token);
        if (!isConflictStrategy(strategy)) {
          throw new Error(`Unknown conflict strategy '${strategy}'. Use overwrite, skip, backup or prompt.`);
        }
        parsed.strategy = strategy;
        i += 1;
        break;
      }
      case '--no-validate':
        parsed.validateIntegrity = false;
        break;
      case '--no-metadata':
        parsed.writeMetadata = false;
        break;
      case '--no-timestamp':
        parsed.createTimestampFolder = false;
        break;
      default:
        throw new Error(`Unknown backup option '${token}'.`);
    }
  }

  return parsed;
}

/** Keeps only the requested addons, in the order they were requested. */
export function selectAddonFiles(available: AddonFileMap, requested: string[]): AddonFileMap {
  if (requested.length === 0) {
    return new Map(available);
  }
  const missing = requested.filter((name) => !available.has(name));
  if (missing.length > 0) {
    throw new Error(`Addon(s) not found: ${missing.join(', ')}.`);
  }
  return new Map(requested.map((name) => [name, available.get(name) ?? []]));
}

export function formatBackupReport(result: BackupResult, backupPath: string): string {
  const lines = [
    `${result.success ? 'Backup completed successfully' : result.cancelled ? 'Backup cancelled' : 'Backup finished with errors'}: ${backupPath}`,
    `  copied=${result.copiedFiles.length} skipped=${result.skippedFiles.length} failed=${result.failedFiles.length} ` +
      `validationErrors=${result.validationErrors.length} bytes=${result.totalBytes}`,
  ];

  const problems = [
    ...result.failedFiles.map((entry) => `  ✗ ${entry.path}: ${entry.error}`),
    ...result.validationErrors.map((issue) => `  ✗ ${issue.sourcePath}: ${issue.reason}`),
  ];
  lines.push(...problems.slice(0, MAX_LISTED_PROBLEMS));
  if (problems.length > MAX_LISTED_PROBLEMS) {
    lines.push(`  ... +${problems.length - MAX_LISTED_PROBLEMS} more`);
  }
  return lines.join('\n');
}

const CONFLICT_ANSWERS: Record<string, ConflictAction> = {
  o: 'overwrite',
  s: 'skip',
  b: 'backup',
  c: 'cancel',
};

/** Terminal prompt used for the `prompt` conflict strategy; input that ends unanswered skips the file. */
export function createTerminalDecider(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ConflictDecider {
  return (_sourcePath, destinationPath) =>
    new Promise((resolve) => {
      const rl = readline.createInterface({ input, output });
      rl.once('close', () => resolve(PROMPT_FALLBACK_ACTION));
      rl.question(
        `File exists: ${destinationPath}\nWhat would you like to do? [(O)verwrite/(S)kip/(B)ackup/(C)ancel] `,
        (answer) => {
          resolve(CONFLICT_ANSWERS[answer.trim().charAt(0).toLowerCase()] ?? PROMPT_FALLBACK_ACTION);
          rl.close();
        },
      );
    });
}

async function resolveInstallation(scanner: GameScanner, inputPath: string): Promise<GameInstallation> {
  const installation = await scanner.addManualInstallation(inputPath);
  if (!installation) {
    throw new InstallationNotFoundError(inputPath);
  }
  return installation;
}

async function runScan(config: AddonKeeperConfig): Promise<void> {
  const scanner = new GameScanner(config.scan);
  const installations = await scanner.scanInstallations();
  if (installations.length === 0) {
    console.log('No installations found. Add scan paths to the config or pass a path to `addons`.');
    return;
  }

  console.log(`Found ${installations.length} installation(s):`);
  for (const installation of installations) {
    const accounts = await scanner.getAccounts(installation);
    console.log(`  ${installation.flavor}\t${installation.path}\tversion=${installation.clientVersion ?? 'unknown'}`);
    for (const account of accounts) {
      console.log(`    account: ${account}`);
    }
  }
}

async function runAddons(config: AddonKeeperConfig, argv: string[]): Promise<void> {
  const [, inputPath, accountName] = argv;
  if (!inputPath || !accountName) {
    throw new Error('Usage: addons <installation> <account>.');
  }
  const scanner = new GameScanner(config.scan);
  const installation = await resolveInstallation(scanner, inputPath);
  const addonFiles = await scanner.getAddonFiles(installation, accountName);

  console.log(`Addons for account '${accountName}' (${addonFiles.size}):`);
  for (const [addonName, files] of addonFiles) {
    console.log(`  ${addonName} (${files.length} file${files.length === 1 ? '' : 's'})`);
  }
}

async function runBackup(config: AddonKeeperConfig, argv: string[], deps: BackupCliDeps): Promise<void> {
  const args = parseBackupArgs(argv);
  const scanner = new GameScanner(config.scan);
  const installation = await resolveInstallation(scanner, args.installationPath);
  const addonFiles = selectAddonFiles(
    await scanner.getAddonFiles(installation, args.accountName),
    args.addons,
  );

  const profile: AddonProfile = Object.freeze({
    name: args.profileName ?? `backup_${args.accountName}_${addonFiles.size}_addons`,
    addons: Object.freeze([...addonFiles.keys()]),
    installation,
    accountName: args.accountName,
  });

  const strategy = args.strategy ?? config.conflicts.strategy;
  const history = config.history.enabled
    ? (deps.openHistory ?? ((dbPath: string) => new BackupHistoryStore(dbPath)))(config.history.dbPath)
    : undefined;

  try {
    const manager = new AddonBackupManager({
      config: {
        destinationPath: args.destinationPath ?? config.backup.destinationPath,
        createTimestampFolder: args.createTimestampFolder ?? config.backup.createTimestampFolder,
        validateIntegrity: args.validateIntegrity ?? config.backup.validateIntegrity,
        writeMetadata: args.writeMetadata ?? config.backup.writeMetadata,
      },
      conflicts: { ...config.conflicts, strategy },
      integrity: config.integrity,
      decideConflict: strategy === 'prompt' ? (deps.decideConflict ?? createTerminalDecider()) : undefined,
      history,
      freeSpace: deps.freeSpace,
    });

    const startedAt = new Date();
    const result = await manager.createBackup(profile, addonFiles, {
      onProgress: (event) => {
        console.log(`  [${event.current}/${event.total}] ${event.status} ${event.addon}: ${event.sourcePath}`);
      },
    });
    console.log(formatBackupReport(result, manager.resolveBackupPath(profile.name, result.startedAt ?? startedAt)));
    process.exitCode = result.success ? 0 : 1;
  } finally {
    history?.close();
  }
}

async function runList(config: AddonKeeperConfig, argv: string[]): Promise<void> {
  const manager = new AddonBackupManager({ config: config.backup, conflicts: config.conflicts });
  const backups = await manager.listBackups(argv[1] ?? manager.backupsDir);
  if (backups.length === 0) {
    console.log('No backups found.');
    return;
  }
  console.log(`Backups (${backups.length}):`);
  for (const backup of backups) {
    console.log(
      `  ${backup.info.created_at}\t${backup.info.profile_name}\tfiles=${backup.info.total_files}\tbytes=${backup.info.total_size}\t${backup.path}`,
    );
  }
}

async function runInfo(config: AddonKeeperConfig, argv: string[]): Promise<void> {
  const backupPath = argv[1];
  if (!backupPath) {
    throw new Error('Usage: info <backupDir>.');
  }
  const manager = new AddonBackupManager({ config: config.backup, conflicts: config.conflicts });
  const info = await manager.getBackupInfo(backupPath);
  if (!info) {
    throw new Error(`No readable backup metadata at '${backupPath}'.`);
  }
  console.log(JSON.stringify(info, null, 2));
}

function runHistory(config: AddonKeeperConfig, deps: BackupCliDeps): void {
  const history = (deps.openHistory ?? ((dbPath: string) => new BackupHistoryStore(dbPath)))(config.history.dbPath);
  try {
    const runs = history.list(20);
    if (runs.length === 0) {
      console.log('No backup runs recorded.');
      return;
    }
    for (const run of runs) {
      console.log(
        `  ${run.completedAt}\t${run.status}\t${run.profileName}\tcopied=${run.copiedCount} failed=${run.failedCount}\t${run.backupPath}`,
      );
    }
  } finally {
    history.close();
  }
}

const BACKUP_COMMANDS = new Set(['scan', 'addons', 'backup', 'list', 'info', 'history']);

/**
 * Handle the `scan`, `addons`, `backup`, `list`, `info` and `history` commands.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleBackupCli(argv: string[], deps: BackupCliDeps = {}): Promise<boolean> {
  const command = argv[0];
  if (!command || !BACKUP_COMMANDS.has(command)) return false;

  try {
    const config = await (deps.loadConfig ?? readConfig)();
    switch (command) {
      case 'scan':
        await runScan(config);
        break;
      case 'addons':
        await runAddons(config, argv);
        break;
      case 'backup':
        await runBackup(config, argv, deps);
        return true;
      case 'list':
        await runList(config, argv);
        break;
      case 'info':
        await runInfo(config, argv);
        break;
      case 'history':
        runHistory(config, deps);
        break;
    }
    process.exitCode = 0;
  } catch (error) {
    console.error(`[addonkeeper] ${command} failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }

  return true;
}
