import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import type {
    BackupConfig,
    CancelScope,
    ConflictSettings,
    IntegrityAlgorithm,
    IntegrityOptions,
} from '../types/addon-backup.js';
import type { ScanOptions } from '../types/game-installation.js';
import { isConflictStrategy } from '../services/conflict-resolver.js';
import { defaultScanPaths } from '../services/game-scanner.js';
import { ConfigurationError } from '../types/errors.js';
import { errorCode, errorMessage } from '../utils/fs-paths.js';

export interface HistoryConfig {
    enabled: boolean;
    dbPath: string;
}

export interface AddonKeeperConfig {
    backup: BackupConfig;
    conflicts: ConflictSettings;
    integrity: IntegrityOptions;
    scan: ScanOptions;
    history: HistoryConfig;
}

export function getDataDir(): string {
    return path.join(os.homedir(), '.addonkeeper');
}

export function createDefaultConfig(): AddonKeeperConfig {
    const dataDir = getDataDir();
    return {
        backup: {
            destinationPath: path.join(os.homedir(), 'AddonBackups'),
            createTimestampFolder: true,
            validateIntegrity: true,
            writeMetadata: true,
        },
        conflicts: {
            strategy: 'prompt',
            backupSuffix: '.backup',
            cancelScope: 'addon',
        },
        integrity: {
            algorithms: ['md5', 'sha256'],
            chunkSize: 4096,
        },
        scan: {
            scanPaths: defaultScanPaths(process.platform, os.homedir()),
            maxDepth: 3,
            includePtr: false,
            includeBeta: false,
        },
        history: {
            enabled: true,
            dbPath: path.join(dataDir, 'history.db'),
        },
    };
}

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.ADDONKEEPER_CONFIG_PATH) {
        return path.resolve(process.env.ADDONKEEPER_CONFIG_PATH);
    }
    return path.join(getDataDir(), 'addonkeeper.json');
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export async function readConfig(overridePath?: string): Promise<AddonKeeperConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return applyEnvOverrides(mergeWithDefaults({}));
        throw new ConfigurationError(`Failed to read config file at ${targetPath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        throw new ConfigurationError(`Failed to parse config file at ${targetPath}: ${errorMessage(error)}`);
    }
    return applyEnvOverrides(mergeWithDefaults(parsed));
}

export async function writeConfig(config: AddonKeeperConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8' });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new ConfigurationError(`Failed to save config to ${targetPath}: ${errorMessage(error)}`);
    }
}

function asRecord(value: unknown): Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? value as Record<string, unknown>
        : {};
}

function pickString(value: unknown, fallback: string): string {
    return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback;
}

function pickPositiveInt(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

const INTEGRITY_ALGORITHMS: readonly IntegrityAlgorithm[] = ['md5', 'sha1', 'sha256', 'sha512'];

function isIntegrityAlgorithm(value: unknown): value is IntegrityAlgorithm {
    return INTEGRITY_ALGORITHMS.some((algorithm) => algorithm === value);
}

function isCancelScope(value: unknown): value is CancelScope {
    return value === 'addon' || value === 'run';
}

export function mergeWithDefaults(loaded: unknown): AddonKeeperConfig {
    const config = createDefaultConfig();
    const loadedRecord = asRecord(loaded);

    const backup = asRecord(loadedRecord.backup);
    config.backup = {
        destinationPath: pickString(backup.destinationPath, config.backup.destinationPath),
        createTimestampFolder: pickBoolean(backup.createTimestampFolder, config.backup.createTimestampFolder),
        validateIntegrity: pickBoolean(backup.validateIntegrity, config.backup.validateIntegrity),
        writeMetadata: pickBoolean(backup.writeMetadata, config.backup.writeMetadata),
    };

    const conflicts = asRecord(loadedRecord.conflicts);
    if (conflicts.strategy !== undefined) {
        if (typeof conflicts.strategy !== 'string' || !isConflictStrategy(conflicts.strategy)) {
            throw new ConfigurationError(
                `Unsupported conflict strategy '${String(conflicts.strategy)}'. Use overwrite, skip, backup or prompt.`,
                'conflicts.strategy',
            );
        }
        config.conflicts.strategy = conflicts.strategy;
    }
    config.conflicts.backupSuffix = pickString(conflicts.backupSuffix, config.conflicts.backupSuffix);
    if (isCancelScope(conflicts.cancelScope)) config.conflicts.cancelScope = conflicts.cancelScope;

    const integrity = asRecord(loadedRecord.integrity);
    if (Array.isArray(integrity.algorithms)) {
        const algorithms = integrity.algorithms.filter(isIntegrityAlgorithm);
        if (algorithms.length === 0) {
            throw new ConfigurationError('At least one integrity algorithm is required.', 'integrity.algorithms');
        }
        config.integrity.algorithms = [...new Set(algorithms)];
    }
    config.integrity.chunkSize = pickPositiveInt(integrity.chunkSize, config.integrity.chunkSize);

    const scan = asRecord(loadedRecord.scan);
    if (Array.isArray(scan.scanPaths)) {
        config.scan.scanPaths = scan.scanPaths.filter((value): value is string => typeof value === 'string');
    }
    config.scan.maxDepth = pickPositiveInt(scan.maxDepth, config.scan.maxDepth);
    config.scan.includePtr = pickBoolean(scan.includePtr, config.scan.includePtr);
    config.scan.includeBeta = pickBoolean(scan.includeBeta, config.scan.includeBeta);

    const history = asRecord(loadedRecord.history);
    config.history.enabled = pickBoolean(history.enabled, config.history.enabled);
    config.history.dbPath = pickString(history.dbPath, config.history.dbPath);

    return config;
}

function applyEnvOverrides(config: AddonKeeperConfig): AddonKeeperConfig {
    const destination = process.env.ADDONKEEPER_BACKUP_DEST;
    if (destination !== undefined && destination.trim() !== '') {
        config.backup.destinationPath = path.resolve(destination);
    }
    return config;
}
