import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import type { AddonFileMap, GameFlavor, GameInstallation, ScanOptions } from '../types/game-installation.js';
import { SavedVariablesNotFoundError } from '../types/errors.js';
import { classifyCopyError } from './file-copier.js';
import { errorMessage, isDirectory, pathExists } from '../utils/fs-paths.js';
import { logThought } from '../utils/logger.js';

const CLIENT_EXECUTABLES = ['Wow.exe', 'WowClassic.exe', 'WowT.exe', 'Wow-64.exe'];
const MAX_PARENT_WALK = 5;

/** Client-wide SavedVariables files that do not belong to an addon. */
const CLIENT_GLOBAL_FILES = new Set([
  'bindings.lua',
  'chatcache.lua',
  'glyphcache.lua',
  'macros.lua',
  'panel.lua',
  'preferences.lua',
  'savedvariables.lua',
]);

/** Multi-file addon suites grouped under one name. */
const ADDON_SUITE_PREFIXES: Array<[prefix: string, addonName: string]> = [
  ['DBM-', 'DeadlyBossMods'],
  ['ElvUI', 'ElvUI'],
  ['Details', 'Details'],
];

export function wtfPath(installation: GameInstallation): string {
  return path.join(installation.path, 'WTF');
}

export function accountsPath(installation: GameInstallation): string {
  return path.join(wtfPath(installation), 'Account');
}

export function savedVariablesPath(installation: GameInstallation, accountName: string): string {
  return path.join(accountsPath(installation), accountName, 'SavedVariables');
}

export function defaultScanPaths(platform: NodeJS.Platform, home: string): string[] {
  switch (platform) {
    case 'win32':
      return ['C:/Program Files', 'C:/Program Files (x86)'];
    case 'darwin':
      return ['/Applications'];
    default:
      return [
        path.join(home, '.steam', 'steam', 'steamapps', 'common'),
        path.join(home, '.local', 'share', 'Steam', 'steamapps', 'common'),
      ];
  }
}

function flavorFromName(name: string): GameFlavor | null {
  const lower = name.toLowerCase();
  if (lower.includes('classic')) {
    if (lower.includes('era') || lower.includes('vanilla')) {
      return 'classic_era';
    }
    if (lower.includes('wrath') || lower.includes('wotlk')) {
      return 'classic_wrath';
    }
    return 'classic';
  }
  if (lower.includes('ptr')) {
    return 'ptr';
  }
  if (lower.includes('beta') || lower.includes('alpha')) {
    return 'beta';
  }
  return null;
}

/** Flavor from a `_retail_`-style path segment, else from the folder name; retail by default. */
export function detectFlavor(installationPath: string): GameFlavor {
  const segments = path.resolve(installationPath).split(path.sep).map((part) => part.toLowerCase());
  const whole = segments.join('/');
  for (const segment of segments) {
    switch (segment) {
      case '_retail_':
        return 'retail';
      case '_classic_':
      case '_classic_era_':
        return flavorFromName(`classic ${whole}`) ?? 'classic';
      case '_ptr_':
        return 'ptr';
      case '_beta_':
        return 'beta';
    }
  }
  return flavorFromName(path.basename(installationPath)) ?? 'retail';
}

export function addonNameForFile(fileName: string): string {
  let name = fileName;
  if (name.endsWith('.lua.bak')) {
    name = name.slice(0, -'.lua.bak'.length);
  } else if (name.endsWith('.lua')) {
    name = name.slice(0, -'.lua'.length);
  }
  for (const [prefix, addonName] of ADDON_SUITE_PREFIXES) {
    if (name.startsWith(prefix)) {
      return addonName;
    }
  }
  return name;
}

export function isAddonFile(fileName: string): boolean {
  return !CLIENT_GLOBAL_FILES.has(fileName.toLowerCase());
}

async function listSubdirectories(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right));
}

export class GameScanner {
  readonly #options: ScanOptions;
  readonly #found: GameInstallation[] = [];

  constructor(options: ScanOptions) {
    this.#options = options;
  }

  get installations(): GameInstallation[] {
    return [...this.#found];
  }

  async scanInstallations(): Promise<GameInstallation[]> {
    this.#found.splice(0, this.#found.length);

    for (const scanPath of this.#options.scanPaths) {
      if (!(await isDirectory(scanPath))) {
        continue;
      }
      try {
        await this.#scanDirectory(scanPath, 1, true);
      } catch (error) {
        await logThought(`[Scanner] Skipped ${scanPath}: ${errorMessage(error)}`);
      }
    }

    await logThought(`[Scanner] Found ${this.#found.length} installation(s).`);
    return this.installations;
  }

  async isInstallation(candidate: string): Promise<boolean> {
    if (await this.#hasAccountLayout(candidate)) {
      return true;
    }
    const hasWtf = await isDirectory(path.join(candidate, 'WTF'));
    if (!hasWtf) {
      return false;
    }
    for (const executable of CLIENT_EXECUTABLES) {
      if (await pathExists(path.join(candidate, executable))) {
        return true;
      }
    }
    return false;
  }

  async readClientVersion(installationPath: string): Promise<string | null> {
    const buildInfo = await readFile(path.join(installationPath, '.build.info'), 'utf8').catch(() => null);
    for (const line of buildInfo?.split(/\r?\n/) ?? []) {
      const parts = line.trim().split('|');
      if (line.trim() !== '' && parts.length >= 2) {
        return parts[1];
      }
    }

    for (const executable of CLIENT_EXECUTABLES.slice(0, 3)) {
      try {
        const { mtimeMs } = await stat(path.join(installationPath, executable));
        return `Build-${Math.floor(mtimeMs / 1000)}`;
      } catch {
        continue;
      }
    }
    return null;
  }

  async getAccounts(installation: GameInstallation): Promise<string[]> {
    const accountRoot = accountsPath(installation);
    if (!(await isDirectory(accountRoot))) {
      throw new SavedVariablesNotFoundError(accountRoot);
    }

    let names: string[];
    try {
      names = await listSubdirectories(accountRoot);
    } catch (error) {
      throw classifyCopyError(error, accountRoot, 'list accounts');
    }

    const accounts: string[] = [];
    for (const name of names) {
      if (!name.startsWith('.') && (await isDirectory(savedVariablesPath(installation, name)))) {
        accounts.push(name);
      }
    }
    return accounts;
  }

  /** Groups `*.lua` and `*.lua.bak` files by addon; addons and files ordered by name. */
  async getAddonFiles(installation: GameInstallation, accountName: string): Promise<AddonFileMap> {
    const directory = savedVariablesPath(installation, accountName);
    if (!(await isDirectory(directory))) {
      throw new SavedVariablesNotFoundError(directory);
    }

    let fileNames: string[];
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      fileNames = entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .filter((name) => name.endsWith('.lua') || name.endsWith('.lua.bak'))
        .sort((left, right) => left.localeCompare(right));
    } catch (error) {
      throw classifyCopyError(error, directory, 'scan addon files');
    }

    const grouped = new Map<string, string[]>();
    for (const fileName of fileNames) {
      if (!isAddonFile(fileName)) {
        continue;
      }
      const addonName = addonNameForFile(fileName);
      const files = grouped.get(addonName) ?? [];
      files.push(path.join(directory, fileName));
      grouped.set(addonName, files);
    }

    return new Map([...grouped.entries()].sort(([left], [right]) => left.localeCompare(right)));
  }

  /**
   * Registers an installation given its root, a flavor folder, or any path
   * inside `SavedVariables`. Resolves with null when nothing is found.
   */
  async addManualInstallation(inputPath: string): Promise<GameInstallation | null> {
    const resolved = path.resolve(inputPath);
    if (!(await pathExists(resolved))) {
      return null;
    }

    let root = resolved;
    if (resolved.split(path.sep).includes('SavedVariables')) {
      root = (await this.#findRootAbove(resolved)) ?? resolved;
    }
    if (!(await this.isInstallation(root))) {
      return null;
    }

    const existing = this.#found.find((installation) => installation.path === root);
    if (existing) {
      return existing;
    }
    const installation = await this.#describe(root);
    this.#found.push(installation);
    return installation;
  }

  async #scanDirectory(directory: string, depth: number, topLevel: boolean): Promise<void> {
    if (depth > this.#options.maxDepth) {
      return;
    }

    let children: string[];
    try {
      children = await listSubdirectories(directory);
    } catch (error) {
      if (topLevel) {
        throw classifyCopyError(error, directory, 'scan directory');
      }
      await logThought(`[Scanner] Cannot read ${directory}: ${errorMessage(error)}`);
      return;
    }

    for (const child of children) {
      const candidate = path.join(directory, child);
      if (await this.isInstallation(candidate)) {
        const installation = await this.#describe(candidate);
        if (this.#isFlavorIncluded(installation.flavor)) {
          this.#found.push(installation);
        }
      }
      await this.#scanDirectory(candidate, depth + 1, false);
    }
  }

  async #hasAccountLayout(candidate: string): Promise<boolean> {
    const accountRoot = path.join(candidate, 'WTF', 'Account');
    if (!(await isDirectory(accountRoot))) {
      return false;
    }
    try {
      for (const name of await listSubdirectories(accountRoot)) {
        if (!name.startsWith('.') && (await isDirectory(path.join(accountRoot, name, 'SavedVariables')))) {
          return true;
        }
      }
    } catch {
      return false;
    }
    return false;
  }

  async #findRootAbove(start: string): Promise<string | null> {
    let current = start;
    for (let level = 0; level < MAX_PARENT_WALK; level += 1) {
      if (await this.#hasAccountLayout(current)) {
        return current;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        break;
      }
      current = parent;
    }
    return null;
  }

  async #describe(installationPath: string): Promise<GameInstallation> {
    return {
      path: installationPath,
      flavor: detectFlavor(installationPath),
      clientVersion: await this.readClientVersion(installationPath),
    };
  }

  #isFlavorIncluded(flavor: GameFlavor): boolean {
    if (flavor === 'ptr') {
      return this.#options.includePtr;
    }
    if (flavor === 'beta') {
      return this.#options.includeBeta;
    }
    return true;
  }
}
