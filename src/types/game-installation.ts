export type GameFlavor =
  | 'retail'
  | 'classic'
  | 'classic_era'
  | 'classic_wrath'
  | 'ptr'
  | 'beta';

export interface GameInstallation {
  path: string;
  flavor: GameFlavor;
  clientVersion: string | null;
}

/** Addon name to the absolute paths of its SavedVariables files, in order. */
export type AddonFileMap = Map<string, string[]>;

export interface ScanOptions {
  scanPaths: string[];
  maxDepth: number;
  includePtr: boolean;
  includeBeta: boolean;
}
