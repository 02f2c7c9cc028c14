import { statfs } from 'node:fs/promises';

/** Resolves with the bytes available to this process on the filesystem holding `directory`. */
export type FreeSpaceProbe = (directory: string) => Promise<number>;

export const getFreeSpace: FreeSpaceProbe = async (directory) => {
  const stats = await statfs(directory);
  return stats.bavail * stats.bsize;
};
