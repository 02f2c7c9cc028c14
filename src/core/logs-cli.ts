import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { getDailyLogPath } from '../utils/logger.js';

/**
 * Handle the `logs` command.
 * Prints today's addonkeeper log file.
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const now = new Date();
    const logPath = getDailyLogPath(now);

    if (!fs.existsSync(logPath)) {
        console.error(`[addonkeeper] No logs found for today (${now.toISOString().slice(0, 10)}) at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    const contents = await fsPromises.readFile(logPath, 'utf8');
    process.stdout.write(contents);
    process.exitCode = 0;
    return true;
}
