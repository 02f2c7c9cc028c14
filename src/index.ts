#!/usr/bin/env node
import { handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { handleBackupCli } from './core/backup-cli.js';
import { handleLogsCli } from './core/logs-cli.js';

const argv = process.argv.slice(2);

async function main(): Promise<void> {
    if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
        return;
    }
    if (await handleLogsCli(argv)) {
        return;
    }
    await handleBackupCli(argv);
}

main().catch((error: unknown) => {
    console.error(`[addonkeeper] Fatal error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
});
