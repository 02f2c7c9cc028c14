// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: addonkeeper <command> [options]

Commands:
  scan                          Find game installations and their accounts
  addons <install> <account>    List addons with SavedVariables for an account
  backup <install> <account>    Back up an account's addon settings
  list [dir]                    List backups, newest first
  info <backupDir>              Print a backup's metadata
  history                       Show recorded backup runs
  logs                          Print today's log file

Backup options:
  --addons <a,b,...>            Only back up the named addons
  --name <profile>              Profile name used for the backup folder
  --dest <dir>                  Destination root (a Backup/ folder is created inside)
  --strategy <s>                overwrite | skip | backup | prompt
  --no-validate                 Skip the post-copy integrity check
  --no-metadata                 Do not write backup_metadata.json
  --no-timestamp                Do not add _YYYYMMDD_HHMMSS to the folder name

Options:
  --help, -h                    Show this help message

Examples:
  addonkeeper scan
  addonkeeper addons "/games/World of Warcraft/_retail_" MYACCOUNT
  addonkeeper backup "/games/World of Warcraft/_retail_" MYACCOUNT --addons WeakAuras,Details
  addonkeeper list
`.trim();

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags, or an empty command line.
 * Returns `true` when help was printed.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (argv.length > 0 && !argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

const KNOWN_COMMANDS = new Set(['scan', 'addons', 'backup', 'list', 'info', 'history', 'logs']);

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command)) {
    return false;
  }

  console.error(`[addonkeeper] Unknown command: '${command}'`);
  console.error(`Run 'addonkeeper --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
