import { appendFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export function getLogDir(): string {
  const override = process.env.ADDONKEEPER_LOG_DIR;
  if (override && override.trim() !== '') {
    return path.resolve(override);
  }
  return path.join(os.homedir(), '.addonkeeper', 'logs');
}

export function getDailyLogPath(date: Date = new Date()): string {
  return path.join(getLogDir(), `${date.toISOString().slice(0, 10)}.md`);
}

export function formatLogLine(message: string, date: Date = new Date()): string {
  const time = date.toISOString().slice(11, 19);
  const singleLine = message.replace(/\r?\n/g, ' ').trim();
  return `- [${time}] ${singleLine}\n`;
}

/**
 * Append a line to today's log file. Never throws; a failed write is
 * reported on stderr so the calling operation is not affected.
 */
export async function logThought(message: string): Promise<void> {
  const now = new Date();
  const logPath = getDailyLogPath(now);
  try {
    await mkdir(path.dirname(logPath), { recursive: true });
    await appendFile(logPath, formatLogLine(message, now), 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    console.error(`[addonkeeper] Failed to write log entry to ${logPath}: ${detail}`);
  }
}
