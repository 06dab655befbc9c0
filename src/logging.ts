/**
 * Log file helpers with rotation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { resolveConfigDir } from './paths.js';

export const LOG_FILE_NAME = 'review-threads.log';
const LOG_ROTATE_BYTES = 10 * 1024 * 1024;

function ensureLogDir(configDir: string): string {
  const logDir = path.join(configDir, 'logs');
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  return logDir;
}

export function getLogPath(filename: string = LOG_FILE_NAME, configDir: string = resolveConfigDir()): string {
  return path.join(ensureLogDir(configDir), filename);
}

/** Shift `log` to `log.1` and `log.1` to `log.2` once it reaches `maxBytes`. */
export function rotateLogFile(logPath: string, maxBytes: number = LOG_ROTATE_BYTES): void {
  try {
    if (!fs.existsSync(logPath)) return;
    if (fs.statSync(logPath).size < maxBytes) return;

    const first = `${logPath}.1`;
    const second = `${logPath}.2`;
    if (fs.existsSync(second)) {
      fs.rmSync(second, { force: true });
    }
    if (fs.existsSync(first)) {
      fs.renameSync(first, second);
    }
    fs.renameSync(logPath, first);
  } catch (err) {
    // Rotation is best effort; a failure must not stop the browser.
    process.stderr.write(`log rotation failed: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}

export function createLogFileWriter(
  logPath: string,
  options: { maxBytes?: number; now?: () => Date } = {},
): (line: string) => void {
  rotateLogFile(logPath, options.maxBytes);
  const now = options.now ?? (() => new Date());
  let failed = false;
  return (line: string) => {
    if (failed) return;
    try {
      fs.appendFileSync(logPath, `${now().toISOString()} ${line}\n`, 'utf8');
    } catch {
      // Stop writing after the first failure; the TUI owns the terminal so there is nowhere to report it.
      failed = true;
    }
  };
}
