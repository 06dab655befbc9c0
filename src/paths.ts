/**
 * Shared path resolution helpers
 */

import * as fs from 'fs';
import * as path from 'path';
import { execSync } from 'child_process';

export const CONFIG_DIR_NAME = '.review-threads';

function getRepoRoot(cwd: string): string | null {
  try {
    const root = execSync('git rev-parse --show-toplevel', {
      cwd,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    return root || null;
  } catch {
    // Not inside a git checkout.
    return null;
  }
}

/**
 * Project config directory: `.review-threads` in the working directory when
 * present, otherwise the one at the repository root, otherwise the working
 * directory's (not yet created).
 */
export function resolveConfigDir(cwd: string = process.cwd()): string {
  const local = path.join(cwd, CONFIG_DIR_NAME);
  if (fs.existsSync(local)) return local;

  const root = getRepoRoot(cwd);
  if (root && root !== cwd) {
    const repoDir = path.join(root, CONFIG_DIR_NAME);
    if (fs.existsSync(repoDir)) return repoDir;
  }
  return local;
}
