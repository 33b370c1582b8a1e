import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';

export const DEFAULT_STATE_DIR = path.join(os.homedir(), '.dropshelf');

/**
 * Returns the private state directory (lock file, upload ledger), creating
 * it with owner-only permissions.
 */
export function getStateDir(dir: string = DEFAULT_STATE_DIR): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const stats = fs.statSync(dir);
  if (!stats.isDirectory()) {
    throw new Error(`State path is not a directory: ${dir}`);
  }
  fs.chmodSync(dir, 0o700);
  return dir;
}
