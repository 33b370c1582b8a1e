import fs from 'node:fs';
import path from 'node:path';
import { getStateDir } from './state-dir';

const LOCK_FILENAME = 'run.lock';
const MAX_ATTEMPTS = 3;

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return (e as NodeJS.ErrnoException).code === 'EPERM';
  }
}

function tryCreateLockFile(lockPath: string): boolean {
  try {
    const fd = fs.openSync(lockPath, 'wx', 0o600);
    try {
      fs.writeFileSync(fd, String(process.pid));
    } finally {
      fs.closeSync(fd);
    }
    return true;
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === 'EEXIST') {
      return false;
    }
    throw e;
  }
}

function readLockOwner(lockPath: string): number | null | 'gone' {
  try {
    const parsed = Number.parseInt(fs.readFileSync(lockPath, 'utf8').trim(), 10);
    return Number.isNaN(parsed) ? null : parsed;
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === 'ENOENT') {
      return 'gone';
    }
    throw e;
  }
}

/**
 * PID lock guarding against two runs touching the same tree at once. The
 * lock lives in the state directory; a lock whose owner is dead is replaced.
 */
export function createRunLock(stateDir?: string) {
  const lockPath = path.join(getStateDir(stateDir), LOCK_FILENAME);
  let held = false;

  const release = (): void => {
    if (!held) {
      return;
    }
    held = false;
    process.off('exit', release);

    const owner = readLockOwner(lockPath);
    if (owner === 'gone' || (owner !== null && owner !== process.pid)) {
      return;
    }
    fs.rmSync(lockPath, { force: true });
  };

  const acquire = (): void => {
    if (held) {
      return;
    }

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      if (tryCreateLockFile(lockPath)) {
        held = true;
        process.once('exit', release);
        return;
      }

      const owner = readLockOwner(lockPath);
      if (owner === 'gone') {
        continue;
      }
      if (owner === process.pid) {
        held = true;
        process.once('exit', release);
        return;
      }
      if (owner !== null && isProcessAlive(owner)) {
        throw new Error(
          `Another run is already in progress (PID: ${owner}). ` +
            `Delete ${lockPath} if the process is no longer running.`,
        );
      }

      fs.rmSync(lockPath, { force: true });
    }

    throw new Error(
      `Failed to acquire lock at ${lockPath}. Please retry the command.`,
    );
  };

  return {
    acquire,
    release,
    get path() {
      return lockPath;
    },
    get held() {
      return held;
    },
  };
}

export type RunLock = ReturnType<typeof createRunLock>;
