import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createRunLock, type RunLock } from './lock';

describe('createRunLock', () => {
  let tempDir: string;
  let lock: RunLock;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dropshelf-lock-test-'));
    lock = createRunLock(tempDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    lock.release();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should acquire and release the lock with owner-only permissions', () => {
    lock.acquire();

    const lockPath = path.join(tempDir, 'run.lock');
    expect(lock.path).toBe(lockPath);
    expect(lock.held).toBe(true);
    expect(fs.readFileSync(lockPath, 'utf8')).toBe(String(process.pid));
    expect(fs.statSync(lockPath).mode & 0o777).toBe(0o600);

    lock.release();
    expect(lock.held).toBe(false);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should refuse when another live process holds the lock', () => {
    fs.writeFileSync(path.join(tempDir, 'run.lock'), '424242');
    vi.spyOn(process, 'kill').mockImplementation(() => true);

    expect(() => lock.acquire()).toThrow(
      'Another run is already in progress (PID: 424242)',
    );
    expect(lock.held).toBe(false);
  });

  it('should replace a lock left by a dead process', () => {
    const lockPath = path.join(tempDir, 'run.lock');
    fs.writeFileSync(lockPath, '424242');
    vi.spyOn(process, 'kill').mockImplementation(() => {
      throw Object.assign(new Error('no such process'), { code: 'ESRCH' });
    });

    lock.acquire();

    expect(fs.readFileSync(lockPath, 'utf8')).toBe(String(process.pid));
  });

  it('should replace a lock with unreadable contents', () => {
    const lockPath = path.join(tempDir, 'run.lock');
    fs.writeFileSync(lockPath, 'garbage');

    lock.acquire();

    expect(fs.readFileSync(lockPath, 'utf8')).toBe(String(process.pid));
  });

  it('should not remove a lock that another process took over', () => {
    const lockPath = path.join(tempDir, 'run.lock');
    lock.acquire();
    fs.writeFileSync(lockPath, '424242');

    lock.release();

    expect(fs.readFileSync(lockPath, 'utf8')).toBe('424242');
  });
});
