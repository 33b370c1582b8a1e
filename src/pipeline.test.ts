import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import {
  createMockStorage,
  createTempDir,
  createTestConfig,
  removeTempDir,
  writeArtifact,
  writeFile,
  type MockStorage,
} from '../test-config/mocks/test-helpers';
import { requiredFolders, type AppConfig } from './core/config/config';
import { Verbosity } from './interfaces/logger';
import type { StoragePort } from './interfaces/storage';
import { createPipeline } from './pipeline';

describe('createPipeline', () => {
  let baseDir: string;
  let config: AppConfig;
  let storage: MockStorage;
  let createStoragePort: Mock<() => StoragePort>;

  beforeEach(async () => {
    baseDir = await createTempDir('dropshelf-pipeline');
    config = createTestConfig(baseDir);
    storage = createMockStorage();
    createStoragePort = vi.fn(() => storage.port);
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  const pipeline = (dependencies: Parameters<typeof createPipeline>[2] = {}) =>
    createPipeline(
      config,
      { verbosity: Verbosity.Quiet },
      { createStoragePort, ...dependencies },
    );

  it('should create the folder taxonomy once', async () => {
    const first = await pipeline().folders();
    const second = await pipeline().folders();

    expect(first.summary).toEqual({
      created: requiredFolders(config).length,
      total: requiredFolders(config).length,
    });
    expect(second.summary.created).toBe(0);
    expect(requiredFolders(config).every((folder) => fs.existsSync(folder))).toBe(true);
  });

  it('should route, back up, upload and check health in one run', async () => {
    const commands = pipeline();
    await commands.folders();
    await writeFile(path.join(config.dropZone, 'report.pdf'), 'quarterly report');

    const outcome = await commands.run('daily');

    expect(outcome.command).toBe('run');
    expect(outcome.ok).toBe(true);
    expect(outcome.summary.route).toEqual({
      ok: true,
      scanned: 1,
      moved: 1,
      skippedDuplicate: 0,
      skippedInvalid: 0,
      failed: 0,
      failuresByReason: { IOError: 0, PermissionDenied: 0, InvalidContent: 0 },
    });
    expect(outcome.summary.backup).toMatchObject({
      ok: true,
      kind: 'daily',
      built: true,
      members: 1,
      demoted: 0,
      evicted: 0,
      working: 1,
      archive: 0,
    });
    expect(outcome.summary.upload).toEqual({
      ok: true,
      kind: 'daily',
      attempted: 1,
      uploaded: 1,
      alreadyPresent: 0,
      failed: 0,
    });
    expect(outcome.summary.health).toMatchObject({ ok: true, passed: true });
    expect(storage.objects.size).toBe(1);
    expect(createStoragePort).toHaveBeenCalledTimes(1);
    expect(storage.port.authenticate).toHaveBeenCalledTimes(1);
  });

  it('should keep going after a stage throws', async () => {
    await writeFile(path.join(baseDir, '00_Admin', 'a.pdf'), 'admin file');
    const commands = pipeline({
      createFileRouter: () => ({
        scan: async () => [],
        route: async () => {
          throw new Error('drop zone unavailable');
        },
      }),
    });

    const outcome = await commands.run('daily');

    expect(outcome.ok).toBe(false);
    expect(outcome.summary.route).toEqual({ ok: false, error: 'drop zone unavailable' });
    expect(outcome.summary.backup).toMatchObject({ ok: true, built: true });
  });

  it('should apply retention limits to existing backups', async () => {
    for (const n of [1, 2, 3]) {
      await writeArtifact(config.backup.dir, {
        createdAt: new Date(Date.UTC(2025, 2, n, 2)),
        sequence: n,
      });
    }

    const outcome = await pipeline().rotate();

    expect(outcome.ok).toBe(true);
    expect(outcome.summary).toMatchObject({
      admitted: null,
      demoted: 2,
      evicted: 0,
      working: 1,
      archive: 2,
    });
  });

  it('should report a failed upload as a failed command', async () => {
    await writeArtifact(config.backup.dir, {
      createdAt: new Date(Date.UTC(2025, 2, 1, 2)),
      sequence: 1,
    });
    storage.failPutFor.add(
      'Acme_Backup/daily/Acme_Backup_daily_20250301T020000Z_000001.zip',
    );

    const outcome = await pipeline().upload('daily');

    expect(outcome).toEqual({
      command: 'upload',
      ok: false,
      summary: { kind: 'daily', attempted: 1, uploaded: 0, alreadyPresent: 0, failed: 1 },
    });
  });
});
