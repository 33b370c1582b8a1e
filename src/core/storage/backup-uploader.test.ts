import fs from 'node:fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createMockStorage,
  createTempDir,
  createTestConfig,
  removeTempDir,
  writeArtifact,
  type MockStorage,
} from '../../../test-config/mocks/test-helpers';
import type { AppConfig } from '../config/config';
import { Verbosity } from '../../interfaces/logger';
import { createBackupCatalog } from '../backup/backup-catalog';
import { createUploadLedger, type UploadLedger } from './upload-ledger';
import { createBackupUploader } from './backup-uploader';

const day = (n: number) => new Date(Date.UTC(2025, 2, n, 2, 0, 0));
const NOW = new Date('2025-03-10T12:00:00Z');

describe('createBackupUploader', () => {
  let baseDir: string;
  let config: AppConfig;
  let storage: MockStorage;
  let ledger: UploadLedger;
  let olderKey: string;
  let newerKey: string;

  beforeEach(async () => {
    baseDir = await createTempDir('dropshelf-upload');
    config = createTestConfig(baseDir);
    storage = createMockStorage();
    ledger = createUploadLedger(config.stateDir, Verbosity.Quiet);

    await writeArtifact(config.backup.archiveDir, { createdAt: day(1), sequence: 1 });
    await writeArtifact(config.backup.dir, { createdAt: day(2), sequence: 2 });
    await writeArtifact(config.backup.dir, {
      kind: 'weekly',
      createdAt: day(3),
      sequence: 3,
    });
    const state = await createBackupCatalog(config, Verbosity.Quiet).load();
    olderKey = state.archive[0].remoteKey;
    newerKey = state.working[0].remoteKey;
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  const uploader = () =>
    createBackupUploader(config, {
      storage: storage.port,
      ledger,
      verbosity: Verbosity.Quiet,
      now: () => NOW,
    });

  it('should upload every backup of the kind that is not stored yet', async () => {
    const report = await uploader().uploadPending('daily');

    expect(report).toMatchObject({
      kind: 'daily',
      attempted: 2,
      uploaded: 2,
      alreadyPresent: 0,
      failed: 0,
    });
    expect(report.results.map((result) => result.key)).toEqual([olderKey, newerKey]);
    expect([...storage.objects.keys()].sort()).toEqual([olderKey, newerKey].sort());
    expect((await ledger.entries()).find((item) => item.key === newerKey)).toEqual({
      key: newerKey,
      fileName: 'Acme_Backup_daily_20250302T020000Z_000002.zip',
      uploadedAt: NOW.toISOString(),
    });
    expect(storage.port.authenticate).toHaveBeenCalledTimes(1);
  });

  it('should have nothing to do on the next run', async () => {
    await uploader().uploadPending('daily');

    const report = await uploader().uploadPending('daily');

    expect(report.attempted).toBe(0);
    expect(storage.port.put).toHaveBeenCalledTimes(2);
  });

  it('should leave rotation untouched when an upload fails and retry it later', async () => {
    storage.failPutFor.add(olderKey);
    const before = await createBackupCatalog(config, Verbosity.Quiet).load();

    const report = await uploader().uploadPending('daily');

    expect(report.uploaded).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.results[0]).toEqual({
      fileName: 'Acme_Backup_daily_20250301T020000Z_000001.zip',
      key: olderKey,
      status: 'failed',
      code: 'UploadError',
      retryable: true,
      message: `network down for ${olderKey}`,
    });
    expect(await createBackupCatalog(config, Verbosity.Quiet).load()).toEqual(before);
    expect(await ledger.has(olderKey)).toBe(false);

    storage.failPutFor.clear();
    const retry = await uploader().uploadPending('daily');

    expect(retry.attempted).toBe(1);
    expect(retry.uploaded).toBe(1);
    expect(storage.objects.has(olderKey)).toBe(true);
    expect(storage.objects.size).toBe(2);
  });

  it('should record objects already present instead of uploading them again', async () => {
    storage.objects.set(olderKey, {
      localPath: 'earlier-run',
      remoteKey: olderKey,
      kind: 'daily',
      size: 16,
    });

    const report = await uploader().uploadPending('daily');

    expect(report.alreadyPresent).toBe(1);
    expect(report.uploaded).toBe(1);
    expect(storage.port.put).toHaveBeenCalledTimes(1);
    expect(await ledger.has(olderKey)).toBe(true);
  });

  it('should fail every pending backup when authentication fails', async () => {
    storage.setAuthFailure(true);

    const report = await uploader().uploadPending('daily');

    expect(report.failed).toBe(2);
    expect(report.results.map((result) => result.status)).toEqual(['failed', 'failed']);
    expect(report.results[0]).toMatchObject({
      code: 'AuthError',
      retryable: false,
      message: 'login required',
    });
    expect(storage.port.put).not.toHaveBeenCalled();
  });

  it('should still upload when the remote listing fails', async () => {
    vi.mocked(storage.port.list).mockRejectedValueOnce(new Error('offline'));

    const report = await uploader().uploadPending('daily');

    expect(report.uploaded).toBe(2);
  });

  it('should drop ledger entries for backups that are gone everywhere', async () => {
    await ledger.record({
      key: 'Acme_Backup/daily/long-gone.zip',
      fileName: 'long-gone.zip',
      uploadedAt: day(1).toISOString(),
    });

    await uploader().uploadPending('daily');

    expect(await ledger.has('Acme_Backup/daily/long-gone.zip')).toBe(false);
    expect(fs.existsSync(ledger.path)).toBe(true);
  });

  it('should only consider backups of the requested kind', async () => {
    const report = await uploader().uploadPending('weekly');

    expect(report.attempted).toBe(1);
    expect(report.results[0].key).toMatch(/^Acme_Backup\/weekly\//);
  });
});
