import fs from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createMockStorage,
  createTempDir,
  createTestConfig,
  removeTempDir,
  writeArtifact,
} from '../../../test-config/mocks/test-helpers';
import { requiredFolders, type AppConfig } from '../config/config';
import { Verbosity } from '../../interfaces/logger';
import type { HealthReport } from '../../interfaces/health';
import { createHealthReporter, renderHealthReport } from './health-reporter';

const at = (day: number, hour: number) => new Date(Date.UTC(2025, 2, day, hour, 0, 0));
const WORKING_NAME = 'Acme_Backup_daily_20250301T020000Z_000001.zip';

const stripColors = (text: string) => text.replace(/\u001b\[\d+m/g, '');

describe('createHealthReporter', () => {
  let baseDir: string;
  let config: AppConfig;

  beforeEach(async () => {
    baseDir = await createTempDir('dropshelf-health');
    config = createTestConfig(baseDir);
  });

  afterEach(async () => {
    await removeTempDir(baseDir);
  });

  const createFolders = async () => {
    for (const folder of requiredFolders(config)) {
      await fs.promises.mkdir(folder, { recursive: true });
    }
  };

  const reasons = (report: HealthReport) =>
    Object.fromEntries(report.checks.map((item) => [item.name, [item.status, item.reason]]));

  it('should pass every check for a fresh backup and an open session', async () => {
    await createFolders();
    await writeArtifact(config.backup.dir, { createdAt: at(1, 2), sequence: 1 });
    const storage = createMockStorage();
    await storage.port.authenticate();

    const report = await createHealthReporter(config, {
      storage: storage.port,
      now: () => at(2, 3),
      verbosity: Verbosity.Quiet,
    }).check();

    expect(report.passed).toBe(true);
    expect(report.checkedAt).toBe('2025-03-02T03:00:00.000Z');
    expect(reasons(report)).toEqual({
      folders: ['pass', 'All configured folders exist'],
      'rotation-counts': ['pass', '1/1 working, 0/4 archived'],
      'backup-age': ['pass', `${WORKING_NAME} is 25.0h old (limit 26.0h)`],
      'backup-size': ['pass', `${WORKING_NAME} is 16 bytes (minimum 0)`],
      'storage-session': ['pass', 'local-mirror session is authenticated'],
    });
  });

  it('should fail when the newest backup is older than the run interval plus grace', async () => {
    await createFolders();
    await writeArtifact(config.backup.dir, { createdAt: at(1, 2), sequence: 1 });

    const report = await createHealthReporter(config, {
      now: () => at(2, 5),
      verbosity: Verbosity.Quiet,
    }).check();

    expect(reasons(report)['backup-age']).toEqual([
      'fail',
      `${WORKING_NAME} is 27.0h old (limit 26.0h)`,
    ]);
    expect(reasons(report)['storage-session']).toEqual([
      'fail',
      'No storage target was opened',
    ]);
    expect(report.passed).toBe(false);
  });

  it('should report missing folders and an empty catalog', async () => {
    const report = await createHealthReporter(config, {
      now: () => at(2, 3),
      verbosity: Verbosity.Quiet,
    }).check();

    expect(reasons(report).folders).toEqual([
      'fail',
      `Missing folders: ${requiredFolders(config).join(', ')}`,
    ]);
    expect(reasons(report)['backup-age']).toEqual(['fail', 'No working backup exists']);
    expect(reasons(report)['backup-size']).toEqual(['fail', 'No backup exists']);
  });

  it('should fail counts over the limits and backups below the minimum', async () => {
    const strict = createTestConfig(baseDir, { retention: { minSizeBytes: 100 } });
    await writeArtifact(strict.backup.dir, { createdAt: at(1, 2), sequence: 1 });
    await writeArtifact(strict.backup.dir, { createdAt: at(2, 2), sequence: 2 });

    const report = await createHealthReporter(strict, {
      now: () => at(2, 3),
      verbosity: Verbosity.Quiet,
    }).check();

    expect(reasons(report)['rotation-counts']).toEqual([
      'fail',
      'Over the retention limits: 2/1 working, 0/4 archived',
    ]);
    expect(reasons(report)['backup-size']).toEqual([
      'fail',
      'Acme_Backup_daily_20250302T020000Z_000002.zip is 16 bytes (minimum 100)',
    ]);
  });

  it('should render one line per check and a verdict', () => {
    const text = stripColors(
      renderHealthReport({
        checkedAt: '2025-03-02T03:00:00.000Z',
        passed: false,
        checks: [
          { name: 'folders', status: 'pass', reason: 'All configured folders exist' },
          { name: 'storage-session', status: 'fail', reason: 'No storage target was opened' },
        ],
      }),
    );

    expect(text.split('\n')).toEqual([
      '  PASS folders: All configured folders exist',
      '  FAIL storage-session: No storage target was opened',
      '1 of 2 health checks failed',
    ]);
  });
});
