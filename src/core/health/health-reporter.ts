import fs from 'node:fs';
import chalk from 'chalk';
import * as logger from '../../utils/logger';
import { requiredFolders, type AppConfig } from '../config/config';
import type { BackupKind, CatalogState } from '../../interfaces/backup';
import type {
  HealthCheck,
  HealthCheckName,
  HealthReport,
} from '../../interfaces/health';
import type { StoragePort } from '../../interfaces/storage';
import { errorMessage } from '../../utils/errors';
import { allArtifacts, createBackupCatalog, type BackupCatalog } from '../backup/backup-catalog';

const HOUR_MS = 60 * 60 * 1000;

export const RUN_INTERVAL_HOURS: Record<BackupKind, number> = {
  daily: 24,
  weekly: 7 * 24,
  monthly: 31 * 24,
};

export interface HealthReporterDependencies {
  storage?: StoragePort | null;
  catalog?: BackupCatalog;
  now?: () => Date;
  verbosity?: number;
}

const pass = (name: HealthCheckName, reason: string): HealthCheck => ({
  name,
  status: 'pass',
  reason,
});

const fail = (name: HealthCheckName, reason: string): HealthCheck => ({
  name,
  status: 'fail',
  reason,
});

function formatHours(hours: number): string {
  return hours >= 48 ? `${(hours / 24).toFixed(1)}d` : `${hours.toFixed(1)}h`;
}

/**
 * Read-only checklist over the folder taxonomy, the rotation catalog and the
 * storage session. Only local invariants decide the verdict of each check.
 */
export function createHealthReporter(
  config: AppConfig,
  dependencies: HealthReporterDependencies = {},
) {
  const verbosity = dependencies.verbosity ?? logger.Verbosity.Normal;
  const storage = dependencies.storage ?? null;
  const catalog =
    dependencies.catalog ?? createBackupCatalog(config, verbosity);
  const now = dependencies.now ?? (() => new Date());

  const checkFolders = (): HealthCheck => {
    const missing = requiredFolders(config).filter((folder) => {
      try {
        return !fs.statSync(folder).isDirectory();
      } catch {
        return true;
      }
    });
    return missing.length === 0
      ? pass('folders', 'All configured folders exist')
      : fail('folders', `Missing folders: ${missing.join(', ')}`);
  };

  const checkRotationCounts = (state: CatalogState): HealthCheck => {
    const { maxWorking, maxArchive } = config.retention;
    const counts = `${state.working.length}/${maxWorking} working, ${state.archive.length}/${maxArchive} archived`;
    return state.working.length <= maxWorking &&
      state.archive.length <= maxArchive
      ? pass('rotation-counts', counts)
      : fail('rotation-counts', `Over the retention limits: ${counts}`);
  };

  const checkBackupAge = (state: CatalogState): HealthCheck => {
    const newest = state.working[state.working.length - 1];
    if (!newest) {
      return fail('backup-age', 'No working backup exists');
    }
    const { runKind, graceHours } = config.retention;
    const allowedHours = RUN_INTERVAL_HOURS[runKind] + graceHours;
    const ageHours = (now().getTime() - newest.createdAt.getTime()) / HOUR_MS;
    const detail = `${newest.fileName} is ${formatHours(ageHours)} old (limit ${formatHours(allowedHours)})`;
    return ageHours <= allowedHours
      ? pass('backup-age', detail)
      : fail('backup-age', detail);
  };

  const checkBackupSize = (state: CatalogState): HealthCheck => {
    const artifacts = allArtifacts(state);
    const newest = artifacts[artifacts.length - 1];
    if (!newest) {
      return fail('backup-size', 'No backup exists');
    }
    const { minSizeBytes } = config.retention;
    const detail = `${newest.fileName} is ${newest.size} bytes (minimum ${minSizeBytes})`;
    return newest.size >= minSizeBytes
      ? pass('backup-size', detail)
      : fail('backup-size', detail);
  };

  const checkStorageSession = (): HealthCheck => {
    if (!storage) {
      return fail('storage-session', 'No storage target was opened');
    }
    return storage.isAuthenticated()
      ? pass('storage-session', `${storage.provider} session is authenticated`)
      : fail('storage-session', `${storage.provider} is not authenticated`);
  };

  const check = async (): Promise<HealthReport> => {
    const checks: HealthCheck[] = [checkFolders()];

    let state: CatalogState | null = null;
    try {
      state = await catalog.load();
    } catch (error) {
      const reason = `Cannot read backups: ${errorMessage(error)}`;
      checks.push(
        fail('rotation-counts', reason),
        fail('backup-age', reason),
        fail('backup-size', reason),
      );
    }
    if (state) {
      checks.push(
        checkRotationCounts(state),
        checkBackupAge(state),
        checkBackupSize(state),
      );
    }
    checks.push(checkStorageSession());

    return {
      checkedAt: now().toISOString(),
      passed: checks.every((item) => item.status === 'pass'),
      checks,
    };
  };

  return { check };
}

export type HealthReporter = ReturnType<typeof createHealthReporter>;

/**
 * Human-readable report, one line per check.
 */
export function renderHealthReport(report: HealthReport): string {
  const lines = report.checks.map((item) => {
    const status =
      item.status === 'pass' ? chalk.green('PASS') : chalk.red('FAIL');
    return `  ${status} ${chalk.bold(item.name)}: ${item.reason}`;
  });
  const failed = report.checks.filter((item) => item.status === 'fail').length;
  const verdict =
    failed === 0
      ? chalk.green('All health checks passed')
      : chalk.red(`${failed} of ${report.checks.length} health checks failed`);
  return [...lines, verdict].join('\n');
}
