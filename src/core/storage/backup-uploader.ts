import * as logger from '../../utils/logger';
import type { AppConfig } from '../config/config';
import type { BackupArtifact, BackupKind } from '../../interfaces/backup';
import type {
  StoragePort,
  UploadItemResult,
  UploadReport,
} from '../../interfaces/storage';
import { StorageError, errorMessage } from '../../utils/errors';
import {
  allArtifacts,
  createBackupCatalog,
  type BackupCatalog,
} from '../backup/backup-catalog';
import { createUploadLedger, type UploadLedger } from './upload-ledger';

export interface UploaderDependencies {
  storage: StoragePort;
  ledger?: UploadLedger;
  catalog?: BackupCatalog;
  verbosity?: number;
  now?: () => Date;
}

function failedResult(
  fileName: string,
  key: string,
  error: unknown,
): UploadItemResult {
  return {
    fileName,
    key,
    status: 'failed',
    code: error instanceof StorageError ? error.code : 'UploadError',
    retryable: error instanceof StorageError ? error.retryable : true,
    message: errorMessage(error),
  };
}

/**
 * Pushes admitted artifacts that the ledger does not know about. Safe to run
 * again after any failure: an object already present under its key is
 * recorded instead of uploaded twice. Results never touch rotation state.
 */
export function createBackupUploader(
  config: AppConfig,
  dependencies: UploaderDependencies,
) {
  const { storage } = dependencies;
  const verbosity = dependencies.verbosity ?? logger.Verbosity.Normal;
  const ledger =
    dependencies.ledger ?? createUploadLedger(config.stateDir, verbosity);
  const catalog =
    dependencies.catalog ?? createBackupCatalog(config, verbosity);
  const now = dependencies.now ?? (() => new Date());

  const remoteKeys = async (): Promise<Set<string> | null> => {
    try {
      const refs = await storage.list();
      return new Set(refs.map((ref) => ref.key));
    } catch (error) {
      // Puts are idempotent by key, so a missing listing only costs bandwidth
      logger.warning(
        `Could not list ${storage.provider} contents: ${errorMessage(error)}`,
        verbosity,
      );
      return null;
    }
  };

  const uploadPending = async (kind: BackupKind): Promise<UploadReport> => {
    const state = await catalog.load();
    const artifacts = allArtifacts(state);
    const candidates = artifacts.filter((artifact) => artifact.kind === kind);

    const pending: BackupArtifact[] = [];
    for (const artifact of candidates) {
      if (!(await ledger.has(artifact.remoteKey))) {
        pending.push(artifact);
      }
    }

    const report: UploadReport = {
      kind,
      attempted: pending.length,
      uploaded: 0,
      alreadyPresent: 0,
      failed: 0,
      results: [],
    };
    if (pending.length === 0) {
      logger.info(`No ${kind} backups waiting for upload`, verbosity);
      return report;
    }

    if (!storage.isAuthenticated()) {
      const auth = await storage.authenticate();
      if (!auth.success) {
        logger.error(`Storage authentication failed: ${auth.error.message}`);
        report.results = pending.map((artifact) =>
          failedResult(artifact.fileName, artifact.remoteKey, auth.error),
        );
        report.failed = pending.length;
        return report;
      }
    }

    const existing = await remoteKeys();
    if (existing) {
      const liveKeys = new Set([
        ...artifacts.map((artifact) => artifact.remoteKey),
        ...existing,
      ]);
      await ledger.prune(liveKeys);
    }

    for (const artifact of pending) {
      const { fileName, remoteKey } = artifact;

      if (existing?.has(remoteKey)) {
        await ledger.record({
          key: remoteKey,
          fileName,
          uploadedAt: now().toISOString(),
        });
        report.alreadyPresent++;
        report.results.push({ fileName, key: remoteKey, status: 'already-present' });
        logger.info(`Already stored remotely: ${fileName}`, verbosity);
        continue;
      }

      logger.info(`Uploading ${fileName} to ${storage.provider}`, verbosity);
      const result = await storage.put({
        localPath: artifact.path,
        remoteKey,
        kind: artifact.kind,
        size: artifact.size,
      });
      if (result.success) {
        await ledger.record({
          key: remoteKey,
          fileName,
          uploadedAt: now().toISOString(),
        });
        report.uploaded++;
        report.results.push({ fileName, key: remoteKey, status: 'uploaded' });
        logger.success(`Uploaded ${fileName}`, verbosity);
      } else {
        report.failed++;
        report.results.push(failedResult(fileName, remoteKey, result.error));
        logger.error(`Upload of ${fileName} failed: ${result.error.message}`);
      }
    }

    return report;
  };

  return { uploadPending };
}

export type BackupUploader = ReturnType<typeof createBackupUploader>;
