import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import { retentionPolicy, type AppConfig } from '../config/config';
import type {
  AdmissionDecision,
  BackupArtifact,
  CatalogState,
  DeletionResult,
  EvictionResult,
  Generation,
  RetentionPolicy,
  RotationPlan,
  RotationResult,
  StagedArtifact,
} from '../../interfaces/backup';
import type { StoragePort } from '../../interfaces/storage';
import { errorMessage } from '../../utils/errors';
import { moveFileAtomic } from '../../utils/fs-utils';
import type { UploadLedger } from '../storage/upload-ledger';
import { compareArtifacts } from './artifact-name';
import { createBackupCatalog, type BackupCatalog } from './backup-catalog';

const isValid = (artifact: { size: number }, policy: RetentionPolicy) =>
  artifact.size >= policy.minSizeBytes;

function withGeneration(
  artifact: BackupArtifact,
  generation: Generation,
): BackupArtifact {
  return artifact.generation === generation
    ? artifact
    : { ...artifact, generation };
}

/**
 * The most recent artifact that meets the size minimum. It is never evicted.
 */
export function protectedArtifact(
  artifacts: readonly BackupArtifact[],
  policy: RetentionPolicy,
): BackupArtifact | null {
  const valid = artifacts
    .filter((artifact) => isValid(artifact, policy))
    .sort(compareArtifacts);
  return valid.length > 0 ? valid[valid.length - 1] : null;
}

function enforce(
  state: CatalogState,
  policy: RetentionPolicy,
): Omit<RotationPlan, 'decision' | 'candidate'> {
  const working = [...state.working].sort(compareArtifacts);
  const archive = [...state.archive].sort(compareArtifacts);
  const demote: BackupArtifact[] = [];

  while (working.length > policy.maxWorking) {
    const oldest = working.shift();
    if (!oldest) break;
    const demoted = withGeneration(oldest, 'archive');
    demote.push(demoted);
    archive.push(demoted);
  }
  archive.sort(compareArtifacts);

  const keep = protectedArtifact([...working, ...archive], policy);
  const evict: BackupArtifact[] = [];
  const retained: BackupArtifact[] = [];
  const violations: string[] = [];

  const survivors = [...archive];
  while (survivors.length > policy.maxArchive) {
    const index = survivors.findIndex(
      (artifact) => artifact.fileName !== keep?.fileName,
    );
    if (index === -1) break;
    evict.push(...survivors.splice(index, 1));
  }

  if (survivors.length > policy.maxArchive && keep) {
    retained.push(keep);
    violations.push(
      `Archive holds ${survivors.length} backups (limit ${policy.maxArchive}); ` +
        `${keep.fileName} is the most recent valid backup and is kept`,
    );
  }

  return {
    demote,
    evict,
    protected: retained,
    violations,
    resulting: { working, archive: survivors },
  };
}

/**
 * Decides what admitting `candidate` does to the catalog. Pure: nothing is
 * touched until the plan is applied.
 */
export function planAdmission(
  state: CatalogState,
  candidate: StagedArtifact,
  policy: RetentionPolicy,
): RotationPlan {
  const undersized = !isValid(candidate, policy);
  if (undersized && state.working.some((artifact) => isValid(artifact, policy))) {
    const decision: AdmissionDecision = {
      admitted: false,
      reason: 'Undersized',
      message:
        `${candidate.fileName} is ${candidate.size} bytes, below the ` +
        `${policy.minSizeBytes} byte minimum, and a valid working backup exists`,
    };
    return {
      decision,
      candidate,
      demote: [],
      evict: [],
      protected: [],
      violations: [],
      resulting: {
        working: [...state.working],
        archive: [...state.archive],
      },
    };
  }

  const admitted: BackupArtifact = { ...candidate, generation: 'working' };
  return {
    decision: { admitted: true, undersized },
    candidate,
    ...enforce(
      { working: [...state.working, admitted], archive: state.archive },
      policy,
    ),
  };
}

/**
 * Demotion and eviction for the catalog as it stands, without a candidate.
 */
export function planEnforcement(
  state: CatalogState,
  policy: RetentionPolicy,
): RotationPlan {
  return { decision: null, candidate: null, ...enforce(state, policy) };
}

export interface RotationDependencies {
  verbosity?: number;
  catalog?: BackupCatalog;
  /** Remote copies are only deleted when both are present */
  storage?: StoragePort | null;
  ledger?: UploadLedger | null;
  moveFile?: typeof moveFileAtomic;
  removeFile?: (filePath: string) => Promise<void>;
}

/**
 * Carries a plan out on disk (and remotely for evictions). Deletions are
 * reported one by one; a failed demotion leaves that artifact where it was.
 */
export function createRotationManager(
  config: AppConfig,
  dependencies: RotationDependencies = {},
) {
  const verbosity = dependencies.verbosity ?? logger.Verbosity.Normal;
  const catalog =
    dependencies.catalog ?? createBackupCatalog(config, verbosity);
  const storage = dependencies.storage ?? null;
  const ledger = dependencies.ledger ?? null;
  const moveFile = dependencies.moveFile ?? moveFileAtomic;
  const removeFile =
    dependencies.removeFile ?? ((filePath: string) => fs.promises.unlink(filePath));

  const deleteLocal = async (filePath: string): Promise<DeletionResult> => {
    try {
      await removeFile(filePath);
      return { success: true };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  };

  const deleteRemote = async (
    artifact: BackupArtifact,
  ): Promise<DeletionResult | null> => {
    try {
      if (!ledger || !(await ledger.has(artifact.remoteKey))) {
        return null;
      }
      if (!storage) {
        return { success: false, error: 'No storage target is configured' };
      }
      const result = await storage.delete({ key: artifact.remoteKey });
      if (!result.success) {
        return { success: false, error: result.error.message };
      }
      await ledger.remove(artifact.remoteKey);
      return { success: true };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  };

  const applyPlan = async (plan: RotationPlan): Promise<RotationResult> => {
    // Where each artifact is right now, by file name
    const locations = new Map<string, string>();
    let admitted: BackupArtifact | null = null;

    if (plan.candidate && plan.decision && !plan.decision.admitted) {
      logger.warning(`Backup rejected: ${plan.decision.message}`, verbosity);
      await fs.promises.rm(plan.candidate.path, { force: true });
    } else if (plan.candidate) {
      const workingPath = path.join(config.backup.dir, plan.candidate.fileName);
      await fs.promises.mkdir(config.backup.dir, { recursive: true });
      await moveFile(plan.candidate.path, workingPath);
      locations.set(plan.candidate.fileName, workingPath);
      admitted = {
        ...plan.candidate,
        path: workingPath,
        generation: 'working',
      };
      logger.success(`Admitted ${admitted.fileName} as working backup`, verbosity);
    }

    const currentPath = (artifact: BackupArtifact): string =>
      locations.get(artifact.fileName) ?? artifact.path;

    const demoted: BackupArtifact[] = [];
    const demotionFailures: RotationResult['demotionFailures'] = [];
    if (plan.demote.length > 0) {
      await fs.promises.mkdir(config.backup.archiveDir, { recursive: true });
    }
    for (const artifact of plan.demote) {
      const archivePath = path.join(config.backup.archiveDir, artifact.fileName);
      try {
        await moveFile(currentPath(artifact), archivePath);
        locations.set(artifact.fileName, archivePath);
        demoted.push({ ...artifact, path: archivePath, generation: 'archive' });
        logger.info(`Moved to archive: ${artifact.fileName}`, verbosity);
      } catch (error) {
        demotionFailures.push({ artifact, error: errorMessage(error) });
        logger.error(
          `Failed to move ${artifact.fileName} to archive: ${errorMessage(error)}`,
        );
      }
    }

    // Every failed demotion leaves the archive one short of what the plan
    // evicted for, so the newest planned evictions are skipped
    const evictCount = Math.max(0, plan.evict.length - demotionFailures.length);
    const toEvict = plan.evict.slice(0, evictCount);
    const skippedEvictions = plan.evict.slice(evictCount);
    for (const artifact of skippedEvictions) {
      logger.warning(
        `Keeping ${artifact.fileName} because a demotion failed`,
        verbosity,
      );
    }

    const evictions: EvictionResult[] = [];
    for (const artifact of toEvict) {
      const local = await deleteLocal(currentPath(artifact));
      const remote = await deleteRemote(artifact);
      evictions.push({ artifact, local, remote });

      if (local.success) {
        logger.info(`Deleted old backup: ${artifact.fileName}`, verbosity);
      } else {
        logger.error(`Failed to delete ${artifact.fileName}: ${local.error}`);
      }
      if (remote && !remote.success) {
        logger.error(
          `Failed to delete remote copy ${artifact.remoteKey}: ${remote.error}`,
        );
      }
    }

    for (const violation of plan.violations) {
      logger.warning(`Retention policy: ${violation}`, verbosity);
    }

    const state = await catalog.load();
    return {
      plan,
      admitted,
      demoted,
      demotionFailures,
      evictions,
      skippedEvictions,
      state,
    };
  };

  const admit = async (candidate: StagedArtifact): Promise<RotationResult> => {
    const state = await catalog.load();
    const policy = retentionPolicy(config);
    return applyPlan(planAdmission(state, candidate, policy));
  };

  const enforceRetention = async (): Promise<RotationResult> => {
    const state = await catalog.load();
    return applyPlan(planEnforcement(state, retentionPolicy(config)));
  };

  return { applyPlan, admit, enforceRetention };
}

export type RotationManager = ReturnType<typeof createRotationManager>;
