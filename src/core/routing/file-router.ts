import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import type { AppConfig } from '../config/config';
import type {
  FileRecord,
  RoutingCounts,
  RoutingOutcome,
  RoutingReport,
} from '../../interfaces/routing';
import {
  FileError,
  classifyFsError,
  errorMessage,
  type FileErrorCode,
} from '../../utils/errors';
import {
  calculateChecksum,
  moveFileAtomic,
  pathExists,
} from '../../utils/fs-utils';
import { getOptimalConcurrency } from '../../utils/env-utils';
import { processPool } from '../pool/work-pool';
import {
  classifyByExtension,
  classifyFile,
  destinationFolder,
  extensionOf,
} from './classifier';
import { createDeduplicator } from './deduplicator';

export interface FileRouterOptions {
  verbosity?: number;
  concurrency?: number;
  moveFile?: typeof moveFileAtomic;
  removeFile?: (filePath: string) => Promise<void>;
  /** Rejects when the file cannot be read */
  checkReadable?: (filePath: string) => Promise<void>;
}

type Plan =
  | { kind: 'done'; outcome: RoutingOutcome }
  | { kind: 'move'; record: FileRecord; destinationPath: string }
  | { kind: 'discard'; record: FileRecord; existingPath: string };

const emptyFailureCounts = (): Record<FileErrorCode, number> => ({
  IOError: 0,
  PermissionDenied: 0,
  InvalidContent: 0,
});

function failed(
  record: FileRecord,
  error: unknown,
  destinationPath: string | null = null,
): RoutingOutcome {
  return {
    record,
    status: 'failed',
    destinationPath,
    reason: classifyFsError(error),
    message: errorMessage(error),
  };
}

/**
 * Routes every eligible drop-zone file into the category folder its
 * extension maps to.
 *
 * Planning (validation, fingerprints, duplicate and collision checks) runs
 * one file at a time so every destination is decided before anything moves;
 * the moves themselves then run in a bounded pool. A file's failure is
 * recorded in its outcome and never stops the run.
 */
export function createFileRouter(
  config: AppConfig,
  options: FileRouterOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const concurrency = getOptimalConcurrency(
    options.concurrency ?? config.routing.concurrency,
  );
  const moveFile = options.moveFile ?? moveFileAtomic;
  const removeFile =
    options.removeFile ?? ((filePath: string) => fs.promises.unlink(filePath));
  const checkReadable =
    options.checkReadable ??
    ((filePath: string) => fs.promises.access(filePath, fs.constants.R_OK));
  const ignoredNames = new Set(
    config.routing.ignoreNames.map((name) => name.toLowerCase()),
  );

  const isEligible = (entry: fs.Dirent): boolean =>
    entry.isFile() &&
    !entry.name.startsWith('.') &&
    !ignoredNames.has(entry.name.toLowerCase());

  /**
   * Regular, non-hidden files directly inside the drop zone, by name.
   */
  const scan = async (): Promise<string[]> => {
    const entries = await fs.promises.readdir(config.dropZone, {
      withFileTypes: true,
    });
    return entries
      .filter(isEligible)
      .map((entry) => path.join(config.dropZone, entry.name))
      .sort();
  };

  const planFile = async (
    filePath: string,
    dedup: ReturnType<typeof createDeduplicator>,
  ): Promise<Plan> => {
    const name = path.basename(filePath);
    const extension = extensionOf(name);
    const baseRecord: FileRecord = {
      absolutePath: filePath,
      name,
      extension,
      size: 0,
      fingerprint: '',
      category: classifyByExtension(extension, config.routing).category,
    };

    let size: number;
    try {
      size = (await fs.promises.stat(filePath)).size;
    } catch (error) {
      return { kind: 'done', outcome: failed(baseRecord, error) };
    }

    const invalid = (message: string): Plan => ({
      kind: 'done',
      outcome: {
        record: { ...baseRecord, size },
        status: 'skipped-invalid',
        destinationPath: null,
        message,
      },
    });

    if (size === 0) {
      return invalid('File is empty');
    }
    try {
      await checkReadable(filePath);
    } catch {
      return invalid('File is not readable');
    }

    let record: FileRecord = { ...baseRecord, size };
    try {
      const classification = await classifyFile(filePath, config.routing);
      const fingerprint = await calculateChecksum(filePath);
      record = { ...record, category: classification.category, fingerprint };
      if (classification.source === 'content') {
        logger.verbose(
          `${name}: content looks like ${classification.sniffedExtension}, routing as ${classification.category}`,
          verbosity,
        );
      }
    } catch (error) {
      return { kind: 'done', outcome: failed(record, error) };
    }

    const folder = destinationFolder(record.category, config);
    try {
      await fs.promises.mkdir(folder, { recursive: true });
      const existing = await dedup.findDuplicate(
        folder,
        record.fingerprint,
        record.size,
      );
      if (existing) {
        return { kind: 'discard', record, existingPath: existing };
      }
      const destinationPath = await dedup.resolveDestination(
        folder,
        name,
        record.fingerprint,
      );
      await dedup.reserve(destinationPath, record.fingerprint, record.size);
      return { kind: 'move', record, destinationPath };
    } catch (error) {
      return { kind: 'done', outcome: failed(record, error, folder) };
    }
  };

  const executeMove = async (
    plan: Extract<Plan, { kind: 'move' }>,
  ): Promise<RoutingOutcome> => {
    const { record, destinationPath } = plan;
    const currentSize = (await fs.promises.stat(record.absolutePath)).size;
    if (currentSize !== record.size) {
      throw new FileError(
        'InvalidContent',
        `${record.name} changed size during routing (${record.size} -> ${currentSize})`,
      );
    }
    await moveFile(record.absolutePath, destinationPath);
    return { record, status: 'moved', destinationPath };
  };

  const executeDiscard = async (
    plan: Extract<Plan, { kind: 'discard' }>,
  ): Promise<RoutingOutcome> => {
    const { record, existingPath } = plan;
    if (!(await pathExists(existingPath))) {
      throw new FileError(
        'IOError',
        `Kept copy ${existingPath} is missing; leaving ${record.name} in place`,
      );
    }
    await removeFile(record.absolutePath);
    return { record, status: 'skipped-duplicate', destinationPath: existingPath };
  };

  const logOutcome = (outcome: RoutingOutcome): void => {
    const { name } = outcome.record;
    switch (outcome.status) {
      case 'moved':
        logger.verbose(`Routed: ${name} → ${outcome.destinationPath}`, verbosity);
        break;
      case 'skipped-duplicate':
        logger.verbose(
          `Duplicate: ${name} matches ${outcome.destinationPath}, removed from drop zone`,
          verbosity,
        );
        break;
      case 'skipped-invalid':
        logger.warning(`Skipping ${name}: ${outcome.message}`, verbosity);
        break;
      case 'failed':
        logger.error(`Failed to route ${name} (${outcome.reason}): ${outcome.message}`);
        break;
    }
  };

  const route = async (): Promise<RoutingReport> => {
    logger.info(`Scanning drop zone ${config.dropZone}`, verbosity);
    const files = await scan();
    logger.info(`Found ${files.length} files to route`, verbosity);

    const dedup = createDeduplicator(verbosity);
    const plans: Plan[] = [];
    for (const filePath of files) {
      plans.push(await planFile(filePath, dedup));
    }

    // Moves first: a discarded duplicate may point at a file moved in this run
    const moves = plans.filter(
      (plan): plan is Extract<Plan, { kind: 'move' }> => plan.kind === 'move',
    );
    const moveResults = await processPool(moves, executeMove, concurrency);
    const discards = plans.filter(
      (plan): plan is Extract<Plan, { kind: 'discard' }> =>
        plan.kind === 'discard',
    );
    const discardResults = await processPool(
      discards,
      executeDiscard,
      concurrency,
    );

    const executed = new Map<FileRecord, RoutingOutcome>();
    for (const result of [...moveResults, ...discardResults]) {
      const destination =
        result.item.kind === 'move'
          ? result.item.destinationPath
          : result.item.existingPath;
      executed.set(
        result.item.record,
        result.success
          ? result.value
          : failed(result.item.record, result.error, destination),
      );
    }

    const outcomes = plans.map((plan): RoutingOutcome => {
      if (plan.kind === 'done') {
        return plan.outcome;
      }
      return executed.get(plan.record) ?? failed(plan.record, new Error('not executed'));
    });

    const counts: RoutingCounts = {
      scanned: outcomes.length,
      moved: 0,
      skippedDuplicate: 0,
      skippedInvalid: 0,
      failed: 0,
    };
    const failuresByReason = emptyFailureCounts();
    for (const outcome of outcomes) {
      logOutcome(outcome);
      if (outcome.status === 'moved') counts.moved++;
      if (outcome.status === 'skipped-duplicate') counts.skippedDuplicate++;
      if (outcome.status === 'skipped-invalid') counts.skippedInvalid++;
      if (outcome.status === 'failed') {
        counts.failed++;
        failuresByReason[outcome.reason]++;
      }
    }

    const summary =
      `Routing finished: ${counts.moved} moved, ${counts.skippedDuplicate} duplicates, ` +
      `${counts.skippedInvalid} invalid, ${counts.failed} failed`;
    if (counts.failed > 0) {
      logger.warning(summary, verbosity);
    } else {
      logger.success(summary, verbosity);
    }

    return { dropZone: config.dropZone, outcomes, counts, failuresByReason };
  };

  return { scan, route };
}

export type FileRouter = ReturnType<typeof createFileRouter>;
