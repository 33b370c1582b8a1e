import fs from 'node:fs';
import * as logger from './utils/logger';
import { errorMessage } from './utils/errors';
import { requiredFolders, type AppConfig } from './core/config/config';
import type { BackupKind, RotationResult } from './interfaces/backup';
import type { HealthReport } from './interfaces/health';
import type { RoutingReport } from './interfaces/routing';
import type { StoragePort, UploadReport } from './interfaces/storage';
import { createFileRouter } from './core/routing/file-router';
import { createBackupBuilder } from './core/backup/backup-builder';
import { createBackupCatalog } from './core/backup/backup-catalog';
import { createRotationManager } from './core/backup/rotation-manager';
import { createStoragePort } from './core/storage/provider-factory';
import { createUploadLedger } from './core/storage/upload-ledger';
import { createBackupUploader } from './core/storage/backup-uploader';
import {
  createHealthReporter,
  renderHealthReport,
} from './core/health/health-reporter';

export type CommandName =
  | 'route'
  | 'backup'
  | 'rotate'
  | 'upload'
  | 'health'
  | 'run'
  | 'folders';

/**
 * What a command reports: `ok` decides the exit code, `summary` is printed as
 * one JSON line.
 */
export interface CommandOutcome {
  command: CommandName;
  ok: boolean;
  summary: Record<string, unknown>;
}

export interface PipelineOptions {
  verbosity?: number;
  concurrency?: number;
}

export interface PipelineDependencies {
  createFileRouter?: typeof createFileRouter;
  createBackupBuilder?: typeof createBackupBuilder;
  createBackupCatalog?: typeof createBackupCatalog;
  createRotationManager?: typeof createRotationManager;
  createStoragePort?: typeof createStoragePort;
  createUploadLedger?: typeof createUploadLedger;
  createBackupUploader?: typeof createBackupUploader;
  createHealthReporter?: typeof createHealthReporter;
}

function summarizeRouting(report: RoutingReport): Record<string, unknown> {
  return { ...report.counts, failuresByReason: report.failuresByReason };
}

function rotationFailures(result: RotationResult): number {
  const evictionFailures = result.evictions.filter(
    ({ local, remote }) => !local.success || (remote !== null && !remote.success),
  ).length;
  return result.demotionFailures.length + evictionFailures;
}

function summarizeRotation(result: RotationResult): Record<string, unknown> {
  return {
    admitted: result.admitted?.fileName ?? null,
    rejected:
      result.plan.decision && !result.plan.decision.admitted
        ? result.plan.decision.message
        : null,
    undersized:
      result.plan.decision?.admitted === true
        ? result.plan.decision.undersized
        : null,
    demoted: result.demoted.length,
    evicted: result.evictions.filter(({ local }) => local.success).length,
    rotationFailures: rotationFailures(result),
    violations: result.plan.violations,
    working: result.state.working.length,
    archive: result.state.archive.length,
  };
}

function summarizeUpload(report: UploadReport): Record<string, unknown> {
  return {
    attempted: report.attempted,
    uploaded: report.uploaded,
    alreadyPresent: report.alreadyPresent,
    failed: report.failed,
  };
}

function summarizeHealth(report: HealthReport): Record<string, unknown> {
  return {
    passed: report.passed,
    checks: Object.fromEntries(
      report.checks.map((item) => [item.name, item.status]),
    ),
  };
}

/**
 * The commands of the CLI over one validated configuration. The storage
 * port is created and authenticated once, the first time a command needs it.
 */
export function createPipeline(
  config: AppConfig,
  options: PipelineOptions = {},
  dependencies: PipelineDependencies = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const makeFileRouter = dependencies.createFileRouter ?? createFileRouter;
  const makeBackupBuilder =
    dependencies.createBackupBuilder ?? createBackupBuilder;
  const makeBackupCatalog =
    dependencies.createBackupCatalog ?? createBackupCatalog;
  const makeRotationManager =
    dependencies.createRotationManager ?? createRotationManager;
  const makeStoragePort = dependencies.createStoragePort ?? createStoragePort;
  const makeUploadLedger =
    dependencies.createUploadLedger ?? createUploadLedger;
  const makeBackupUploader =
    dependencies.createBackupUploader ?? createBackupUploader;
  const makeHealthReporter =
    dependencies.createHealthReporter ?? createHealthReporter;

  const catalog = makeBackupCatalog(config, verbosity);
  const ledger = makeUploadLedger(config.stateDir, verbosity);
  let storage: StoragePort | null = null;

  const openStorage = async (): Promise<StoragePort> => {
    if (storage) {
      return storage;
    }
    const port = makeStoragePort(config, { verbosity });
    storage = port;
    const auth = await port.authenticate();
    if (auth.success) {
      logger.success(
        `Connected to ${port.provider} (${auth.value.target})`,
        verbosity,
      );
    } else {
      logger.error(`Storage authentication failed: ${auth.error.message}`);
    }
    return port;
  };

  const rotationManager = async () =>
    makeRotationManager(config, {
      verbosity,
      catalog,
      ledger,
      storage: await openStorage(),
    });

  const folders = async (): Promise<CommandOutcome> => {
    const created: string[] = [];
    for (const folder of requiredFolders(config)) {
      if (!fs.existsSync(folder)) {
        await fs.promises.mkdir(folder, { recursive: true });
        created.push(folder);
        logger.verbose(`Created ${folder}`, verbosity);
      }
    }
    logger.success(
      created.length > 0
        ? `Created ${created.length} folders`
        : 'All folders already exist',
      verbosity,
    );
    return {
      command: 'folders',
      ok: true,
      summary: { created: created.length, total: requiredFolders(config).length },
    };
  };

  const route = async (): Promise<CommandOutcome> => {
    const router = makeFileRouter(config, {
      verbosity,
      concurrency: options.concurrency,
    });
    const report = await router.route();
    return {
      command: 'route',
      ok: report.counts.failed === 0,
      summary: summarizeRouting(report),
    };
  };

  const backup = async (kind: BackupKind): Promise<CommandOutcome> => {
    const builder = makeBackupBuilder(config, { verbosity, catalog });
    const build = await builder.build(kind);
    if (!build.success) {
      return {
        command: 'backup',
        ok: false,
        summary: { kind, built: false, error: build.error.message },
      };
    }

    const manager = await rotationManager();
    const rotation = await manager.admit(build.artifact);
    return {
      command: 'backup',
      ok: rotation.admitted !== null && rotationFailures(rotation) === 0,
      summary: {
        kind,
        built: true,
        fileName: build.artifact.fileName,
        size: build.artifact.size,
        members: build.memberCount,
        ...summarizeRotation(rotation),
      },
    };
  };

  const rotate = async (): Promise<CommandOutcome> => {
    const manager = await rotationManager();
    const rotation = await manager.enforceRetention();
    return {
      command: 'rotate',
      ok: rotationFailures(rotation) === 0,
      summary: summarizeRotation(rotation),
    };
  };

  const upload = async (kind: BackupKind): Promise<CommandOutcome> => {
    const uploader = makeBackupUploader(config, {
      storage: await openStorage(),
      ledger,
      catalog,
      verbosity,
    });
    const report = await uploader.uploadPending(kind);
    return {
      command: 'upload',
      ok: report.failed === 0,
      summary: { kind, ...summarizeUpload(report) },
    };
  };

  const health = async (): Promise<CommandOutcome> => {
    const reporter = makeHealthReporter(config, {
      storage: await openStorage(),
      catalog,
      verbosity,
    });
    const report = await reporter.check();
    if (verbosity > logger.Verbosity.Quiet) {
      logger.always(renderHealthReport(report));
    }
    return {
      command: 'health',
      ok: report.passed,
      summary: summarizeHealth(report),
    };
  };

  /**
   * route → backup → upload → health. Every stage runs even when an earlier
   * one reported failures; a stage that throws is recorded as failed.
   */
  const run = async (kind: BackupKind): Promise<CommandOutcome> => {
    const stages: Array<[string, () => Promise<CommandOutcome>]> = [
      ['route', route],
      ['backup', () => backup(kind)],
      ['upload', () => upload(kind)],
      ['health', health],
    ];

    const summary: Record<string, unknown> = { kind };
    let ok = true;
    for (const [name, stage] of stages) {
      try {
        const outcome = await stage();
        summary[name] = { ok: outcome.ok, ...outcome.summary };
        ok = ok && outcome.ok;
      } catch (error) {
        logger.error(`${name} failed: ${errorMessage(error)}`);
        summary[name] = { ok: false, error: errorMessage(error) };
        ok = false;
      }
    }
    return { command: 'run', ok, summary };
  };

  return { folders, route, backup, rotate, upload, health, run, openStorage };
}

export type Pipeline = ReturnType<typeof createPipeline>;
