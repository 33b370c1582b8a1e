import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import archiver from 'archiver';
import * as logger from '../../utils/logger';
import type { AppConfig } from '../config/config';
import type { BackupKind, BuildResult } from '../../interfaces/backup';
import { PackError, errorMessage } from '../../utils/errors';
import { tempPathFor } from '../../utils/fs-utils';
import { matchPattern, matchesAny } from '../../utils/pattern-utils';
import { formatArtifactName, remoteKeyFor } from './artifact-name';
import { createBackupCatalog, type BackupCatalog } from './backup-catalog';

/** Largest size or offset a zip header holds without ZIP64 extensions */
const ZIP32_LIMIT = 0xffffffff;

/** Matched against every file and directory name in the tree */
const ALWAYS_EXCLUDED_NAMES = [
  '.*',
  '__MACOSX',
  'Thumbs.db',
  'desktop.ini',
  '*.tmp',
  '*.partial',
  '~$*',
  '*.log',
];

export interface BackupBuilderOptions {
  verbosity?: number;
  catalog?: BackupCatalog;
  now?: () => Date;
}

function isWithin(target: string, directory: string): boolean {
  const relative = path.relative(directory, target);
  return (
    relative === '' ||
    (!relative.startsWith('..') && !path.isAbsolute(relative))
  );
}

interface PackEntry {
  /** Member name inside the zip */
  name: string;
  source: string;
  stats: fs.Stats;
}

/**
 * Streams `entries` into a zip at `destination`, in order. Nothing is held
 * in memory beyond the stream buffers.
 */
async function writeArchive(
  entries: readonly PackEntry[],
  destination: string,
): Promise<void> {
  const totalBytes = entries.reduce((sum, entry) => sum + entry.stats.size, 0);
  const archive = archiver('zip', {
    zlib: { level: 6 },
    forceZip64: totalBytes >= ZIP32_LIMIT,
  });
  // Archiver reports unreadable files as warnings; a backup must not skip them
  archive.on('warning', (warning) => archive.destroy(warning));
  for (const entry of entries) {
    // Passing stats queues entries in call order
    archive.file(entry.source, { name: entry.name, stats: entry.stats });
  }
  const output = await fs.promises.open(destination, 'w');
  await Promise.all([
    pipeline(archive, output.createWriteStream()),
    archive.finalize(),
  ]);
}

/**
 * Snapshots the source tree into a zip in the staging directory. The archive
 * is only a candidate: the rotation manager decides whether it is admitted.
 */
export function createBackupBuilder(
  config: AppConfig,
  options: BackupBuilderOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const catalog = options.catalog ?? createBackupCatalog(config, verbosity);
  const now = options.now ?? (() => new Date());
  const sourceDir = config.backup.sourceDir;

  // An artifact never contains itself, earlier artifacts or unrouted files
  const excludedDirectories = [
    config.backup.dir,
    config.dropZone,
    config.stateDir,
    ...(config.storage.localMirror ? [config.storage.localMirror.path] : []),
  ];

  const isExcluded = (absolutePath: string, relativePath: string): boolean => {
    const name = path.basename(absolutePath);
    if (ALWAYS_EXCLUDED_NAMES.some((pattern) => matchPattern(name, pattern))) {
      return true;
    }
    if (excludedDirectories.some((dir) => isWithin(absolutePath, dir))) {
      return true;
    }
    return matchesAny(relativePath, config.backup.excludePatterns);
  };

  /**
   * Member paths (POSIX, relative to the source) in sorted order.
   */
  const collectMembers = async (
    dir: string = sourceDir,
  ): Promise<string[]> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const members: string[] = [];
    for (const entry of entries) {
      const absolutePath = path.join(dir, entry.name);
      const relativePath = path
        .relative(sourceDir, absolutePath)
        .split(path.sep)
        .join('/');
      if (isExcluded(absolutePath, relativePath)) {
        logger.verbose(`Excluded from backup: ${relativePath}`, verbosity);
        continue;
      }
      if (entry.isDirectory()) {
        members.push(...(await collectMembers(absolutePath)));
      } else if (entry.isFile()) {
        members.push(relativePath);
      }
    }
    return members;
  };

  const build = async (kind: BackupKind): Promise<BuildResult> => {
    let finalPath: string | null = null;
    let tempPath: string | null = null;

    try {
      const sequence = await catalog.nextSequence();
      const createdAt = now();
      const fileName = formatArtifactName({
        prefix: config.backup.prefix,
        kind,
        createdAt,
        sequence,
      });
      const stagedPath = path.join(config.backup.stagingDir, fileName);
      finalPath = stagedPath;

      logger.info(`Creating ${kind} backup ${fileName}`, verbosity);
      logger.verbose(`Source: ${sourceDir}`, verbosity);

      const members = await collectMembers();
      const entries: PackEntry[] = [];
      for (const member of members) {
        const source = path.join(sourceDir, ...member.split('/'));
        entries.push({ name: member, source, stats: await fs.promises.stat(source) });
      }

      await fs.promises.mkdir(config.backup.stagingDir, { recursive: true });
      tempPath = tempPathFor(stagedPath);
      await writeArchive(entries, tempPath);
      await fs.promises.rename(tempPath, stagedPath);
      tempPath = null;

      const { size } = await fs.promises.stat(stagedPath);
      const undersized = size < config.retention.minSizeBytes;
      if (undersized) {
        logger.warning(
          `Backup ${fileName} is ${size} bytes, below the ${config.retention.minSizeBytes} byte minimum`,
          verbosity,
        );
      } else {
        logger.success(
          `Backup ${fileName} created (${members.length} files, ${size} bytes)`,
          verbosity,
        );
      }

      return {
        success: true,
        artifact: {
          fileName,
          path: stagedPath,
          kind,
          createdAt,
          sequence,
          size,
          remoteKey: remoteKeyFor(config.backup.prefix, kind, fileName),
        },
        memberCount: members.length,
        undersized,
      };
    } catch (error) {
      const leftovers = [tempPath, finalPath].filter(
        (candidate): candidate is string => candidate !== null,
      );
      await Promise.all(
        leftovers.map((leftover) => fs.promises.rm(leftover, { force: true })),
      );
      const packError = new PackError(
        `Failed to create ${kind} backup: ${errorMessage(error)}`,
        error,
      );
      logger.error(packError.message);
      return { success: false, kind, error: packError };
    }
  };

  return { build, collectMembers };
}

export type BackupBuilder = ReturnType<typeof createBackupBuilder>;
