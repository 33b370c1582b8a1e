import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import { calculateChecksum } from '../../utils/fs-utils';

interface IndexedFile {
  path: string;
  size: number;
  fingerprint: string | null;
}

interface DirectoryIndex {
  files: IndexedFile[];
  /** Lower-cased names, so case-insensitive volumes never see a clash */
  takenNames: Set<string>;
}

const FINGERPRINT_SUFFIX_LENGTH = 8;

/**
 * Fingerprint index over destination directories for one routing run.
 *
 * A directory is listed the first time it is asked about; existing files are
 * only hashed when a candidate of the same size shows up. Placements planned
 * during the run are added with `reserve`, so two identical drop-zone files
 * resolve to one copy and two different files never get the same name.
 */
export function createDeduplicator(
  verbosity: number = logger.Verbosity.Normal,
) {
  const directories = new Map<string, DirectoryIndex>();

  const loadDirectory = async (dir: string): Promise<DirectoryIndex> => {
    const cached = directories.get(dir);
    if (cached) {
      return cached;
    }

    const index: DirectoryIndex = { files: [], takenNames: new Set() };
    let entries: fs.Dirent[] = [];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }

    for (const entry of entries) {
      index.takenNames.add(entry.name.toLowerCase());
      if (!entry.isFile() || entry.name.startsWith('.')) {
        continue;
      }
      const filePath = path.join(dir, entry.name);
      const stats = await fs.promises.stat(filePath);
      index.files.push({ path: filePath, size: stats.size, fingerprint: null });
    }

    logger.verbose(
      `Indexed ${index.files.length} existing files in ${dir}`,
      verbosity,
    );
    directories.set(dir, index);
    return index;
  };

  /**
   * Path of a file in `dir` with the same content, or null.
   */
  const findDuplicate = async (
    dir: string,
    fingerprint: string,
    size: number,
  ): Promise<string | null> => {
    const index = await loadDirectory(dir);
    for (const file of index.files) {
      if (file.size !== size) {
        continue;
      }
      if (file.fingerprint === null) {
        file.fingerprint = await calculateChecksum(file.path);
      }
      if (file.fingerprint === fingerprint) {
        return file.path;
      }
    }
    return null;
  };

  /**
   * A destination path in `dir` that is free now and has not been handed out
   * earlier in this run. On a clash the name gets the first hex digits of the
   * content fingerprint, then a counter.
   */
  const resolveDestination = async (
    dir: string,
    fileName: string,
    fingerprint: string,
  ): Promise<string> => {
    const index = await loadDirectory(dir);
    if (!index.takenNames.has(fileName.toLowerCase())) {
      return path.join(dir, fileName);
    }

    const extension = path.extname(fileName);
    const stem = path.basename(fileName, extension);
    const tag = fingerprint.slice(0, FINGERPRINT_SUFFIX_LENGTH);
    let candidate = `${stem}_${tag}${extension}`;
    for (let counter = 2; index.takenNames.has(candidate.toLowerCase()); counter++) {
      candidate = `${stem}_${tag}_${counter}${extension}`;
    }
    return path.join(dir, candidate);
  };

  const reserve = async (
    destinationPath: string,
    fingerprint: string,
    size: number,
  ): Promise<void> => {
    const index = await loadDirectory(path.dirname(destinationPath));
    index.takenNames.add(path.basename(destinationPath).toLowerCase());
    index.files.push({ path: destinationPath, size, fingerprint });
  };

  return { findDuplicate, resolveDestination, reserve };
}

export type Deduplicator = ReturnType<typeof createDeduplicator>;
