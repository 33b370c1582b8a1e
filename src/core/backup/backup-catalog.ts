import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import type { AppConfig } from '../config/config';
import type {
  BackupArtifact,
  CatalogState,
  Generation,
} from '../../interfaces/backup';
import {
  compareArtifacts,
  parseArtifactName,
  remoteKeyFor,
} from './artifact-name';

/**
 * Rotation state rebuilt from the working, archive and staging directory
 * listings. Nothing is persisted beyond the files themselves.
 */
export function createBackupCatalog(
  config: AppConfig,
  verbosity: number = logger.Verbosity.Normal,
) {
  const { dir, archiveDir, stagingDir, prefix } = config.backup;

  const listDirectory = async (
    directory: string,
    generation: Generation,
  ): Promise<BackupArtifact[]> => {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const artifacts: BackupArtifact[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const parts = parseArtifactName(entry.name, prefix);
      if (!parts) {
        continue;
      }
      const filePath = path.join(directory, entry.name);
      const { size } = await fs.promises.stat(filePath);
      artifacts.push({
        fileName: entry.name,
        path: filePath,
        kind: parts.kind,
        createdAt: parts.createdAt,
        sequence: parts.sequence,
        size,
        generation,
        remoteKey: remoteKeyFor(prefix, parts.kind, entry.name),
      });
    }
    return artifacts.sort(compareArtifacts);
  };

  const load = async (): Promise<CatalogState> => {
    const [working, archive] = await Promise.all([
      listDirectory(dir, 'working'),
      listDirectory(archiveDir, 'archive'),
    ]);
    logger.verbose(
      `Catalog: ${working.length} working, ${archive.length} archived`,
      verbosity,
    );
    return { working, archive };
  };

  /**
   * One more than the highest sequence in any generation or in staging.
   */
  const nextSequence = async (): Promise<number> => {
    const [state, staged] = await Promise.all([
      load(),
      listDirectory(stagingDir, 'working'),
    ]);
    const all = [...state.working, ...state.archive, ...staged];
    return all.reduce((max, artifact) => Math.max(max, artifact.sequence), 0) + 1;
  };

  return { load, nextSequence };
}

export type BackupCatalog = ReturnType<typeof createBackupCatalog>;

export function allArtifacts(state: CatalogState): BackupArtifact[] {
  return [...state.working, ...state.archive].sort(compareArtifacts);
}
