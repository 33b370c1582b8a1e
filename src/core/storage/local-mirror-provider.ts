import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import type {
  CallOptions,
  RemoteRef,
  StoragePort,
  StorageSession,
  UploadItem,
} from '../../interfaces/storage';
import {
  AuthError,
  DeleteError,
  UploadError,
  errorMessage,
} from '../../utils/errors';
import { copyFileAtomic } from '../../utils/fs-utils';

export interface LocalMirrorOptions {
  root: string;
  verbosity?: number;
}

/**
 * Mirrors artifacts into a directory, typically on an external drive.
 * Keys map to relative paths under the root.
 */
export function createLocalMirrorProvider(
  options: LocalMirrorOptions,
): StoragePort {
  const root = path.resolve(options.root);
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  let session: StorageSession | null = null;

  const pathFor = (key: string): string => {
    const target = path.resolve(root, ...key.split('/'));
    if (!target.startsWith(root + path.sep)) {
      throw new Error(`Key escapes the mirror directory: ${key}`);
    }
    return target;
  };

  const authenticate: StoragePort['authenticate'] = async () => {
    try {
      await fs.promises.mkdir(root, { recursive: true });
      await fs.promises.access(root, fs.constants.W_OK);
      session = {
        provider: 'local-mirror',
        target: root,
        authenticatedAt: new Date(),
      };
      logger.verbose(`Local mirror ready at ${root}`, verbosity);
      return { success: true, value: session };
    } catch (error) {
      session = null;
      return {
        success: false,
        error: new AuthError(
          `Mirror directory ${root} is not writable: ${errorMessage(error)}`,
          error,
        ),
      };
    }
  };

  const put = async (item: UploadItem, call: CallOptions = {}) => {
    try {
      const target = pathFor(item.remoteKey);
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await copyFileAtomic(item.localPath, target, { signal: call.signal });
      const ref: RemoteRef = { key: item.remoteKey, size: item.size };
      return { success: true as const, value: ref };
    } catch (error) {
      return {
        success: false as const,
        error: new UploadError(
          `Failed to mirror ${item.remoteKey}: ${errorMessage(error)}`,
          error,
        ),
      };
    }
  };

  const walk = async (
    dir: string,
    signal?: AbortSignal,
  ): Promise<RemoteRef[]> => {
    signal?.throwIfAborted();
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const refs: RemoteRef[] = [];
    for (const entry of entries) {
      // Hidden names are in-flight temp files
      if (entry.name.startsWith('.')) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        refs.push(...(await walk(fullPath, signal)));
      } else if (entry.isFile()) {
        const stats = await fs.promises.stat(fullPath);
        refs.push({
          key: path.relative(root, fullPath).split(path.sep).join('/'),
          size: stats.size,
          modifiedAt: stats.mtime,
        });
      }
    }
    return refs;
  };

  const list = async (call: CallOptions = {}): Promise<RemoteRef[]> => {
    const refs = await walk(root, call.signal);
    return refs.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  };

  const remove = async (ref: RemoteRef) => {
    try {
      await fs.promises.rm(pathFor(ref.key), { force: true });
      return { success: true as const, value: undefined };
    } catch (error) {
      return {
        success: false as const,
        error: new DeleteError(
          `Failed to delete mirrored ${ref.key}: ${errorMessage(error)}`,
          error,
        ),
      };
    }
  };

  return {
    provider: 'local-mirror',
    authenticate,
    isAuthenticated: () => session !== null,
    put,
    list,
    delete: remove,
  };
}
