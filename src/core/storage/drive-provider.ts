/**
 * Cloud drive storage through rclone, which owns the OAuth session for the
 * configured remote.
 */

import { z } from 'zod';
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
import {
  commandFailureMessage,
  runCommand,
  type CommandRunner,
} from './command-runner';

export interface DriveOptions {
  /** rclone remote name, without the trailing colon */
  remote: string;
  /** Folder on the remote that holds the backups */
  folder?: string;
  command?: string;
  runner?: CommandRunner;
  verbosity?: number;
}

const lsjsonSchema = z.array(
  z.object({
    Path: z.string(),
    Size: z.number(),
    ModTime: z.string().optional(),
    IsDir: z.boolean().optional(),
  }),
);

export function parseLsJsonOutput(stdout: string): RemoteRef[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new Error(`Unexpected rclone lsjson output: ${errorMessage(error)}`);
  }
  return lsjsonSchema
    .parse(parsed)
    .filter((entry) => !entry.IsDir)
    .map((entry) => ({
      key: entry.Path,
      size: entry.Size,
      modifiedAt: entry.ModTime ? new Date(entry.ModTime) : undefined,
    }));
}

export function createDriveProvider(options: DriveOptions): StoragePort {
  const command = options.command ?? 'rclone';
  const run = options.runner ?? runCommand;
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const folder = (options.folder ?? '').replace(/^\/+|\/+$/g, '');
  const root = `${options.remote}:${folder}`;
  let session: StorageSession | null = null;

  const pathFor = (key: string): string =>
    folder ? `${root}/${key}` : `${root}${key}`;

  const authenticate: StoragePort['authenticate'] = async (call = {}) => {
    try {
      await run(command, ['about', `${options.remote}:`, '--json'], call);
      session = {
        provider: 'cloud-drive',
        target: root,
        authenticatedAt: new Date(),
      };
      logger.verbose(`Drive session for ${root}`, verbosity);
      return { success: true, value: session };
    } catch (error) {
      session = null;
      return {
        success: false,
        error: new AuthError(
          `Remote ${options.remote} is not authorized: ${commandFailureMessage(error)}`,
          error,
        ),
      };
    }
  };

  const put = async (item: UploadItem, call: CallOptions = {}) => {
    const target = pathFor(item.remoteKey);
    logger.verbose(`Drive upload: ${item.localPath} -> ${target}`, verbosity);
    try {
      await run(command, ['copyto', item.localPath, target], call);
      const ref: RemoteRef = { key: item.remoteKey, size: item.size };
      return { success: true as const, value: ref };
    } catch (error) {
      return {
        success: false as const,
        error: new UploadError(
          `Upload to ${target} failed: ${commandFailureMessage(error)}`,
          error,
        ),
      };
    }
  };

  const list = async (call: CallOptions = {}): Promise<RemoteRef[]> => {
    try {
      const { stdout } = await run(
        command,
        ['lsjson', root, '--recursive', '--files-only'],
        call,
      );
      return parseLsJsonOutput(stdout);
    } catch (error) {
      // A folder that was never written to does not exist yet
      if (/directory not found/i.test(commandFailureMessage(error))) {
        return [];
      }
      throw error;
    }
  };

  const remove = async (ref: RemoteRef, call: CallOptions = {}) => {
    const target = pathFor(ref.key);
    logger.verbose(`Drive delete: ${target}`, verbosity);
    try {
      await run(command, ['deletefile', target], call);
      return { success: true as const, value: undefined };
    } catch (error) {
      return {
        success: false as const,
        error: new DeleteError(
          `Delete of ${target} failed: ${commandFailureMessage(error)}`,
          error,
        ),
      };
    }
  };

  return {
    provider: 'cloud-drive',
    authenticate,
    isAuthenticated: () => session !== null,
    put,
    list,
    delete: remove,
  };
}
