/**
 * S3-compatible object storage through the s3cmd tool.
 *
 * Commands are run with explicit argument arrays so keys and paths are never
 * interpreted by a shell.
 */

import * as logger from '../../utils/logger';
import type {
  CallOptions,
  RemoteRef,
  StoragePort,
  StorageSession,
  UploadItem,
} from '../../interfaces/storage';
import { AuthError, DeleteError, UploadError } from '../../utils/errors';
import {
  commandFailureMessage,
  runCommand,
  type CommandRunner,
} from './command-runner';

export interface ObjectStoreOptions {
  bucket: string;
  /** Key prefix inside the bucket, without slashes at either end */
  prefix?: string;
  command?: string;
  runner?: CommandRunner;
  verbosity?: number;
}

export interface ListedObject {
  /** Object path inside the bucket */
  path: string;
  size: number;
  date: string;
}

/**
 * Parses `s3cmd ls` output. Lines look like
 * "2025-03-01 02:00    12345   s3://bucket/path/to/file.zip"; directory lines
 * ("DIR s3://...") are skipped.
 */
export function parseS3CmdLsOutput(stdout: string): ListedObject[] {
  const objects: ListedObject[] = [];
  for (const line of stdout.split('\n')) {
    const match = line
      .trim()
      .match(/^(\d{4}-\d{2}-\d{2})\s+(\d{2}:\d{2})\s+(\d+)\s+s3:\/\/[^/]+\/(.+)$/);
    if (match) {
      objects.push({
        date: `${match[1]}T${match[2]}:00Z`,
        size: Number.parseInt(match[3], 10),
        path: match[4],
      });
    }
  }
  return objects;
}

export function createObjectStoreProvider(
  options: ObjectStoreOptions,
): StoragePort {
  const command = options.command ?? 's3cmd';
  const run = options.runner ?? runCommand;
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const prefix = (options.prefix ?? '').replace(/^\/+|\/+$/g, '');
  const bucketUrl = `s3://${options.bucket}`;
  const keyBase = prefix ? `${prefix}/` : '';
  let session: StorageSession | null = null;

  const urlFor = (key: string): string => `${bucketUrl}/${keyBase}${key}`;

  const authenticate: StoragePort['authenticate'] = async (call = {}) => {
    try {
      await run(command, ['ls', bucketUrl], call);
      session = {
        provider: 'cloud-object-store',
        target: bucketUrl,
        authenticatedAt: new Date(),
      };
      logger.verbose(`Object store session for ${bucketUrl}`, verbosity);
      return { success: true, value: session };
    } catch (error) {
      session = null;
      return {
        success: false,
        error: new AuthError(
          `Cannot access ${bucketUrl}: ${commandFailureMessage(error)}`,
          error,
        ),
      };
    }
  };

  const put = async (item: UploadItem, call: CallOptions = {}) => {
    const url = urlFor(item.remoteKey);
    logger.verbose(`Object store upload: ${item.localPath} -> ${url}`, verbosity);
    try {
      await run(command, ['put', item.localPath, url], call);
      const ref: RemoteRef = { key: item.remoteKey, size: item.size };
      return { success: true as const, value: ref };
    } catch (error) {
      return {
        success: false as const,
        error: new UploadError(
          `Upload to ${url} failed: ${commandFailureMessage(error)}`,
          error,
        ),
      };
    }
  };

  const list = async (call: CallOptions = {}): Promise<RemoteRef[]> => {
    const { stdout } = await run(
      command,
      ['ls', '--recursive', `${bucketUrl}/${keyBase}`],
      call,
    );
    return parseS3CmdLsOutput(stdout)
      .filter((object) => object.path.startsWith(keyBase))
      .map((object) => ({
        key: object.path.slice(keyBase.length),
        size: object.size,
        modifiedAt: new Date(object.date),
      }));
  };

  const remove = async (ref: RemoteRef, call: CallOptions = {}) => {
    const url = urlFor(ref.key);
    logger.verbose(`Object store delete: ${url}`, verbosity);
    try {
      await run(command, ['del', url], call);
      return { success: true as const, value: undefined };
    } catch (error) {
      return {
        success: false as const,
        error: new DeleteError(
          `Delete of ${url} failed: ${commandFailureMessage(error)}`,
          error,
        ),
      };
    }
  };

  return {
    provider: 'cloud-object-store',
    authenticate,
    isAuthenticated: () => session !== null,
    put,
    list,
    delete: remove,
  };
}
