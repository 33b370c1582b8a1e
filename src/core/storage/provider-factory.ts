import type { AppConfig } from '../config/config';
import type { StoragePort } from '../../interfaces/storage';
import { ConfigError } from '../../utils/errors';
import type { CommandRunner } from './command-runner';
import { createDriveProvider } from './drive-provider';
import { createLocalMirrorProvider } from './local-mirror-provider';
import { createObjectStoreProvider } from './object-store-provider';
import { withCallTimeouts } from './with-timeout';

export interface StorageFactoryOptions {
  verbosity?: number;
  runner?: CommandRunner;
}

/**
 * Builds the one storage port selected by `storage.provider`, with every
 * call bounded by `storage.timeoutMs`.
 */
export function createStoragePort(
  config: AppConfig,
  options: StorageFactoryOptions = {},
): StoragePort {
  const { storage } = config;
  const { verbosity, runner } = options;

  const port = ((): StoragePort => {
    switch (storage.provider) {
      case 'local-mirror':
        if (!storage.localMirror) break;
        return createLocalMirrorProvider({
          root: storage.localMirror.path,
          verbosity,
        });
      case 'cloud-object-store':
        if (!storage.objectStore) break;
        return createObjectStoreProvider({ ...storage.objectStore, runner, verbosity });
      case 'cloud-drive':
        if (!storage.drive) break;
        return createDriveProvider({ ...storage.drive, runner, verbosity });
    }
    throw new ConfigError([
      `storage settings for provider "${storage.provider}" are missing`,
    ]);
  })();

  return withCallTimeouts(port, storage.timeoutMs);
}
