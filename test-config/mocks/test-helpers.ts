/**
 * Shared test helpers
 *
 * Mock factories return the same shape as the real factories, so they are
 * injected directly without type casting.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { parseConfig, type AppConfig } from '../../src/core/config/config';
import type { BackupKind } from '../../src/interfaces/backup';
import type {
  RemoteRef,
  StoragePort,
  StorageProviderName,
  UploadItem,
} from '../../src/interfaces/storage';
import {
  AuthError,
  DeleteError,
  UploadError,
} from '../../src/utils/errors';
import { formatArtifactName } from '../../src/core/backup/artifact-name';

export async function createTempDir(label = 'dropshelf'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `${label}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export async function writeFile(
  filePath: string,
  content: string | Buffer,
): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content);
  return filePath;
}

type ConfigOverrides = { [key: string]: unknown };

/**
 * A validated configuration rooted at `baseDir`, with the state directory
 * inside it and no size minimum unless overridden.
 */
export function createTestConfig(
  baseDir: string,
  overrides: ConfigOverrides = {},
): AppConfig {
  const retention: unknown = overrides.retention;
  return parseConfig({
    ...overrides,
    baseDir,
    stateDir: path.join(baseDir, '.state'),
    retention: {
      minSizeBytes: 0,
      ...(typeof retention === 'object' && retention !== null ? retention : {}),
    },
  });
}

/**
 * Writes a file named like an artifact of `kind` into `dir`.
 */
export async function writeArtifact(
  dir: string,
  options: {
    prefix?: string;
    kind?: BackupKind;
    createdAt: Date;
    sequence: number;
    size?: number;
  },
): Promise<string> {
  const fileName = formatArtifactName({
    prefix: options.prefix ?? 'Acme_Backup',
    kind: options.kind ?? 'daily',
    createdAt: options.createdAt,
    sequence: options.sequence,
  });
  return writeFile(path.join(dir, fileName), Buffer.alloc(options.size ?? 16, 1));
}

export interface MockStorage {
  port: StoragePort;
  /** Remote objects by key */
  objects: Map<string, UploadItem>;
  failPutFor: Set<string>;
  failDeleteFor: Set<string>;
  setAuthFailure: (failure: boolean) => void;
}

/**
 * In-memory storage port. Keys listed in `failPutFor` / `failDeleteFor`
 * fail their calls.
 */
export function createMockStorage(
  provider: StorageProviderName = 'local-mirror',
): MockStorage {
  const objects = new Map<string, UploadItem>();
  const failPutFor = new Set<string>();
  const failDeleteFor = new Set<string>();
  let authFails = false;
  let authenticated = false;

  const port: StoragePort = {
    provider,
    authenticate: vi.fn(async () => {
      if (authFails) {
        authenticated = false;
        return { success: false as const, error: new AuthError('login required') };
      }
      authenticated = true;
      return {
        success: true as const,
        value: { provider, target: 'memory', authenticatedAt: new Date() },
      };
    }),
    isAuthenticated: vi.fn(() => authenticated),
    put: vi.fn(async (item: UploadItem) => {
      if (failPutFor.has(item.remoteKey)) {
        return {
          success: false as const,
          error: new UploadError(`network down for ${item.remoteKey}`),
        };
      }
      objects.set(item.remoteKey, item);
      const ref: RemoteRef = { key: item.remoteKey, size: item.size };
      return { success: true as const, value: ref };
    }),
    list: vi.fn(async () =>
      [...objects.values()].map((item) => ({ key: item.remoteKey, size: item.size })),
    ),
    delete: vi.fn(async (ref: RemoteRef) => {
      if (failDeleteFor.has(ref.key)) {
        return {
          success: false as const,
          error: new DeleteError(`cannot delete ${ref.key}`),
        };
      }
      objects.delete(ref.key);
      return { success: true as const, value: undefined };
    }),
  };

  return {
    port,
    objects,
    failPutFor,
    failDeleteFor,
    setAuthFailure: (failure: boolean) => {
      authFails = failure;
    },
  };
}
