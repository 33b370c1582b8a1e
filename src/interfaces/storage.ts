/**
 * Storage Port: the capability boundary to remote storage
 */

import type {
  AuthError,
  DeleteError,
  StorageError,
  TimeoutError,
  UploadError,
} from '../utils/errors';
import type { BackupKind } from './backup';

export const STORAGE_PROVIDERS = [
  'local-mirror',
  'cloud-object-store',
  'cloud-drive',
] as const;
export type StorageProviderName = (typeof STORAGE_PROVIDERS)[number];

export type StorageResult<T, E extends StorageError = StorageError> =
  | { success: true; value: T }
  | { success: false; error: E };

export interface StorageSession {
  provider: StorageProviderName;
  target: string;
  authenticatedAt: Date;
}

export interface RemoteRef {
  key: string;
  size?: number;
  modifiedAt?: Date;
}

/**
 * What the port needs to know about an artifact to store it
 */
export interface UploadItem {
  localPath: string;
  remoteKey: string;
  kind: BackupKind;
  size: number;
}

/**
 * Aborting `signal` stops the call's work, including any child process
 */
export interface CallOptions {
  signal?: AbortSignal;
}

export interface StoragePort {
  readonly provider: StorageProviderName;
  authenticate(
    options?: CallOptions,
  ): Promise<StorageResult<StorageSession, AuthError | TimeoutError>>;
  isAuthenticated(): boolean;
  put(
    item: UploadItem,
    options?: CallOptions,
  ): Promise<StorageResult<RemoteRef, UploadError | TimeoutError>>;
  /** Rejects when the listing cannot be produced */
  list(options?: CallOptions): Promise<RemoteRef[]>;
  delete(
    ref: RemoteRef,
    options?: CallOptions,
  ): Promise<StorageResult<void, DeleteError | TimeoutError>>;
}

export interface LedgerEntry {
  key: string;
  fileName: string;
  uploadedAt: string;
}

export interface UploadLedgerData {
  version: number;
  uploads: Record<string, LedgerEntry>;
}

export type UploadItemResult =
  | { fileName: string; key: string; status: 'uploaded' }
  | { fileName: string; key: string; status: 'already-present' }
  | {
      fileName: string;
      key: string;
      status: 'failed';
      code: string;
      retryable: boolean;
      message: string;
    };

export interface UploadReport {
  kind: BackupKind;
  attempted: number;
  uploaded: number;
  alreadyPresent: number;
  failed: number;
  results: UploadItemResult[];
}
