/**
 * Drop-zone routing types
 */

import type { FileErrorCode } from '../utils/errors';

/**
 * A drop-zone file as seen by one routing run
 */
export interface FileRecord {
  readonly absolutePath: string;
  readonly name: string;
  /** Lower-cased, including the leading dot; empty when the name has none */
  readonly extension: string;
  readonly size: number;
  /** MD5 hex digest of the content; empty for files that failed validation */
  readonly fingerprint: string;
  readonly category: string;
}

export type RoutingStatus =
  | 'moved'
  | 'skipped-duplicate'
  | 'skipped-invalid'
  | 'failed';

export type RoutingOutcome =
  | {
      record: FileRecord;
      status: 'moved';
      destinationPath: string;
    }
  | {
      record: FileRecord;
      status: 'skipped-duplicate';
      /** The existing copy that made this one redundant */
      destinationPath: string;
    }
  | {
      record: FileRecord;
      status: 'skipped-invalid';
      destinationPath: null;
      message: string;
    }
  | {
      record: FileRecord;
      status: 'failed';
      destinationPath: string | null;
      reason: FileErrorCode;
      message: string;
    };

export interface RoutingCounts {
  scanned: number;
  moved: number;
  skippedDuplicate: number;
  skippedInvalid: number;
  failed: number;
}

export interface RoutingReport {
  dropZone: string;
  outcomes: RoutingOutcome[];
  counts: RoutingCounts;
  failuresByReason: Record<FileErrorCode, number>;
}

export interface Classification {
  category: string;
  /** Where the category came from */
  source: 'extension' | 'content' | 'fallback';
  /** The extension implied by sniffed content, when it differs */
  sniffedExtension?: string;
}
