import path from 'node:path';
import { BACKUP_KINDS, type BackupKind } from '../../interfaces/backup';

export interface ArtifactNameParts {
  prefix: string;
  kind: BackupKind;
  createdAt: Date;
  sequence: number;
}

const SEQUENCE_DIGITS = 6;
const NAME_PATTERN = new RegExp(
  `^(.+)_(${BACKUP_KINDS.join('|')})_(\\d{8}T\\d{6}Z)_(\\d{${SEQUENCE_DIGITS}})\\.zip$`,
);
const STAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

/**
 * Compact UTC stamp, e.g. 20250301T020000Z. Milliseconds are dropped.
 */
export function formatTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z')
    .replace(/[-:]/g, '');
}

export function parseTimestamp(stamp: string): Date | null {
  const match = STAMP_PATTERN.exec(stamp);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Rejects stamps such as 20250231 that Date.UTC would roll over
  return formatTimestamp(date) === stamp ? date : null;
}

export function formatArtifactName(parts: ArtifactNameParts): string {
  const sequence = String(parts.sequence).padStart(SEQUENCE_DIGITS, '0');
  return `${parts.prefix}_${parts.kind}_${formatTimestamp(parts.createdAt)}_${sequence}.zip`;
}

/**
 * Reads the metadata carried by an artifact file name. Returns null for
 * anything that is not an artifact of `prefix`.
 */
export function parseArtifactName(
  fileName: string,
  prefix: string,
): ArtifactNameParts | null {
  const match = NAME_PATTERN.exec(path.basename(fileName));
  if (!match || match[1] !== prefix) {
    return null;
  }
  const kind = BACKUP_KINDS.find((candidate) => candidate === match[2]);
  const createdAt = parseTimestamp(match[3]);
  if (!kind || !createdAt) {
    return null;
  }
  return { prefix, kind, createdAt, sequence: Number(match[4]) };
}

/**
 * Remote object key; the file name already carries kind, time and sequence
 * so the key is stable across retries.
 */
export function remoteKeyFor(
  prefix: string,
  kind: BackupKind,
  fileName: string,
): string {
  return `${prefix}/${kind}/${fileName}`;
}

/**
 * Older artifacts sort first; the sequence decides between equal timestamps.
 */
export function compareArtifacts(
  a: { createdAt: Date; sequence: number },
  b: { createdAt: Date; sequence: number },
): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  return byTime !== 0 ? byTime : a.sequence - b.sequence;
}
