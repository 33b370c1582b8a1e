/**
 * Backup artifact and rotation types
 */

import type { PackError } from '../utils/errors';

export const BACKUP_KINDS = ['daily', 'weekly', 'monthly'] as const;
export type BackupKind = (typeof BACKUP_KINDS)[number];

export type Generation = 'working' | 'archive';

export interface BackupArtifact {
  fileName: string;
  path: string;
  kind: BackupKind;
  createdAt: Date;
  /** Insertion sequence; breaks ties between equal timestamps */
  sequence: number;
  size: number;
  generation: Generation;
  /** Key under which the artifact is stored remotely */
  remoteKey: string;
}

/**
 * A freshly built archive waiting in the staging directory for admission
 */
export interface StagedArtifact {
  fileName: string;
  path: string;
  kind: BackupKind;
  createdAt: Date;
  sequence: number;
  size: number;
  remoteKey: string;
}

export interface RetentionPolicy {
  maxWorking: number;
  maxArchive: number;
  minSizeBytes: number;
}

export type BuildResult =
  | {
      success: true;
      artifact: StagedArtifact;
      memberCount: number;
      undersized: boolean;
    }
  | { success: false; kind: BackupKind; error: PackError };

export interface CatalogState {
  /** Oldest first */
  working: BackupArtifact[];
  /** Oldest first */
  archive: BackupArtifact[];
}

export type AdmissionDecision =
  | { admitted: true; undersized: boolean }
  | { admitted: false; reason: 'Undersized'; message: string };

export interface RotationPlan {
  decision: AdmissionDecision | null;
  candidate: StagedArtifact | null;
  demote: BackupArtifact[];
  evict: BackupArtifact[];
  /** Retained although over the archive limit */
  protected: BackupArtifact[];
  violations: string[];
  resulting: CatalogState;
}

export type DeletionResult =
  | { success: true }
  | { success: false; error: string };

export interface EvictionResult {
  artifact: BackupArtifact;
  local: DeletionResult;
  /** null when the artifact was never uploaded */
  remote: DeletionResult | null;
}

export interface RotationResult {
  plan: RotationPlan;
  admitted: BackupArtifact | null;
  demoted: BackupArtifact[];
  demotionFailures: Array<{ artifact: BackupArtifact; error: string }>;
  evictions: EvictionResult[];
  /** Planned evictions dropped because a demotion did not happen */
  skippedEvictions: BackupArtifact[];
  state: CatalogState;
}
