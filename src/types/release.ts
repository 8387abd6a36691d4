/**
 * Release and deployment attempt types.
 */

import type { SlotBinding } from './slot.js';

/**
 * Artifact layout variants.
 *
 * - `standalone`: self-contained runtime bundle, started from its own entry script
 * - `regular`: source plus dependency manifest, dependencies installed on staging
 */
export type BuildMode = 'standalone' | 'regular';

/**
 * Metadata record shipped inside every artifact (`DEPLOY_META`).
 */
export interface ReleaseMetadata {
  timestamp: string;
  buildMode: BuildMode;
  runtimeVersion?: string;
  packageManager?: string;
  commitHash?: string;
}

/**
 * A staged, immutable release.
 */
export interface Release {
  /** Compact UTC timestamp `YYYYMMDDHHmmss`, monotonically increasing */
  id: string;
  dir: string;
  buildMode: BuildMode;
  createdAt: string;
  metadata: ReleaseMetadata;
}

/**
 * Where the release for an attempt comes from.
 */
export type ReleaseSource =
  | { kind: 'artifact'; path: string }
  | { kind: 'release'; id: string };

export interface PruneResult {
  removed: string[];
  kept: string[];
  protected: string[];
}

/**
 * Orchestrator phases, in protocol order.
 */
export enum DeployPhase {
  RESOLVING = 'resolving',
  STAGING = 'staging',
  STARTING = 'starting',
  HEALTH_CHECKING = 'health_checking',
  PROMOTING = 'promoting',
  ROLLING_BACK = 'rolling_back',
  SETTLING = 'settling',
  DONE = 'done',
}

export type AttemptOutcome = 'success' | 'health-failed' | 'aborted';

/**
 * Exit codes surfaced to the operator.
 */
export enum DeployExitCode {
  PROMOTED = 0,
  ABORTED = 1,
  CLEANUP_FAILED = 2,
}

export interface PhaseRecord {
  phase: DeployPhase;
  startedAt: number;
  durationMs?: number;
}

/**
 * One orchestration run. Lives only as long as the run.
 */
export interface DeploymentAttempt {
  id: string;
  source: SlotBinding;
  target: SlotBinding;
  release?: Release;
  outcome?: AttemptOutcome;
  phases: PhaseRecord[];
}

/**
 * A non-fatal failure that was logged and carried into the report.
 */
export interface DeployWarning {
  step: 'settle' | 'prune' | 'persist' | 'maintenance' | 'rollback';
  message: string;
}

export interface DeploymentReport {
  attempt: DeploymentAttempt;
  outcome: AttemptOutcome;
  exitCode: DeployExitCode;
  error?: { code: string; message: string; details?: Record<string, unknown> };
  warnings: DeployWarning[];
  durationMs: number;
}
