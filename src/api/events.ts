/**
 * Deployment Event System
 *
 * Event names and payloads emitted by the ReleaseOrchestrator.
 */

import type { DeployPhase, DeploymentReport, DeployWarning, Release } from '../types/release.js';
import type { LivePointerRecord, SlotId } from '../types/slot.js';

/**
 * Event payload on every phase transition
 */
export interface PhaseEvent {
  attemptId: string;
  phase: DeployPhase;
  previous?: DeployPhase;
  timestamp: number;
}

/**
 * Event payload for each health probe attempt
 */
export interface HealthAttemptEvent {
  attemptId: string;
  slot: SlotId;
  port: number;
  attempt: number;
  maxAttempts: number;
  /** HTTP status, 0 when no response was received */
  status: number;
  elapsedMs: number;
}

/**
 * Event payload once traffic has moved to the target slot
 */
export interface PromotedEvent {
  attemptId: string;
  release: Release;
  pointer: LivePointerRecord;
  timestamp: number;
}

/**
 * Event payload when an attempt gives up on its target slot
 */
export interface RolledBackEvent {
  attemptId: string;
  slot: SlotId;
  port: number;
  reason: string;
  targetStopped: boolean;
  timestamp: number;
}

export interface CleanupWarningEvent {
  attemptId: string;
  warning: DeployWarning;
}

export interface CompletedEvent {
  report: DeploymentReport;
}

/**
 * Event map for the orchestrator's EventEmitter
 */
export interface DeployEvents {
  phase: (event: PhaseEvent) => void;
  health_attempt: (event: HealthAttemptEvent) => void;
  promoted: (event: PromotedEvent) => void;
  rolled_back: (event: RolledBackEvent) => void;
  cleanup_warning: (event: CleanupWarningEvent) => void;
  completed: (event: CompletedEvent) => void;
}
