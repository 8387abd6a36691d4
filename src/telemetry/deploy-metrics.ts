/**
 * OpenTelemetry instrumentation for deployments.
 *
 * Metrics are recorded through the global meter provider. Without a
 * registered provider (the CLI registers none) every instrument is a no-op;
 * embedders that install an SDK get deployment counters for free.
 *
 * @module telemetry/deploy-metrics
 */

import { metrics, type Counter, type Histogram, type Meter } from '@opentelemetry/api';
import type { EventEmitter } from 'eventemitter3';
import type {
  CleanupWarningEvent,
  CompletedEvent,
  DeployEvents,
  HealthAttemptEvent,
  RolledBackEvent,
} from '../api/events.js';

export const METER_NAME = 'slotswap';

/**
 * Standard deployment metrics.
 */
export interface DeployMetrics {
  deploymentsTotal: Counter;
  deploymentDuration: Histogram;
  healthAttemptsTotal: Counter;
  rollbacksTotal: Counter;
  cleanupWarningsTotal: Counter;
}

export function createDeployMetrics(meter: Meter = metrics.getMeter(METER_NAME)): DeployMetrics {
  return {
    deploymentsTotal: meter.createCounter('slotswap_deployments_total', {
      description: 'Deployment attempts by outcome',
    }),
    deploymentDuration: meter.createHistogram('slotswap_deployment_duration_ms', {
      description: 'Wall time of a deployment attempt',
      unit: 'ms',
    }),
    healthAttemptsTotal: meter.createCounter('slotswap_health_attempts_total', {
      description: 'Health probe attempts by slot',
    }),
    rollbacksTotal: meter.createCounter('slotswap_rollbacks_total', {
      description: 'Attempts that gave up on their target slot',
    }),
    cleanupWarningsTotal: meter.createCounter('slotswap_cleanup_warnings_total', {
      description: 'Best-effort steps that failed',
    }),
  };
}

/**
 * Record orchestrator events into `deployMetrics`. Returns a detach function.
 */
export function instrumentOrchestrator(
  orchestrator: Pick<EventEmitter<DeployEvents>, 'on' | 'off'>,
  deployMetrics: DeployMetrics = createDeployMetrics()
): () => void {
  const onHealthAttempt = (event: HealthAttemptEvent): void => {
    deployMetrics.healthAttemptsTotal.add(1, { slot: event.slot });
  };
  const onRolledBack = (event: RolledBackEvent): void => {
    deployMetrics.rollbacksTotal.add(1, { slot: event.slot });
  };
  const onCleanupWarning = (event: CleanupWarningEvent): void => {
    deployMetrics.cleanupWarningsTotal.add(1, { step: event.warning.step });
  };
  const onCompleted = (event: CompletedEvent): void => {
    deployMetrics.deploymentsTotal.add(1, { outcome: event.report.outcome });
    deployMetrics.deploymentDuration.record(event.report.durationMs, { outcome: event.report.outcome });
  };

  orchestrator.on('health_attempt', onHealthAttempt);
  orchestrator.on('rolled_back', onRolledBack);
  orchestrator.on('cleanup_warning', onCleanupWarning);
  orchestrator.on('completed', onCompleted);

  return () => {
    orchestrator.off('health_attempt', onHealthAttempt);
    orchestrator.off('rolled_back', onRolledBack);
    orchestrator.off('cleanup_warning', onCleanupWarning);
    orchestrator.off('completed', onCompleted);
  };
}
