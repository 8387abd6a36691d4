/**
 * Deployment error utilities.
 *
 * Provides one error type per failure class of the release protocol and
 * helpers to convert lower-level errors (zod issues, execa results, plain
 * throwables) into DeployError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to operators and reports.
 */
export type DeployErrorCode =
  | 'StagingError'
  | 'SupervisorError'
  | 'HealthTimeout'
  | 'ProxyReloadError'
  | 'PruneError'
  | 'ConfigValidationError'
  | 'LivePointerError'
  | 'Cancelled'
  | 'UnknownError';

/**
 * Plain shape of a deploy error (for JSON output and reports).
 */
export interface DeployErrorShape {
  code: DeployErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class DeployError extends Error implements DeployErrorShape {
  public readonly code: DeployErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: DeployErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DeployError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): DeployErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type StagingFailureReason =
  | 'collision'
  | 'extraction'
  | 'malformed'
  | 'install'
  | 'not-found'
  | 'insufficient-space';

/**
 * Artifact malformed, extraction failed, or release id collided.
 */
export class StagingError extends DeployError {
  public readonly reason: StagingFailureReason;

  constructor(reason: StagingFailureReason, message: string, details?: Record<string, unknown>) {
    super('StagingError', message, { reason, ...details });
    this.name = 'StagingError';
    this.reason = reason;
  }
}

/**
 * Process supervisor refused to start or stop a slot process.
 */
export class SupervisorError extends DeployError {
  public readonly processName: string;

  constructor(processName: string, message: string, details?: Record<string, unknown>) {
    super('SupervisorError', message, { processName, ...details });
    this.name = 'SupervisorError';
    this.processName = processName;
  }
}

export type UnhealthyReason = 'timeout' | 'process-exited' | 'aborted';

/**
 * Target never answered with the expected status inside the probe window.
 */
export class HealthTimeoutError extends DeployError {
  public readonly port: number;
  public readonly attempts: number;
  public readonly reason: UnhealthyReason;

  constructor(port: number, attempts: number, reason: UnhealthyReason, lastStatus?: number) {
    super(
      reason === 'aborted' ? 'Cancelled' : 'HealthTimeout',
      reason === 'process-exited'
        ? `Process on port ${port} exited after ${attempts} health attempts`
        : reason === 'aborted'
        ? `Health check on port ${port} cancelled after ${attempts} attempts`
        : `Port ${port} did not become healthy after ${attempts} attempts`,
      { port, attempts, reason, lastStatus }
    );
    this.name = 'HealthTimeoutError';
    this.port = port;
    this.attempts = attempts;
    this.reason = reason;
  }
}

/**
 * Reverse proxy rejected the new backend definition or failed to reload.
 */
export class ProxyReloadError extends DeployError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ProxyReloadError', message, details);
    this.name = 'ProxyReloadError';
  }
}

/**
 * One or more releases could not be removed during retention.
 */
export class PruneError extends DeployError {
  public readonly failures: Array<{ releaseId: string; error: string }>;

  constructor(failures: Array<{ releaseId: string; error: string }>) {
    super(
      'PruneError',
      `Failed to remove ${failures.length} release(s): ${failures.map((f) => f.releaseId).join(', ')}`,
      { failures }
    );
    this.name = 'PruneError';
    this.failures = failures;
  }
}

export class LivePointerError extends DeployError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('LivePointerError', message, details);
    this.name = 'LivePointerError';
  }
}

/**
 * Configuration rejected at startup. Lists every invalid field at once.
 */
export class ConfigValidationError extends DeployError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(
      'ConfigValidationError',
      `Configuration validation failed:\n${issues.map((i) => `${i.path} ${i.message}`).join('\n')}`,
      { issues }
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Convert Zod validation error to ConfigValidationError, keeping every issue.
 */
export function zodErrorToConfigError(error: ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : 'root',
      message: issue.message,
    }))
  );
}

/**
 * Map unknown errors into DeployError instances.
 *
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toDeployError(
  error: unknown,
  fallbackCode: DeployErrorCode = 'UnknownError'
): DeployError {
  if (error instanceof DeployError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new DeployError('Cancelled', error.message || 'Operation aborted by caller');
    }
    return new DeployError(fallbackCode, error.message);
  }

  return new DeployError(fallbackCode, String(error));
}

/**
 * Best-effort message extraction for logs and warnings.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  return String(error);
}
