export { Deployer, type DeployerOptions, type DeployerStatus, type SlotStatus, type StopSlotOptions } from './api/deployer.js';
export {
  DeployError,
  StagingError,
  SupervisorError,
  HealthTimeoutError,
  ProxyReloadError,
  PruneError,
  LivePointerError,
  ConfigValidationError,
  toDeployError,
  type DeployErrorCode,
  type DeployErrorShape,
  type StagingFailureReason,
  type UnhealthyReason,
} from './api/errors.js';
export type * from './api/events.js';

export { ReleaseOrchestrator, type OrchestratorConfig, type OrchestratorDependencies, type DeployOptions } from './core/orchestrator.js';
export { ReleaseStore, type ReleaseStoreOptions } from './core/release-store.js';
export { LivePointer, type LivePointerOptions } from './core/live-pointer.js';
export { SlotResolver } from './core/slot-resolver.js';
export {
  HealthGate,
  type HealthGateOptions,
  type HealthProbeRequest,
  type HealthVerdict,
  type HealthAttempt,
} from './core/health-gate.js';
export { TrafficSwitch, type TrafficSwitchOptions } from './core/traffic-switch.js';

export { NginxProxy, type NginxProxyOptions } from './proxy/nginx-proxy.js';
export { NoopProxy, type ReverseProxy, type ProxyBackend } from './proxy/reverse-proxy.js';
export { Pm2Supervisor, type Pm2SupervisorOptions } from './supervisor/pm2-supervisor.js';
export type {
  ProcessSupervisor,
  ProcessDescriptor,
  ProcessHandle,
  StopOptions,
} from './supervisor/process-supervisor.js';
export { DiskGuard, type DiskGuardOptions } from './services/disk-guard.js';

export { loadConfig, validateConfig, type LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { resolveLayout, type DeployLayout } from './config/layout.js';
export { createDeployMetrics, instrumentOrchestrator, type DeployMetrics } from './telemetry/deploy-metrics.js';
export { createLogger } from './utils/logger.js';
export { execaRunner, type CommandRunner, type CommandResult } from './utils/command-runner.js';

export * from './types/index.js';
