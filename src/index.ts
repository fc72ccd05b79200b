// Logger
export { default as logger, serviceLogger } from './logger';

// Errors
export {
  StackgateError,
  ConfigError,
  ManifestError,
  UnknownDependencyError,
  UnknownServiceError,
  CyclicDependencyError,
  DuplicateAliasError,
  ProbeTimeoutError,
  ProbeFailureError,
  UnhealthyError,
  ProcessExitedError,
  DependencyTimeoutError,
  CancelledError,
} from './errors';
export type { StackgateErrorCode } from './errors';

// Declarations
export type * from './types';
export { parseManifest, loadManifest, DEFAULT_MANIFEST, PROBE_DEFAULTS } from './manifest';
export type { ManifestOptions } from './manifest';
export { parseDuration, formatDuration } from './duration';
export { loadConfig, DEFAULT_STATUS_PORT } from './config';
export type { StackgateConfig } from './config';

// Resolvers
export { resolveStartOrder, buildDependencyGraph, transitiveDependents } from './graph';
export type { DependencyGraph } from './graph';
export { buildNameTable, buildSegments, canResolve, resolvePeer, reachablePeers } from './network';
export type { NameTable } from './network';

// Supervision
export { createOrchestrator, isDeploymentHealthy } from './orchestrator';
export type {
  OrchestratorConfig,
  OrchestratorEvents,
  OrchestratorEvent,
  OrchestratorInstance,
  StatusSnapshot,
  DownOptions,
} from './orchestrator';
export { DeploymentStore, reduceDeployment } from './store';
export type { DeploymentAction, DeploymentState, ServiceState } from './store';
export { DependencyGate, isConditionMet } from './dependency-gate';
export { HealthMonitor } from './health-monitor';
export type { HealthTransition } from './health-monitor';
export { runProbe } from './probe';
export type { ProbeExecutor, ProbeOutcome } from './probe';
export { RestartPolicyEnforcer, backoffDelay, DEFAULT_BACKOFF } from './restart-policy';
export type { BackoffOptions, RestartDecision } from './restart-policy';
export { TimerQueue } from './timer-queue';
export type { TimerHandle } from './timer-queue';

// Runtime
export type { ContainerRuntime, RunningContainer } from './runtime';
export { DockerRuntime, buildCreateArgs, buildExecArgs } from './docker-runtime';

// Status endpoint and shutdown management
export { startStatusServer, handleStatusRequest } from './healthcheck';
export type { StatusServer, StatusServerState, StatusSource } from './healthcheck';
export { setupShutdownHandlers, SIGTERM, SIGINT } from './shutdown';
export { supervise } from './supervise';
export type { SuperviseOptions, Supervision } from './supervise';
export type { ShutdownSignal, OnShutdownCallback } from './shutdown';
