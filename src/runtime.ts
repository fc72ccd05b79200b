import type { NetworkSpec, ProbeCommand, ServiceSpec, VolumeSpec } from './types';

/**
 * A launched container. `exited` settles with the process exit code.
 */
export interface RunningContainer {
  id: string;
  exited: Promise<number>;
}

/**
 * Boundary to the container runtime that actually runs images.
 *
 * The orchestrator never touches processes directly; it consumes lifecycle
 * events (launch, exit code) and probe results through this interface.
 */
export interface ContainerRuntime {
  ensureNetwork(network: NetworkSpec): Promise<void>;
  removeNetwork(network: NetworkSpec): Promise<void>;
  ensureVolume(volume: VolumeSpec): Promise<void>;
  removeVolume(volume: VolumeSpec): Promise<void>;
  start(service: ServiceSpec): Promise<RunningContainer>;
  stop(service: ServiceSpec): Promise<void>;
  /** Delete the stopped container; its volumes are untouched. */
  remove(service: ServiceSpec): Promise<void>;
  /** Run a health check inside the service's container and return its exit code. */
  exec(service: ServiceSpec, command: ProbeCommand, signal: AbortSignal): Promise<number>;
}
