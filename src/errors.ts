/**
 * Error taxonomy.
 *
 * Resolver-time errors (manifest, unknown or cyclic dependency, duplicate
 * alias) abort a deployment before any container starts. Probe and process
 * errors stay local to one service and are handled by policy.
 */
export type StackgateErrorCode =
  | 'CONFIG_INVALID'
  | 'MANIFEST_INVALID'
  | 'UNKNOWN_DEPENDENCY'
  | 'UNKNOWN_SERVICE'
  | 'CYCLIC_DEPENDENCY'
  | 'DUPLICATE_ALIAS'
  | 'PROBE_TIMEOUT'
  | 'PROBE_FAILURE'
  | 'UNHEALTHY'
  | 'PROCESS_EXITED'
  | 'DEPENDENCY_TIMEOUT'
  | 'CANCELLED';

export class StackgateError extends Error {
  readonly code: StackgateErrorCode;

  constructor(code: StackgateErrorCode, message: string) {
    super(message);
    this.name = 'StackgateError';
    this.code = code;
  }
}

export class ConfigError extends StackgateError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

export class ManifestError extends StackgateError {
  constructor(message: string) {
    super('MANIFEST_INVALID', message);
    this.name = 'ManifestError';
  }
}

export class UnknownDependencyError extends StackgateError {
  readonly service: string;
  readonly dependency: string;

  constructor(service: string, dependency: string) {
    super('UNKNOWN_DEPENDENCY', `Service "${service}" depends on unknown service "${dependency}"`);
    this.name = 'UnknownDependencyError';
    this.service = service;
    this.dependency = dependency;
  }
}

export class UnknownServiceError extends StackgateError {
  readonly service: string;

  constructor(service: string) {
    super('UNKNOWN_SERVICE', `Unknown service "${service}"`);
    this.name = 'UnknownServiceError';
    this.service = service;
  }
}

export class CyclicDependencyError extends StackgateError {
  /** Services left unresolved when no zero in-degree node remained. */
  readonly services: string[];

  constructor(services: string[]) {
    super('CYCLIC_DEPENDENCY', `Dependency cycle between services: ${services.join(', ')}`);
    this.name = 'CyclicDependencyError';
    this.services = services;
  }
}

export class DuplicateAliasError extends StackgateError {
  readonly network: string;
  readonly alias: string;

  constructor(network: string, alias: string, owners: [string, string]) {
    super(
      'DUPLICATE_ALIAS',
      `Name "${alias}" on network "${network}" is claimed by both "${owners[0]}" and "${owners[1]}"`
    );
    this.name = 'DuplicateAliasError';
    this.network = network;
    this.alias = alias;
  }
}

export class ProbeTimeoutError extends StackgateError {
  constructor(service: string, timeoutMs: number) {
    super('PROBE_TIMEOUT', `Health probe for "${service}" timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
  }
}

export class ProbeFailureError extends StackgateError {
  readonly exitCode: number;

  constructor(service: string, exitCode: number) {
    super('PROBE_FAILURE', `Health probe for "${service}" exited with code ${exitCode}`);
    this.name = 'ProbeFailureError';
    this.exitCode = exitCode;
  }
}

export class UnhealthyError extends StackgateError {
  readonly service: string;

  constructor(service: string, failures: number) {
    super('UNHEALTHY', `Service "${service}" is unhealthy after ${failures} consecutive failed probes`);
    this.name = 'UnhealthyError';
    this.service = service;
  }
}

export class ProcessExitedError extends StackgateError {
  readonly exitCode: number;

  constructor(service: string, exitCode: number) {
    super('PROCESS_EXITED', `Service "${service}" exited with code ${exitCode}`);
    this.name = 'ProcessExitedError';
    this.exitCode = exitCode;
  }
}

export class DependencyTimeoutError extends StackgateError {
  constructor(service: string, pending: string[], timeoutMs: number) {
    super(
      'DEPENDENCY_TIMEOUT',
      `Service "${service}" still waiting on ${pending.join(', ')} after ${timeoutMs}ms`
    );
    this.name = 'DependencyTimeoutError';
  }
}

export class CancelledError extends StackgateError {
  constructor(service: string) {
    super('CANCELLED', `Pending start of "${service}" was cancelled`);
    this.name = 'CancelledError';
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
