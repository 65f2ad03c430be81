import { PodSnapshot, WorkloadRef } from './rollout.interfaces';

/**
 * Status condition reported on a Deployment
 */
export interface WorkloadCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
}

export interface WorkloadDescriptor {
  namespace: string;
  name: string;
  /** Label selector string used to list the Deployment's pods */
  selector: string;
  /** Desired replica count from the Deployment spec */
  replicas: number;
  conditions: WorkloadCondition[];
}

export interface SecretDescriptor {
  name: string;
}

/**
 * Incrementally readable container log. `close` must be called on every
 * exit path, including after an early stop.
 */
export interface LogStream {
  lines: AsyncIterable<string>;
  close(): void;
}

/**
 * Readiness query consumed by the rollout poller on every attempt
 */
export interface DeploymentStatusChecker {
  isAvailable(workload: WorkloadRef): Promise<boolean>;
}

export interface SecretReader {
  /** Resolves `null` when the secret does not exist */
  getSecret(namespace: string, name: string): Promise<SecretDescriptor | null>;
}

export interface LogSource {
  streamLogs(namespace: string, podName: string, containerName: string): Promise<LogStream>;
}

/**
 * Cluster operations used by the verifier. Errors from `getWorkload`,
 * `listPods` and `isAvailable` are fatal to the run; errors from
 * `getSecret` and `streamLogs` are reported as diagnostics.
 */
export interface ClusterGateway extends DeploymentStatusChecker, SecretReader, LogSource {
  /** Resolves `null` when the Deployment does not exist */
  getWorkload(workload: WorkloadRef): Promise<WorkloadDescriptor | null>;
  listPods(namespace: string, selector: string): Promise<PodSnapshot[]>;
}
