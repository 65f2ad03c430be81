/**
 * Type definitions shared by the rollout poller and the failure diagnostics.
 *
 * Container state and classification are closed unions so that every
 * consumer can switch over them exhaustively.
 */

/**
 * Deployment under verification, parsed once from the command line
 */
export interface WorkloadRef {
  readonly namespace: string;
  readonly name: string;
}

/**
 * Bounded retry policy for readiness polling
 */
export interface RetryBudget {
  /** Number of readiness queries before the rollout is declared failed */
  readonly maxAttempts: number;
  /** Pause between two non-terminal attempts (milliseconds) */
  readonly intervalMs: number;
}

/**
 * Waiting reasons that are explained without reading logs
 */
export const KNOWN_WAITING_REASONS = [
  'ImagePullBackOff',
  'ErrImagePull',
  'CreateContainerConfigError',
] as const;

export type KnownWaitingReason = (typeof KNOWN_WAITING_REASONS)[number];

export type ImagePullReason = Extract<KnownWaitingReason, 'ImagePullBackOff' | 'ErrImagePull'>;

/**
 * Lifecycle phase of a single container
 */
export type ContainerState =
  | { kind: 'running'; startedAt?: string }
  | { kind: 'waiting'; reason: string; message: string }
  | { kind: 'terminated'; reason: string; message: string; exitCode: number }
  | { kind: 'unknown' };

export interface ContainerSnapshot {
  name: string;
  ready: boolean;
  state: ContainerState;
}

export interface PodSnapshot {
  name: string;
  namespace: string;
  phase: string;
  /** Names of the pod's imagePullSecrets references, in spec order */
  imagePullSecrets: string[];
  containers: ContainerSnapshot[];
}

export type Classification =
  | { kind: 'healthy-running' }
  | { kind: 'known-reason'; reason: KnownWaitingReason; message: string }
  | { kind: 'requires-log-scan' };

/**
 * Distinct error lines collected from a container log, in discovery order
 */
export interface EvidenceSet {
  readonly lines: readonly string[];
  /** True when collection stopped at the line limit */
  readonly capped: boolean;
  /** Set when the stream failed part-way through */
  readonly readError?: string;
}

export type SecretPresence = { status: 'found' } | { status: 'not-found'; cause: string };

/**
 * Explanation produced for one container of a diagnosed pod
 */
export type ContainerExplanation =
  | { kind: 'running'; container: string }
  | {
      kind: 'image-pull';
      container: string;
      state: ContainerState;
      reason: ImagePullReason;
      secretName: string;
      secret: SecretPresence;
    }
  | {
      kind: 'pull-secret-unconfigured';
      container: string;
      state: ContainerState;
      reason: ImagePullReason;
    }
  | {
      kind: 'config-reference';
      container: string;
      state: ContainerState;
      reference: 'secret' | 'configMap';
    }
  | {
      kind: 'log-evidence';
      container: string;
      state: ContainerState;
      evidence: EvidenceSet;
      streamError?: string;
    };

export interface PodDiagnosis {
  readonly podName: string;
  readonly namespace: string;
  readonly phase: string;
  readonly containers: readonly ContainerExplanation[];
}

export type Diagnosis = readonly PodDiagnosis[];

export type RolloutOutcome =
  | { status: 'success'; attempts: number }
  | { status: 'failure'; attempts: number; diagnosis: Diagnosis };
