import {
  Classification,
  ContainerSnapshot,
  ImagePullReason,
  KNOWN_WAITING_REASONS,
  KnownWaitingReason,
} from '../common/interfaces/rollout.interfaces';

const HEALTHY_RUNNING: Classification = { kind: 'healthy-running' };
const REQUIRES_LOG_SCAN: Classification = { kind: 'requires-log-scan' };

export function isKnownWaitingReason(reason: string): reason is KnownWaitingReason {
  return KNOWN_WAITING_REASONS.some((known) => known === reason);
}

export function isImagePullReason(reason: KnownWaitingReason): reason is ImagePullReason {
  return reason === 'ImagePullBackOff' || reason === 'ErrImagePull';
}

/**
 * Maps a container snapshot to exactly one classification.
 *
 * A running container is healthy only when it is also ready. Waiting
 * containers with a known reason are explained directly; everything else
 * (other waiting reasons, terminated, unknown, running but not ready)
 * falls back to a log scan.
 */
export function classifyContainer(snapshot: ContainerSnapshot): Classification {
  const { state } = snapshot;

  switch (state.kind) {
    case 'running':
      return snapshot.ready ? HEALTHY_RUNNING : REQUIRES_LOG_SCAN;
    case 'waiting':
      if (isKnownWaitingReason(state.reason)) {
        return { kind: 'known-reason', reason: state.reason, message: state.message };
      }
      return REQUIRES_LOG_SCAN;
    case 'terminated':
    case 'unknown':
      return REQUIRES_LOG_SCAN;
    default: {
      const unhandled: never = state;
      throw new Error(`Unhandled container state: ${JSON.stringify(unhandled)}`);
    }
  }
}
