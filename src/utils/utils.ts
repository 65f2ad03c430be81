import type { V1ContainerStatus, V1Pod } from '@kubernetes/client-node';

import chalk from 'chalk';
import {
  ContainerSnapshot,
  ContainerState,
  PodSnapshot,
} from '../common/interfaces/rollout.interfaces';

/**
 * Delays execution for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 * @returns Promise that resolves after delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * takes in a kubernetes container status and returns a snapshot of its state
 * ================================================================
 * @param container
 * @returns
 */
export function parseContainerState(container: V1ContainerStatus): ContainerSnapshot {
  const { name, ready, state } = container;

  return { name, ready: ready === true, state: toContainerState(state) };
}

function toContainerState(state: V1ContainerStatus['state']): ContainerState {
  if (!state) {
    return { kind: 'unknown' };
  }

  if (state.waiting) {
    return {
      kind: 'waiting',
      reason: state.waiting.reason || 'Unknown',
      message: state.waiting.message || '',
    };
  }

  if (state.terminated) {
    return {
      kind: 'terminated',
      reason: state.terminated.reason || 'Unknown',
      message: state.terminated.message || '',
      exitCode: state.terminated.exitCode,
    };
  }

  if (state.running) {
    const startedAt = state.running.startedAt;
    return startedAt ? { kind: 'running', startedAt: new Date(startedAt).toISOString() } : { kind: 'running' };
  }

  return { kind: 'unknown' };
}

/**
 * Captures the parts of a pod the diagnostics need. Only main containers
 * are included.
 */
export function parsePodSnapshot(pod: V1Pod, namespace: string): PodSnapshot {
  const imagePullSecrets = (pod.spec?.imagePullSecrets || [])
    .map((ref) => ref.name)
    .filter((name): name is string => Boolean(name));

  return {
    name: pod.metadata?.name || '<unnamed>',
    namespace: pod.metadata?.namespace || namespace,
    phase: pod.status?.phase || 'Unknown',
    imagePullSecrets,
    containers: (pod.status?.containerStatuses || []).map(parseContainerState),
  };
}

/**
 * Pretty-prints a container state for the diagnosis report.
 */
export function formatContainerState(state: ContainerState): string {
  return JSON.stringify(state, null, 2);
}

/**
 * Turns anything thrown by the Kubernetes client into a readable message,
 * preferring the API server's own `message` from the response body.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const apiMessage = extractApiMessage(error.body);
    if (apiMessage) return apiMessage;
  }

  if (error instanceof Error) return error.message;
  return String(error);
}

function extractApiMessage(body: unknown): string | undefined {
  let parsed: unknown = body;

  if (typeof body === 'string') {
    try {
      parsed = JSON.parse(body);
    } catch {
      return body.trim() || undefined;
    }
  }

  if (typeof parsed === 'object' && parsed !== null && 'message' in parsed) {
    return typeof parsed.message === 'string' ? parsed.message : undefined;
  }

  return undefined;
}

/**
 * Reads the HTTP status carried by a Kubernetes client error, if any.
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;

  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * Frames a heading between two dashed rules.
 */
export function banner(title: string, width = 49): string {
  const rule = '-'.repeat(width);
  return `${rule}\n${title}\n${rule}`;
}

export function printErrorAndExit(message: string, exitCode = 1): never {
  console.error(`\n ${chalk.red('❌ Error:')} ${message}`);
  process.exit(exitCode);
}
