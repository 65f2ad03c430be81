import * as k8s from '@kubernetes/client-node';
import chalk from 'chalk';
import { createInterface } from 'readline';
import { PassThrough } from 'stream';

import {
  ClusterGateway,
  LogStream,
  SecretDescriptor,
  WorkloadCondition,
  WorkloadDescriptor,
} from '../common/interfaces/cluster.interface';
import { PodSnapshot, WorkloadRef } from '../common/interfaces/rollout.interfaces';
import { RolloutSetupError } from '../common/errors';
import { LOG_IDLE_TIMEOUT_DEFAULT_MS } from '../common/time.constants';
import { describeError, isNotFoundError, parsePodSnapshot } from '../utils/utils';

export interface ClusterConnectionConfig {
  /** Explicit kubeconfig file; default discovery when absent */
  kubeconfigPath?: string;
  /** Context to activate instead of the kubeconfig's current one */
  context?: string;
  /** Lines requested per log stream, whole log when 0 or absent */
  logTailLines?: number;
  /** Silence after which an open log stream fails with a read error */
  logIdleTimeoutMs?: number;
}

/**
 * The slices of the generated API clients the gateway calls
 */
export interface KubeApiClients {
  coreV1: Pick<k8s.CoreV1Api, 'listNamespacedPod' | 'readNamespacedSecret'>;
  appsV1: Pick<k8s.AppsV1Api, 'readNamespacedDeployment'>;
  logs: Pick<k8s.Log, 'log'>;
}

/**
 * Loads credentials and builds a gateway bound to the active cluster.
 *
 * @throws {RolloutSetupError} When the kubeconfig cannot be loaded or names
 * no usable cluster
 */
export function connectToCluster(config: ClusterConnectionConfig = {}): KubeClusterGateway {
  const kc = new k8s.KubeConfig();

  try {
    if (config.kubeconfigPath) {
      kc.loadFromFile(config.kubeconfigPath);
    } else {
      kc.loadFromDefault();
    }

    if (config.context) {
      kc.setCurrentContext(config.context);
    }
  } catch (error) {
    throw new RolloutSetupError(
      'authentication',
      `Failed to load Kubernetes configuration: ${describeError(error)}`,
      { cause: error },
    );
  }

  const cluster = kc.getCurrentCluster();
  if (!cluster) {
    throw new RolloutSetupError(
      'authentication',
      `No cluster found for context "${kc.getCurrentContext()}" in the Kubernetes configuration`,
    );
  }

  console.log(`📄 Using kubeconfig: ${config.kubeconfigPath || 'default discovery'}`);
  console.log(`🔧 Active cluster: ${chalk.cyan(kc.getCurrentContext())}`);
  console.log(`🌐 API Server: ${cluster.server}`);

  return new KubeClusterGateway(
    {
      coreV1: kc.makeApiClient(k8s.CoreV1Api),
      appsV1: kc.makeApiClient(k8s.AppsV1Api),
      logs: new k8s.Log(kc),
    },
    { logTailLines: config.logTailLines, logIdleTimeoutMs: config.logIdleTimeoutMs },
  );
}

/**
 * `ClusterGateway` backed by the Kubernetes API.
 */
export class KubeClusterGateway implements ClusterGateway {
  constructor(
    private readonly clients: KubeApiClients,
    private readonly options: Pick<ClusterConnectionConfig, 'logTailLines' | 'logIdleTimeoutMs'> = {},
  ) {}

  async getWorkload(workload: WorkloadRef): Promise<WorkloadDescriptor | null> {
    try {
      const deployment = await this.clients.appsV1.readNamespacedDeployment({
        name: workload.name,
        namespace: workload.namespace,
      });
      return toWorkloadDescriptor(deployment, workload);
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  async isAvailable(workload: WorkloadRef): Promise<boolean> {
    const descriptor = await this.getWorkload(workload);
    if (!descriptor) {
      throw new Error(`deployment ${workload.name} no longer exists in namespace ${workload.namespace}`);
    }
    return isDeploymentAvailable(descriptor.conditions);
  }

  async listPods(namespace: string, selector: string): Promise<PodSnapshot[]> {
    const podList = await this.clients.coreV1.listNamespacedPod({ namespace, labelSelector: selector });
    return podList.items.map((pod) => parsePodSnapshot(pod, namespace));
  }

  async getSecret(namespace: string, name: string): Promise<SecretDescriptor | null> {
    try {
      const secret = await this.clients.coreV1.readNamespacedSecret({ name, namespace });
      return { name: secret.metadata?.name || name };
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  /**
   * Opens a container's log as a line iterator.
   *
   * `Log.log` pipes the response body into `output` without forwarding body
   * errors. Silence longer than `logIdleTimeoutMs` destroys `output` with an
   * error instead, which the line iterator rethrows.
   */
  async streamLogs(namespace: string, podName: string, containerName: string): Promise<LogStream> {
    const output = new PassThrough();
    const tailLines = this.options.logTailLines;
    const idleTimeoutMs = this.options.logIdleTimeoutMs ?? LOG_IDLE_TIMEOUT_DEFAULT_MS;
    const logOptions: k8s.LogOptions = {
      follow: false,
      timestamps: false,
      ...(tailLines && tailLines > 0 ? { tailLines } : {}),
    };

    let request: AbortController;
    try {
      request = await this.clients.logs.log(namespace, podName, containerName, output, logOptions);
    } catch (error) {
      output.destroy();
      throw error;
    }

    let idleTimer: NodeJS.Timeout | undefined;
    const stopIdleTimer = () => clearTimeout(idleTimer);
    const restartIdleTimer = () => {
      stopIdleTimer();
      idleTimer = setTimeout(() => {
        request.abort();
        output.destroy(
          new Error(`no log output from container ${containerName} in pod ${podName} for ${idleTimeoutMs} ms`),
        );
      }, idleTimeoutMs);
    };

    const reader = createInterface({ input: output, crlfDelay: Infinity });
    output.on('data', restartIdleTimer);
    output.once('end', stopIdleTimer);
    output.once('close', stopIdleTimer);
    restartIdleTimer();

    return {
      lines: reader,
      close: () => {
        stopIdleTimer();
        reader.close();
        request.abort();
        output.destroy();
      },
    };
  }
}

/**
 * A Deployment is ready once any `Available` condition reports `True`.
 */
export function isDeploymentAvailable(conditions: readonly WorkloadCondition[]): boolean {
  return conditions.some((condition) => condition.type === 'Available' && condition.status === 'True');
}

export function toWorkloadDescriptor(deployment: k8s.V1Deployment, workload: WorkloadRef): WorkloadDescriptor {
  const conditions = (deployment.status?.conditions || []).map(
    (condition): WorkloadCondition => ({
      type: condition.type,
      status: condition.status,
      reason: condition.reason,
      message: condition.message,
    }),
  );

  return {
    namespace: deployment.metadata?.namespace || workload.namespace,
    name: deployment.metadata?.name || workload.name,
    selector: formatLabelSelector(deployment.spec?.selector),
    replicas: deployment.spec?.replicas ?? 1,
    conditions,
  };
}

/**
 * Renders a label selector in the API's string form, requirements sorted
 * by key: `app=web,!legacy,tier in (api,web)`.
 */
export function formatLabelSelector(selector?: k8s.V1LabelSelector): string {
  const requirements: Array<{ key: string; text: string }> = [];

  for (const [key, value] of Object.entries(selector?.matchLabels || {})) {
    requirements.push({ key, text: `${key}=${value}` });
  }

  for (const expression of selector?.matchExpressions || []) {
    requirements.push({ key: expression.key, text: formatRequirement(expression) });
  }

  return requirements
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map((requirement) => requirement.text)
    .join(',');
}

function formatRequirement(requirement: k8s.V1LabelSelectorRequirement): string {
  const { key, operator } = requirement;
  const values = [...(requirement.values || [])].sort();

  switch (operator) {
    case 'In':
      return `${key} in (${values.join(',')})`;
    case 'NotIn':
      return `${key} notin (${values.join(',')})`;
    case 'Exists':
      return key;
    case 'DoesNotExist':
      return `!${key}`;
    default:
      throw new Error(`unsupported label selector operator "${operator}" for key ${key}`);
  }
}
