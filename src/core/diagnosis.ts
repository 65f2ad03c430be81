import { LogSource, LogStream, SecretReader } from '../common/interfaces/cluster.interface';
import {
  ContainerExplanation,
  ContainerSnapshot,
  Diagnosis,
  PodDiagnosis,
  PodSnapshot,
} from '../common/interfaces/rollout.interfaces';
import { describeError } from '../utils/utils';
import { classifyContainer, isImagePullReason } from './classifier';
import { scanLogLines } from './log-scanner';
import { probeSecret } from './secret-probe';

/**
 * Anything that can turn a pod set into a diagnosis; the poller depends on
 * this rather than on the concrete class.
 */
export interface DiagnosisRunner {
  diagnose(pods: readonly PodSnapshot[]): Promise<Diagnosis>;
}

/**
 * Explains why the containers of a failed rollout are not healthy.
 *
 * Pods and containers are inspected strictly one after another. Secret
 * lookups and log streams that fail become part of the explanation rather
 * than aborting the report.
 */
export class PodDiagnostics implements DiagnosisRunner {
  constructor(private readonly cluster: SecretReader & LogSource) {}

  /**
   * Diagnoses every container of every pod, in the order given.
   * ====================================================================
   * @param pods - Pod snapshots captured before polling started
   * @returns One entry per pod, each listing one explanation per container
   */
  public async diagnose(pods: readonly PodSnapshot[]): Promise<Diagnosis> {
    const diagnosis: PodDiagnosis[] = [];

    for (const pod of pods) {
      const containers: ContainerExplanation[] = [];
      for (const container of pod.containers) {
        containers.push(await this.explainContainer(pod, container));
      }

      diagnosis.push(
        Object.freeze({
          podName: pod.name,
          namespace: pod.namespace,
          phase: pod.phase,
          containers: Object.freeze(containers),
        }),
      );
    }

    return Object.freeze(diagnosis);
  }

  private async explainContainer(
    pod: PodSnapshot,
    container: ContainerSnapshot,
  ): Promise<ContainerExplanation> {
    const classification = classifyContainer(container);
    const { state } = container;

    switch (classification.kind) {
      case 'healthy-running':
        return { kind: 'running', container: container.name };

      case 'known-reason': {
        const { reason, message } = classification;

        if (isImagePullReason(reason)) {
          const secretName = pod.imagePullSecrets[0];
          if (!secretName) {
            return { kind: 'pull-secret-unconfigured', container: container.name, state, reason };
          }

          const secret = await probeSecret(this.cluster, secretName, pod.namespace);
          return { kind: 'image-pull', container: container.name, state, reason, secretName, secret };
        }

        return {
          kind: 'config-reference',
          container: container.name,
          state,
          reference: message.includes('secret') ? 'secret' : 'configMap',
        };
      }

      case 'requires-log-scan':
        return this.scanContainerLogs(pod, container);

      default: {
        const unhandled: never = classification;
        throw new Error(`Unhandled classification: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async scanContainerLogs(
    pod: PodSnapshot,
    container: ContainerSnapshot,
  ): Promise<ContainerExplanation> {
    const base = { kind: 'log-evidence' as const, container: container.name, state: container.state };

    let stream: LogStream;
    try {
      stream = await this.cluster.streamLogs(pod.namespace, pod.name, container.name);
    } catch (error) {
      return { ...base, evidence: { lines: [], capped: false }, streamError: describeError(error) };
    }

    try {
      return { ...base, evidence: await scanLogLines(stream.lines) };
    } finally {
      stream.close();
    }
  }
}
