import { ContainerExplanation, Diagnosis, PodDiagnosis } from '../common/interfaces/rollout.interfaces';
import { banner, formatContainerState } from '../utils/utils';
import { EVIDENCE_LINE_LIMIT } from './log-scanner';

export const SECRET_REFERENCE_HINT =
  'Check if the env block in deployment yaml has correct "secretKeyRef", also see the "SecretStore" if the secret is from vault';

export const CONFIG_MAP_REFERENCE_HINT =
  'Check if the env block in deployment yaml has correct "configMapKeyRef" to the volume mount';

/**
 * Renders a diagnosis as plain text, one banner-delimited section per pod.
 */
export function renderDiagnosis(diagnosis: Diagnosis): string {
  if (diagnosis.length === 0) {
    return 'No pods matched the deployment selector.';
  }

  return diagnosis.map(renderPodDiagnosis).join('\n\n');
}

export function renderPodDiagnosis(pod: PodDiagnosis): string {
  const lines = [banner(`Pod status [${pod.podName}]:`), `Phase: ${pod.phase}`];

  if (pod.containers.length === 0) {
    lines.push('No container statuses reported yet.');
  }

  for (const explanation of pod.containers) {
    lines.push('', ...explainContainer(explanation, pod));
  }

  return lines.join('\n');
}

/**
 * Text lines for a single container explanation
 */
export function explainContainer(explanation: ContainerExplanation, pod: PodDiagnosis): string[] {
  if (explanation.kind === 'running') {
    return [`Container ${explanation.container} is in running state`];
  }

  const header = [`Container[${explanation.container}]:`, formatContainerState(explanation.state), ''];

  switch (explanation.kind) {
    case 'image-pull': {
      const { reason, secretName, secret } = explanation;
      if (secret.status === 'found') {
        return [
          ...header,
          `[NOTE] Reason for ${reason}: Secret ${secretName} is present in namespace ${pod.namespace}, this error could be due to expired or wrong values in the secret`,
        ];
      }
      return [
        ...header,
        `[NOTE] Reason for ${reason}: Error getting secret ${secretName}: ${secret.cause} in namespace ${pod.namespace}, please add it`,
      ];
    }

    case 'pull-secret-unconfigured':
      return [
        ...header,
        `[NOTE] Reason for ${explanation.reason}: configuration error, pod ${pod.podName} has no imagePullSecrets configured; add a pull secret reference to the pod spec`,
      ];

    case 'config-reference': {
      const hint = explanation.reference === 'secret' ? SECRET_REFERENCE_HINT : CONFIG_MAP_REFERENCE_HINT;
      return [...header, `[NOTE] Reason for CreateContainerConfigError: ${hint}`];
    }

    case 'log-evidence': {
      const { evidence, streamError } = explanation;
      const lines = [...header];

      if (streamError) {
        lines.push(`Error getting logs: ${streamError}`);
      }

      lines.push('[NOTE] Reason for Error:');
      if (evidence.lines.length === 0) {
        lines.push('No qualifying error lines found in container logs');
      } else {
        lines.push(...evidence.lines);
      }

      if (evidence.capped) {
        lines.push(`(stopped after ${EVIDENCE_LINE_LIMIT} distinct error lines)`);
      }
      if (evidence.readError) {
        lines.push(`Error reading logs: ${evidence.readError}`);
      }
      return lines;
    }

    default: {
      const unhandled: never = explanation;
      throw new Error(`Unhandled explanation: ${JSON.stringify(unhandled)}`);
    }
  }
}
