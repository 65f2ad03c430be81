import { SecretReader } from '../common/interfaces/cluster.interface';
import { SecretPresence } from '../common/interfaces/rollout.interfaces';
import { describeError } from '../utils/utils';

/**
 * Checks whether an image pull secret can be read from the namespace.
 * A failed lookup is reported as not found, with its cause.
 */
export async function probeSecret(
  reader: SecretReader,
  secretName: string,
  namespace: string,
): Promise<SecretPresence> {
  try {
    const secret = await reader.getSecret(namespace, secretName);
    if (!secret) {
      return { status: 'not-found', cause: `secrets "${secretName}" not found` };
    }
    return { status: 'found' };
  } catch (error) {
    return { status: 'not-found', cause: describeError(error) };
  }
}
