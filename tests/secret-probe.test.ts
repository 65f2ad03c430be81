import { SecretReader } from '../src/common/interfaces/cluster.interface';
import { probeSecret } from '../src/core/secret-probe';

describe('probeSecret', () => {
  const getSecret = jest.fn();
  const reader: SecretReader = { getSecret };

  it('should report an existing secret as found', async () => {
    getSecret.mockResolvedValue({ name: 'regcred' });

    await expect(probeSecret(reader, 'regcred', 'shop')).resolves.toEqual({ status: 'found' });
    expect(getSecret).toHaveBeenCalledTimes(1);
    expect(getSecret).toHaveBeenCalledWith('shop', 'regcred');
  });

  it('should report a missing secret as not found', async () => {
    getSecret.mockResolvedValue(null);

    await expect(probeSecret(reader, 'regcred', 'shop')).resolves.toEqual({
      status: 'not-found',
      cause: 'secrets "regcred" not found',
    });
  });

  it('should turn a failed lookup into a not found result with the API message', async () => {
    getSecret.mockRejectedValue({
      code: 403,
      body: JSON.stringify({ kind: 'Status', message: 'secrets "regcred" is forbidden' }),
    });

    await expect(probeSecret(reader, 'regcred', 'shop')).resolves.toEqual({
      status: 'not-found',
      cause: 'secrets "regcred" is forbidden',
    });
  });

  it('should use the error message when there is no response body', async () => {
    getSecret.mockRejectedValue(new Error('socket hang up'));

    await expect(probeSecret(reader, 'regcred', 'shop')).resolves.toEqual({
      status: 'not-found',
      cause: 'socket hang up',
    });
  });
});
