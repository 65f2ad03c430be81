import * as timeConstants from '../src/common/time.constants';
import { RolloutSetupError } from '../src/common/errors';
import { VerifierConfig } from '../src/config/verifier-config';

describe('Configuration Integration with Time Constants', () => {
  it('should use time constants as default values', () => {
    const config = VerifierConfig.fromEnvironment({});

    expect(config.getRetryBudget()).toEqual({
      maxAttempts: timeConstants.ROLLOUT_MAX_ATTEMPTS_DEFAULT,
      intervalMs: timeConstants.ROLLOUT_INTERVAL_DEFAULT_MS,
    });
    expect(config.getClusterConfig()).toEqual({
      kubeconfigPath: undefined,
      context: undefined,
      logTailLines: 0,
      logIdleTimeoutMs: timeConstants.LOG_IDLE_TIMEOUT_DEFAULT_MS,
    });
  });

  it('should convert and accept values at the limits', () => {
    const config = VerifierConfig.fromEnvironment({
      ROLLOUT_MAX_ATTEMPTS: timeConstants.ROLLOUT_MAX_ATTEMPTS_MAX.toString(),
      ROLLOUT_INTERVAL_MS: timeConstants.ROLLOUT_INTERVAL_MIN_MS.toString(),
    });

    expect(config.getRetryBudget()).toEqual({ maxAttempts: 100, intervalMs: 0 });
  });

  it('should pass cluster settings through', () => {
    const config = VerifierConfig.fromEnvironment({
      KUBECONFIG_PATH: '/etc/kube/config',
      KUBE_CONTEXT: 'staging',
      LOG_TAIL_LINES: '500',
      LOG_IDLE_TIMEOUT_MS: '60000',
    });

    expect(config.getClusterConfig()).toEqual({
      kubeconfigPath: '/etc/kube/config',
      context: 'staging',
      logTailLines: 500,
      logIdleTimeoutMs: 60000,
    });
  });

  it('should ignore unrelated variables', () => {
    expect(() => VerifierConfig.fromEnvironment({ PATH: '/usr/bin', HOME: '/root' })).not.toThrow();
  });

  it('should reject values outside the limits', () => {
    expect(() =>
      VerifierConfig.fromEnvironment({
        ROLLOUT_MAX_ATTEMPTS: (timeConstants.ROLLOUT_MAX_ATTEMPTS_MIN - 1).toString(),
      }),
    ).toThrow('ROLLOUT_MAX_ATTEMPTS: "ROLLOUT_MAX_ATTEMPTS" must be greater than or equal to 1');

    expect(() =>
      VerifierConfig.fromEnvironment({
        ROLLOUT_INTERVAL_MS: (timeConstants.ROLLOUT_INTERVAL_MAX_MS + 1).toString(),
      }),
    ).toThrow('ROLLOUT_INTERVAL_MS: "ROLLOUT_INTERVAL_MS" must be less than or equal to 600000');

    expect(() =>
      VerifierConfig.fromEnvironment({
        LOG_IDLE_TIMEOUT_MS: (timeConstants.LOG_IDLE_TIMEOUT_MIN_MS - 1).toString(),
      }),
    ).toThrow('LOG_IDLE_TIMEOUT_MS: "LOG_IDLE_TIMEOUT_MS" must be greater than or equal to 1000');
  });

  it('should list every invalid variable in one configuration error', () => {
    let caught: unknown;
    try {
      VerifierConfig.fromEnvironment({
        ROLLOUT_MAX_ATTEMPTS: 'many',
        LOG_TAIL_LINES: '-5',
        KUBE_CONTEXT: 'my context',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RolloutSetupError);
    expect(caught).toMatchObject({ stage: 'configuration' });
    expect(caught instanceof Error ? caught.message.split('\n') : []).toEqual([
      'Environment variable validation failed:',
      '',
      '  • ROLLOUT_MAX_ATTEMPTS: "ROLLOUT_MAX_ATTEMPTS" must be a number',
      '  • LOG_TAIL_LINES: "LOG_TAIL_LINES" must be greater than or equal to 0',
      '  • KUBE_CONTEXT: KUBE_CONTEXT must not contain whitespace',
      '',
      '💡 Check your .env file and ensure all variables are properly set.',
    ]);
  });
});
