import Joi from 'joi';

import { RetryBudget } from '../common/interfaces/rollout.interfaces';
import { RolloutSetupError } from '../common/errors';
import {
  LOG_IDLE_TIMEOUT_DEFAULT_MS,
  LOG_IDLE_TIMEOUT_MAX_MS,
  LOG_IDLE_TIMEOUT_MIN_MS,
  ROLLOUT_INTERVAL_DEFAULT_MS,
  ROLLOUT_INTERVAL_MAX_MS,
  ROLLOUT_INTERVAL_MIN_MS,
  ROLLOUT_MAX_ATTEMPTS_DEFAULT,
  ROLLOUT_MAX_ATTEMPTS_MAX,
  ROLLOUT_MAX_ATTEMPTS_MIN,
} from '../common/time.constants';
import { ClusterConnectionConfig } from '../core/kube';
import { createRetryBudget } from '../core/rollout-poller';

/**
 * Environment variable validation schema, with defaults and error messages
 * for every setting rollout-verify reads
 */
const environmentSchema = Joi.object({
  // ====================================
  // POLLING CONFIGURATION
  // ====================================
  ROLLOUT_MAX_ATTEMPTS: Joi.number()
    .integer()
    .min(ROLLOUT_MAX_ATTEMPTS_MIN)
    .max(ROLLOUT_MAX_ATTEMPTS_MAX)
    .default(ROLLOUT_MAX_ATTEMPTS_DEFAULT)
    .description('Number of readiness checks before the rollout is declared failed'),

  ROLLOUT_INTERVAL_MS: Joi.number()
    .integer()
    .min(ROLLOUT_INTERVAL_MIN_MS)
    .max(ROLLOUT_INTERVAL_MAX_MS)
    .default(ROLLOUT_INTERVAL_DEFAULT_MS)
    .description('Pause between readiness checks (milliseconds)'),

  // ====================================
  // DIAGNOSIS CONFIGURATION
  // ====================================
  LOG_TAIL_LINES: Joi.number()
    .integer()
    .min(0)
    .default(0)
    .description('Log lines requested per container when scanning for errors (0 for the whole log)'),

  LOG_IDLE_TIMEOUT_MS: Joi.number()
    .integer()
    .min(LOG_IDLE_TIMEOUT_MIN_MS)
    .max(LOG_IDLE_TIMEOUT_MAX_MS)
    .default(LOG_IDLE_TIMEOUT_DEFAULT_MS)
    .description('Silence on a container log stream before it is reported as a read error (milliseconds)'),

  // ====================================
  // CLUSTER CONFIGURATION
  // ====================================
  KUBECONFIG_PATH: Joi.string()
    .allow('')
    .default('')
    .description('Custom kubeconfig path (empty for default discovery)'),

  KUBE_CONTEXT: Joi.string()
    .allow('')
    .pattern(/^\S*$/)
    .default('')
    .messages({
      'string.pattern.base': 'KUBE_CONTEXT must not contain whitespace',
    })
    .description('Kubeconfig context to use (empty for the current context)'),
}).required();

/**
 * Validated and typed configuration object
 */
interface ValidatedConfig {
  polling: {
    maxAttempts: number;
    intervalMs: number;
  };
  diagnosis: {
    logTailLines: number;
    logIdleTimeoutMs: number;
  };
  cluster: {
    kubeconfigPath?: string;
    context?: string;
  };
}

/**
 * Raw values after Joi conversion and defaults
 */
interface EnvironmentValues {
  ROLLOUT_MAX_ATTEMPTS: number;
  ROLLOUT_INTERVAL_MS: number;
  LOG_TAIL_LINES: number;
  LOG_IDLE_TIMEOUT_MS: number;
  KUBECONFIG_PATH: string;
  KUBE_CONTEXT: string;
}

type ValidationResult =
  | { isValid: true; config: ValidatedConfig }
  | { isValid: false; errors: string[] };

/**
 * VerifierConfig class with Joi validation
 */
export class VerifierConfig {
  private constructor(private readonly validatedConfig: ValidatedConfig) {}

  /**
   * Validates environment variables and creates a VerifierConfig instance
   *
   * @throws {RolloutSetupError} When validation fails, listing every invalid variable
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): VerifierConfig {
    const result = this.validateEnvironment(env);

    if (!result.isValid) {
      const errorMessage = [
        'Environment variable validation failed:',
        '',
        ...result.errors.map((error) => `  • ${error}`),
        '',
        '💡 Check your .env file and ensure all variables are properly set.',
      ].join('\n');

      throw new RolloutSetupError('configuration', errorMessage);
    }

    return new VerifierConfig(result.config);
  }

  private static validateEnvironment(env: NodeJS.ProcessEnv): ValidationResult {
    const { error, value } = environmentSchema.validate(env, {
      allowUnknown: true,
      stripUnknown: false,
      abortEarly: false,
      convert: true,
    });

    if (error) {
      return {
        isValid: false,
        errors: error.details.map((detail) => `${detail.path.join('.')}: ${detail.message}`),
      };
    }

    const values: EnvironmentValues = value;

    return {
      isValid: true,
      config: {
        polling: {
          maxAttempts: values.ROLLOUT_MAX_ATTEMPTS,
          intervalMs: values.ROLLOUT_INTERVAL_MS,
        },
        diagnosis: {
          logTailLines: values.LOG_TAIL_LINES,
          logIdleTimeoutMs: values.LOG_IDLE_TIMEOUT_MS,
        },
        cluster: {
          kubeconfigPath: values.KUBECONFIG_PATH || undefined,
          context: values.KUBE_CONTEXT || undefined,
        },
      },
    };
  }

  /**
   * Get the retry budget for readiness polling
   */
  getRetryBudget(): RetryBudget {
    const { maxAttempts, intervalMs } = this.validatedConfig.polling;
    return createRetryBudget(maxAttempts, intervalMs);
  }

  /**
   * Get cluster connection settings, including the log tail used by diagnostics
   */
  getClusterConfig(): ClusterConnectionConfig {
    return {
      ...this.validatedConfig.cluster,
      logTailLines: this.validatedConfig.diagnosis.logTailLines,
      logIdleTimeoutMs: this.validatedConfig.diagnosis.logIdleTimeoutMs,
    };
  }
}
