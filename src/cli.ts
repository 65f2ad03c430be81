import Joi from 'joi';
import chalk from 'chalk';

import { ClusterGateway } from './common/interfaces/cluster.interface';
import { WorkloadRef } from './common/interfaces/rollout.interfaces';
import { RolloutSetupError, UsageError } from './common/errors';
import { VerifierConfig } from './config/verifier-config';
import { ClusterConnectionConfig, connectToCluster } from './core/kube';
import { RolloutPoller } from './core/rollout-poller';

export const USAGE = 'Usage: rollout-verify <namespace> <deployment>';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const argumentsSchema = Joi.array()
  .items(Joi.string().trim().min(1))
  .length(2)
  .messages({
    'array.length': 'expected exactly two arguments, a namespace and a deployment name',
    'string.empty': 'arguments must not be empty',
  });

/**
 * Parses `<namespace> <deployment>` from the positional arguments.
 *
 * @throws {UsageError} Unless exactly two non-empty arguments are given
 */
export function parseCliArguments(args: readonly string[]): WorkloadRef {
  const { error } = argumentsSchema.validate(args);
  if (error) {
    throw new UsageError(`${error.details.map((detail) => detail.message).join('; ')}\n${USAGE}`);
  }

  const [namespace, name] = args.map((arg) => arg.trim());
  return Object.freeze({ namespace, name });
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  connect?: (config: ClusterConnectionConfig) => ClusterGateway;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs one verification and resolves the process exit status. Fatal setup
 * errors are reported here; anything else is left to the caller.
 */
export async function runCli(args: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const { env = process.env, connect = connectToCluster, sleep } = dependencies;

  try {
    const workload = parseCliArguments(args);
    const config = VerifierConfig.fromEnvironment(env);
    const budget = config.getRetryBudget();

    console.log(`🚀 Verifying rollout of deployment ${chalk.cyan(workload.name)} in namespace ${chalk.cyan(workload.namespace)}`);
    console.log(`⏱️  Up to ${budget.maxAttempts} checks, ${budget.intervalMs} ms apart`);

    const cluster = connect(config.getClusterConfig());
    const poller = new RolloutPoller(cluster, { budget, sleep });
    const outcome = await poller.run(workload);

    return outcome.status === 'success' ? EXIT_SUCCESS : EXIT_FAILURE;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`\n ${chalk.red('❌ Error:')} ${error.message}`);
      return EXIT_USAGE;
    }
    if (error instanceof RolloutSetupError) {
      console.error(`\n ${chalk.red(`❌ Error [${error.stage}]:`)} ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
