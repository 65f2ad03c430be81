import { EventEmitter } from 'events';
import chalk from 'chalk';

import { ClusterGateway, WorkloadDescriptor } from '../common/interfaces/cluster.interface';
import {
  PodSnapshot,
  RetryBudget,
  RolloutOutcome,
  WorkloadRef,
} from '../common/interfaces/rollout.interfaces';
import { RolloutSetupError } from '../common/errors';
import { ONE_SECOND_IN_MILLISECONDS } from '../common/time.constants';
import { banner, delay, describeError } from '../utils/utils';
import { DiagnosisRunner, PodDiagnostics } from './diagnosis';
import { renderDiagnosis } from './report';

export interface RolloutPollerOptions {
  budget: RetryBudget;
  /** Replaces the default diagnostics run on the final failed attempt */
  diagnostics?: DiagnosisRunner;
  /** Pause implementation, `delay` unless overridden */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Builds a frozen retry budget.
 *
 * @throws {Error} When `maxAttempts` is not a positive integer or
 * `intervalMs` is negative
 */
export function createRetryBudget(maxAttempts: number, intervalMs: number): RetryBudget {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
  }
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new Error(`intervalMs must be >= 0, got ${intervalMs}`);
  }
  return Object.freeze({ maxAttempts, intervalMs });
}

/**
 * Verifies that a Deployment becomes Available within a bounded number of
 * readiness queries.
 *
 * The Deployment and its pods are read once up front. Readiness is then
 * queried on every attempt; only after the last attempt fails are the pods
 * diagnosed. The pod set therefore reflects the state just before polling
 * began, not the state at the final query.
 *
 * Events:
 * - `attemptFailed` `{ attempt, remainingAttempts, nextAttemptInMs }`
 * - `rolloutSucceeded` `{ workload, attempts }`
 * - `rolloutFailed` `{ workload, attempts, diagnosis }`
 */
export class RolloutPoller extends EventEmitter {
  private readonly budget: RetryBudget;
  private readonly diagnostics: DiagnosisRunner;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly cluster: ClusterGateway,
    options: RolloutPollerOptions,
  ) {
    super();
    this.budget = options.budget;
    this.diagnostics = options.diagnostics ?? new PodDiagnostics(cluster);
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Polls readiness until success or until the budget is spent.
   *
   * @throws {RolloutSetupError} When the Deployment or its pods cannot be read
   */
  public async run(workload: WorkloadRef): Promise<RolloutOutcome> {
    const descriptor = await this.fetchWorkload(workload);
    const pods = await this.fetchPods(descriptor);

    let remainingAttempts = this.budget.maxAttempts;
    let attempt = 0;

    while (remainingAttempts > 0) {
      attempt++;

      if (await this.checkAvailability(workload)) {
        console.log(`\n\n\n${banner(`[INFO] Deployment Status [${workload.name}]:`, 42)}`);
        console.log(chalk.green('Deployment successful.\n'));
        this.emit('rolloutSucceeded', { workload, attempts: attempt });
        return { status: 'success', attempts: attempt };
      }

      if (remainingAttempts === 1) {
        console.log(chalk.red('\n[ERROR] Deployment is not up yet, checking pod status and logs\n'));
        const diagnosis = await this.diagnostics.diagnose(pods);
        console.log(renderDiagnosis(diagnosis));
        console.log(`\n\n\n${banner(`[ERROR] Deployment Status [${workload.name}]:`, 42)}`);
        console.log(chalk.red('Deployment failed.\n'));
        this.emit('rolloutFailed', { workload, attempts: attempt, diagnosis });
        return { status: 'failure', attempts: attempt, diagnosis };
      }

      remainingAttempts--;
      console.log(
        chalk.yellow(
          `[WARN] Deployment is not up yet, trying again in ${formatInterval(this.budget.intervalMs)}... (${remainingAttempts} attempts left)`,
        ),
      );
      this.emit('attemptFailed', {
        attempt,
        remainingAttempts,
        nextAttemptInMs: this.budget.intervalMs,
      });
      await this.sleep(this.budget.intervalMs);
    }

    // maxAttempts >= 1 guarantees the loop returns before reaching here
    throw new Error('Retry budget exhausted without a final attempt');
  }

  private async fetchWorkload(workload: WorkloadRef): Promise<WorkloadDescriptor> {
    let descriptor: WorkloadDescriptor | null;
    try {
      descriptor = await this.cluster.getWorkload(workload);
    } catch (error) {
      throw new RolloutSetupError(
        'workload',
        `Error getting deployment ${workload.namespace}/${workload.name}: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!descriptor) {
      throw new RolloutSetupError(
        'workload',
        `Deployment ${workload.name} not found in namespace ${workload.namespace}`,
      );
    }

    if (!descriptor.selector) {
      throw new RolloutSetupError('workload', `Deployment ${workload.name} has no pod selector`);
    }

    return descriptor;
  }

  private async fetchPods(descriptor: WorkloadDescriptor): Promise<PodSnapshot[]> {
    try {
      const pods = await this.cluster.listPods(descriptor.namespace, descriptor.selector);
      console.log(
        `📦 Found ${pods.length} pods matching ${descriptor.selector} (${descriptor.replicas} replicas desired)`,
      );
      return pods;
    } catch (error) {
      throw new RolloutSetupError(
        'pods',
        `Error listing pods for deployment ${descriptor.name}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  private async checkAvailability(workload: WorkloadRef): Promise<boolean> {
    try {
      return await this.cluster.isAvailable(workload);
    } catch (error) {
      throw new RolloutSetupError(
        'workload',
        `Error reading status of deployment ${workload.namespace}/${workload.name}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}

function formatInterval(ms: number): string {
  if (ms % ONE_SECOND_IN_MILLISECONDS === 0) {
    return `${ms / ONE_SECOND_IN_MILLISECONDS} secs`;
  }
  return `${ms} ms`;
}
