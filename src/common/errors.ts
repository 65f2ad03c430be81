/**
 * Stages of the run that abort it when they fail.
 */
export type SetupStage = 'configuration' | 'authentication' | 'workload' | 'pods';

/**
 * Fatal error raised before or while polling; the CLI driver turns it into
 * a non-zero exit.
 */
export class RolloutSetupError extends Error {
  constructor(
    public readonly stage: SetupStage,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RolloutSetupError';
  }
}

/**
 * Raised for malformed command-line arguments.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
