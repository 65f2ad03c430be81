/**
 * Time constants in milliseconds for consistent usage across the application
 *
 * Validation rules and defaults reference these instead of hardcoded numbers.
 */

export const ONE_SECOND_IN_MILLISECONDS = 1000;
export const ONE_MINUTE_IN_MILLISECONDS = 60 * ONE_SECOND_IN_MILLISECONDS;

export const TEN_SECONDS_IN_MILLISECONDS = 10 * ONE_SECOND_IN_MILLISECONDS;
export const THIRTY_SECONDS_IN_MILLISECONDS = 30 * ONE_SECOND_IN_MILLISECONDS;
export const TEN_MINUTES_IN_MILLISECONDS = 10 * ONE_MINUTE_IN_MILLISECONDS;

// Pause between readiness queries
export const ROLLOUT_INTERVAL_MIN_MS = 0;
export const ROLLOUT_INTERVAL_MAX_MS = TEN_MINUTES_IN_MILLISECONDS;
export const ROLLOUT_INTERVAL_DEFAULT_MS = TEN_SECONDS_IN_MILLISECONDS;

export const ROLLOUT_MAX_ATTEMPTS_MIN = 1;
export const ROLLOUT_MAX_ATTEMPTS_MAX = 100;
export const ROLLOUT_MAX_ATTEMPTS_DEFAULT = 6;

// Silence on an open log stream before it is treated as broken
export const LOG_IDLE_TIMEOUT_MIN_MS = ONE_SECOND_IN_MILLISECONDS;
export const LOG_IDLE_TIMEOUT_MAX_MS = TEN_MINUTES_IN_MILLISECONDS;
export const LOG_IDLE_TIMEOUT_DEFAULT_MS = THIRTY_SECONDS_IN_MILLISECONDS;
