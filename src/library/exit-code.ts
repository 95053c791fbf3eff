import {CommanderError} from 'commander';

/**
 * Process exit codes of a reconciliation run. Schedulers and wrapper
 * scripts depend on these values, do not renumber.
 */
export const ExitCode = {
  /**
   * At least one record updated, or would have been in a dry run.
   */
  success: 0,
  noRecords: 1,
  tokenMissing: 2,
  networkError: 3,
  zoneNotFound: 4,
  parametersMissing: 6,
  upToDate: 7,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Invalid invocation (unknown option, missing option value) or `--help`,
 * i.e. `EX_USAGE`. Not a run outcome, hence outside of `ExitCode`.
 */
export const USAGE_EXIT_CODE = 64;

/**
 * Failures nothing anticipates (e.g. a response of an unexpected shape),
 * i.e. `EX_SOFTWARE`.
 */
export const UNEXPECTED_FAILURE_EXIT_CODE = 70;

export function getFailureExitCode(error: unknown): number {
  return error instanceof CommanderError
    ? USAGE_EXIT_CODE
    : UNEXPECTED_FAILURE_EXIT_CODE;
}
