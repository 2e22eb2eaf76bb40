/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  /** Archive published but its fingerprint was not recorded. */
  LEDGER_INCONSISTENT: 2,
  INVALID_ARGS: 3,
  /** `ledger check` found no record for the hash. */
  NOT_RECORDED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
