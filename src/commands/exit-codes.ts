import { isReleaseError, errMsg, type ErrorCategory, type ErrorCode } from "../types/errors.js";

/**
 * CLI exit codes, one per error category.
 */
export const EXIT = {
  SUCCESS: 0,
  RELEASE_FAILED: 1,
  PRECONDITION_FAILED: 2,
  INVALID_ARGS: 3,
  DEPLOY_FAILED: 4,
  CANCELLED: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const EXIT_BY_CATEGORY: Record<ErrorCategory, ExitCode> = {
  precondition: EXIT.PRECONDITION_FAILED,
  config: EXIT.INVALID_ARGS,
  remote: EXIT.RELEASE_FAILED,
  timeout: EXIT.RELEASE_FAILED,
  cancelled: EXIT.CANCELLED,
  user: EXIT.CANCELLED,
};

export function exitCodeFor(category: ErrorCategory): ExitCode {
  return EXIT_BY_CATEGORY[category];
}

export type CommandFailure = {
  ok: false;
  exitCode: ExitCode;
  code: ErrorCode | "UNEXPECTED";
  message: string;
  help?: string;
};

/** Turn anything a command threw into the failure it reports. */
export function toFailure(e: unknown): CommandFailure {
  if (isReleaseError(e)) {
    return { ok: false, exitCode: exitCodeFor(e.category), code: e.code, message: e.message, help: e.help };
  }
  return { ok: false, exitCode: EXIT.RELEASE_FAILED, code: "UNEXPECTED", message: errMsg(e) };
}
