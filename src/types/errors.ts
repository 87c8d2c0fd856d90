/** Error taxonomy: every fatal condition carries a code and a category. */
export type ErrorCategory = "precondition" | "config" | "remote" | "timeout" | "cancelled" | "user";

const CATEGORY_BY_CODE = {
  GIT_NOT_FOUND: "precondition",
  GITFLOW_NOT_FOUND: "precondition",
  GITFLOW_WRONG_VERSION: "precondition",
  GITFLOW_NOT_INITIALIZED: "precondition",
  NOT_GIT_REPOSITORY: "precondition",
  REPOSITORY_DIRTY: "precondition",
  WRONG_BRANCH: "precondition",
  UPSTREAM_NOT_CONFIGURED: "precondition",
  REPOSITORY_UP_TO_DATE: "precondition",
  REPOSITORY_NEED_PULL: "precondition",
  REPOSITORY_DIVERGED: "precondition",
  PROJECT_UNKNOWN: "precondition",
  CONFIG_INVALID: "config",
  GIT_OPERATION_FAILED: "remote",
  GITLAB_REQUEST_FAILED: "remote",
  COMMAND_FAILED: "remote",
  PIPELINE_NOT_FOUND: "timeout",
  DEPLOY_TIMEOUT: "timeout",
  DEPLOY_CANCELLED: "cancelled",
  RELEASE_CANCELLED: "cancelled",
  USER_DECLINED: "user",
  USER_DISMISSED: "user",
} as const satisfies Record<string, ErrorCategory>;

export type ErrorCode = keyof typeof CATEGORY_BY_CODE;

export function categoryOf(code: ErrorCode): ErrorCategory {
  return CATEGORY_BY_CODE[code];
}

export class ReleaseError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly help?: string;

  constructor(code: ErrorCode, message: string, opts?: { help?: string; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ReleaseError";
    this.code = code;
    this.category = categoryOf(code);
    this.help = opts?.help;
  }
}

export function isReleaseError(e: unknown, code?: ErrorCode): e is ReleaseError {
  return e instanceof ReleaseError && (code === undefined || e.code === code);
}

/** Extract a human-readable message from an unknown thrown value. */
export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a failing promise into a ReleaseError of the given code,
 * leaving ReleaseErrors untouched.
 */
export async function withErrorCode<T>(code: ErrorCode, message: string, work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (e) {
    if (e instanceof ReleaseError) throw e;
    throw new ReleaseError(code, `${message}: ${errMsg(e)}`, { cause: e });
  }
}
