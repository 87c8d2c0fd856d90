import { formatVersion, latestVersion, nextVersion } from "../core/version.js";
import type { GitOperations } from "../git/operations.js";
import type { IncrementKind } from "../types/release.js";
import { withErrorCode } from "../types/errors.js";
import { toFailure, type CommandFailure } from "./exit-codes.js";

export type NextVersionResult =
  | { ok: true; current: string | null; next: string }
  | CommandFailure;

/** Report the version a production release would cut, from local tags. */
export async function nextVersionCommand(
  opts: { kind: IncrementKind },
  deps: { git: Pick<GitOperations, "tagNames"> },
): Promise<NextVersionResult> {
  try {
    const tags = await withErrorCode("GIT_OPERATION_FAILED", "Failed to list tags", deps.git.tagNames());
    const current = latestVersion(tags);
    return {
      ok: true,
      current: current ? formatVersion(current) : null,
      next: formatVersion(nextVersion(tags, opts.kind)),
    };
  } catch (e) {
    return toFailure(e);
  }
}
