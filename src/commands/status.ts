import type { SyncSnapshot, SyncStatusEvaluator } from "../core/sync-status.js";
import { toFailure, type CommandFailure } from "./exit-codes.js";

export type StatusResult = ({ ok: true } & SyncSnapshot) | CommandFailure;

/**
 * Fetch and report how the current branch relates to its upstream.
 * Unlike `release`, no status is treated as a failure here.
 */
export async function status(deps: { evaluator: Pick<SyncStatusEvaluator, "evaluate"> }): Promise<StatusResult> {
  try {
    const snapshot = await deps.evaluator.evaluate();
    return { ok: true, ...snapshot };
  } catch (e) {
    return toFailure(e);
  }
}
