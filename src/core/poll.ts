import { setTimeout as delay } from "node:timers/promises";
import { ReleaseError } from "../types/errors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

export type PollOpts = {
  intervalMs: number;
  /** Give up after this many reads; `waitFor` then resolves null. Unbounded when omitted. */
  maxAttempts?: number;
  /** Wait one interval before the first read too. */
  delayFirst?: boolean;
  /** Aborting throws DEPLOY_CANCELLED at the next wait or read. */
  signal?: AbortSignal;
  /** Epoch milliseconds after which waiting throws DEPLOY_TIMEOUT. */
  deadline?: number;
  /** Used in cancellation and timeout messages. */
  what?: string;
  sleep?: Sleep;
  now?: () => number;
};

function ensureActive(opts: PollOpts, now: () => number): void {
  const what = opts.what ?? "remote state";
  if (opts.signal?.aborted) {
    throw new ReleaseError("DEPLOY_CANCELLED", `Stopped waiting for ${what}: cancelled.`, {
      cause: opts.signal.reason,
    });
  }
  if (opts.deadline !== undefined && now() >= opts.deadline) {
    throw new ReleaseError("DEPLOY_TIMEOUT", `Stopped waiting for ${what}: deadline reached.`, {
      help: "Raise deploy.timeout_seconds, or set it to 0 to wait without a deadline.",
    });
  }
}

/**
 * Poll `read` once per interval until it yields a non-null value.
 *
 * Waits happen between reads (and before the first one with `delayFirst`).
 * Resolves null only when `maxAttempts` reads all came back null.
 */
export async function waitFor<T>(read: () => Promise<T | null>, opts: PollOpts): Promise<T | null> {
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? Date.now;

  for (let attempt = 0; opts.maxAttempts === undefined || attempt < opts.maxAttempts; attempt++) {
    if (attempt > 0 || opts.delayFirst) {
      ensureActive(opts, now);
      try {
        await sleep(opts.intervalMs, opts.signal);
      } catch (e) {
        if (opts.signal?.aborted) ensureActive(opts, now);
        throw e;
      }
    }
    ensureActive(opts, now);

    const value = await read();
    if (value !== null) return value;
  }

  return null;
}
