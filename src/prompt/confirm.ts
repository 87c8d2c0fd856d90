import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/** `dismissed`: the input closed or was interrupted before an answer. */
export type ConfirmAnswer = "yes" | "no" | "dismissed";

export type ConfirmIO = {
  input: Readable;
  output: Writable;
  /** Aborting dismisses a pending question. */
  signal?: AbortSignal;
};

export function parseAnswer(line: string): "yes" | "no" {
  const answer = line.trim().toLowerCase();
  return answer === "y" || answer === "yes" ? "yes" : "no";
}

/** Ask a yes/no question; anything but y/yes is a no. */
export function confirm(
  question: string,
  io: ConfirmIO = { input: process.stdin, output: process.stderr },
): Promise<ConfirmAnswer> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: io.input, output: io.output, terminal: false });
    let settled = false;
    const onAbort = (): void => finish("dismissed");

    const finish = (answer: ConfirmAnswer): void => {
      if (settled) return;
      settled = true;
      io.signal?.removeEventListener("abort", onAbort);
      rl.close();
      resolve(answer);
    };

    rl.once("line", (line) => finish(parseAnswer(line)));
    rl.once("SIGINT", () => finish("dismissed"));
    rl.once("close", () => finish("dismissed"));
    if (io.signal?.aborted) {
      finish("dismissed");
      return;
    }
    io.signal?.addEventListener("abort", onAbort, { once: true });

    io.output.write(`${question} [y/N] `);
  });
}
