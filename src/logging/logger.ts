import { redactSensitiveInfo, redactValue, sanitizeLogMessage } from "./redact.js";

export type OutputFormat = "human" | "jsonl";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

/**
 * Injectable dependencies for createLogger.
 * Defaults to real streams; tests can override.
 */
export interface LoggerDeps {
  writeStdout: (data: string) => void;
  writeStderr: (data: string) => void;
}

export type LoggerOpts = {
  format: OutputFormat;
  verbose?: boolean;
  /** Exact values to mask in every line (e.g. the GitLab token). */
  secrets?: string[];
};

const defaultDeps: LoggerDeps = {
  writeStdout: (data: string) => {
    process.stdout.write(data);
  },
  writeStderr: (data: string) => {
    process.stderr.write(data);
  },
};

/**
 * Create a logger for CLI progress output.
 *
 * - human: `[LEVEL] message {context}` on stderr, stdout stays free for results
 * - jsonl: one `{ level, message, ...context }` object per line on stdout
 * - debug lines only when verbose
 */
export function createLogger(opts: LoggerOpts, deps: Partial<LoggerDeps> = {}): Logger {
  const { writeStdout, writeStderr } = { ...defaultDeps, ...deps };
  const secrets = (opts.secrets ?? []).filter((s) => s.length > 0);

  function mask(s: string): string {
    let out = s;
    for (const secret of secrets) out = redactValue(out, secret);
    return out;
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (level === "debug" && !opts.verbose) return;

    if (opts.format === "jsonl") {
      const record = { level, message: redactSensitiveInfo(message), ...context };
      writeStdout(mask(JSON.stringify(record)) + "\n");
      return;
    }

    let line = `[${level.toUpperCase()}] ${sanitizeLogMessage(redactSensitiveInfo(message))}`;
    if (context !== undefined && Object.keys(context).length > 0) {
      line += ` ${JSON.stringify(context)}`;
    }
    writeStderr(mask(line) + "\n");
  }

  return {
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    debug: (message, context) => log("debug", message, context),
  };
}

/** A logger that drops everything; the default for library callers. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
