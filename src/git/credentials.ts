/**
 * Credentials for network git commands (fetch/push).
 *
 * Git reads SSH keys from the agent on its own; the provider only decides which
 * environment the git subprocess sees.
 */
export interface CredentialProvider {
  gitEnv(): Record<string, string>;
}

const PASSTHROUGH = ["PATH", "HOME", "USER", "TERM", "SSH_AUTH_SOCK", "SYSTEMROOT"] as const;

/** Copy the defined variables of `env` into a plain string record. */
export function definedEnv(env: NodeJS.ProcessEnv, keys?: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (keys && !keys.includes(key)) continue;
    out[key] = value;
  }
  return out;
}

/**
 * SSH-agent backed credentials: a minimal environment in which git may not
 * prompt, so keys can only come from the running agent.
 */
export class SshAgentCredentials implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /** True when an agent socket is advertised. */
  hasAgent(): boolean {
    return Boolean(this.env.SSH_AUTH_SOCK);
  }

  gitEnv(): Record<string, string> {
    return {
      ...definedEnv(this.env, PASSTHROUGH),
      LANG: "en_US.UTF-8",
      GIT_TERMINAL_PROMPT: "0",
    };
  }
}
