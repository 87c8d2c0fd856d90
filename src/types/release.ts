/** Release domain types. */

/** Immutable semantic version triple. */
export type Version = {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
};

export const INCREMENT_KINDS = ["major", "minor", "patch"] as const;
export type IncrementKind = (typeof INCREMENT_KINDS)[number];

export const ENVIRONMENTS = ["production", "staging"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export type SyncStatus = "up_to_date" | "need_to_pull" | "need_to_push" | "diverged";

/** What an environment deploys from and which job performs it. */
export type EnvironmentTarget = {
  environment: Environment;
  branch: string;
  deployJob: string;
  pipelineRef: string;
};

export function isIncrementKind(value: string): value is IncrementKind {
  return (INCREMENT_KINDS as readonly string[]).includes(value);
}

export function isEnvironment(value: string): value is Environment {
  return (ENVIRONMENTS as readonly string[]).includes(value);
}
