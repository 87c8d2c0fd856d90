/** GitLab CI/CD snapshots as returned by the REST API (only the fields relctl reads). */

export type Pipeline = {
  id: number;
  status: string;
  ref: string;
  sha: string;
  web_url: string;
  created_at: string;
  updated_at: string;
};

export const JOB_STATUSES = [
  "created",
  "waiting_for_resource",
  "preparing",
  "pending",
  "running",
  "success",
  "failed",
  "canceled",
  "skipped",
  "manual",
  "scheduled",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type Job = {
  id: number;
  name: string;
  status: JobStatus;
};
