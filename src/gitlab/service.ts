import type { Job, Pipeline } from "../types/gitlab.js";

export type PipelineQuery = {
  ref: string;
};

/**
 * Remote CI/CD service as seen by the deployer. Reads are snapshots; `playJob`
 * only reports whether the request was accepted.
 */
export interface PipelineService {
  /** Pipelines for a ref, most recent (highest id) first. */
  listPipelines(query: PipelineQuery): Promise<Pipeline[]>;
  listPipelineJobs(pipelineId: number): Promise<Job[]>;
  getJob(jobId: number): Promise<Job>;
  playJob(jobId: number): Promise<void>;
}
