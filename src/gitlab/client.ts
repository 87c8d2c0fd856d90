import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { ReleaseError, errMsg } from "../types/errors.js";
import type { Job, Pipeline } from "../types/gitlab.js";
import type { PipelineQuery, PipelineService } from "./service.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type GitLabClientOpts = {
  /** `gitlab.com` (https assumed) or a full base URL. */
  host: string;
  token: string;
  /** Project path, e.g. `group/project`, or its numeric id. */
  project: string;
  fetchFn?: FetchFn;
  registry?: SchemaRegistry;
};

const HELP =
  "Check gitlab.host and gitlab.token (RELCTL_GITLAB__HOST / RELCTL_GITLAB__TOKEN); the token needs the api scope.";

/** REST base URL for a configured host. */
export function gitlabApiBase(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, "");
  const base = /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
  return `${base}/api/v4`;
}

/**
 * GitLab REST v4 client for the pipeline/job endpoints relctl drives.
 * Responses are validated against schemas/*.schema.json before use.
 */
export class GitLabClient implements PipelineService {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly registry: SchemaRegistry;

  constructor(private readonly opts: GitLabClientOpts) {
    this.baseUrl = gitlabApiBase(opts.host);
    this.fetchFn = opts.fetchFn ?? ((input, init) => fetch(input, init));
    this.registry = opts.registry ?? createRegistry();
  }

  async listPipelines(query: PipelineQuery): Promise<Pipeline[]> {
    const data = await this.request("GET", "/pipelines", { ref: query.ref, order_by: "id", sort: "desc" });
    return this.parse(() => this.registry.parseList<Pipeline>("pipeline", data));
  }

  async listPipelineJobs(pipelineId: number): Promise<Job[]> {
    const data = await this.request("GET", `/pipelines/${pipelineId}/jobs`, { per_page: "100" });
    return this.parse(() => this.registry.parseList<Job>("job", data));
  }

  async getJob(jobId: number): Promise<Job> {
    const data = await this.request("GET", `/jobs/${jobId}`);
    return this.parse(() => this.registry.parse<Job>("job", data));
  }

  async playJob(jobId: number): Promise<void> {
    await this.request("POST", `/jobs/${jobId}/play`);
  }

  private projectUrl(path: string, query?: Record<string, string>): URL {
    const url = new URL(`${this.baseUrl}/projects/${encodeURIComponent(this.opts.project)}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async request(method: "GET" | "POST", path: string, query?: Record<string, string>): Promise<unknown> {
    const url = this.projectUrl(path, query);
    const label = `${method} ${url.pathname}`;

    let res: Response;
    try {
      res = await this.fetchFn(url.toString(), {
        method,
        headers: { "PRIVATE-TOKEN": this.opts.token, Accept: "application/json" },
      });
    } catch (e) {
      throw new ReleaseError("GITLAB_REQUEST_FAILED", `${label} failed: ${errMsg(e)}`, { help: HELP, cause: e });
    }

    if (!res.ok) {
      throw new ReleaseError("GITLAB_REQUEST_FAILED", `${label} returned ${res.status} ${res.statusText}`.trim(), {
        help: HELP,
      });
    }

    const text = await res.text();
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch (e) {
      throw new ReleaseError("GITLAB_REQUEST_FAILED", `${label} returned invalid JSON`, { cause: e });
    }
  }

  private async parse<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (e) {
      throw new ReleaseError("GITLAB_REQUEST_FAILED", errMsg(e), { cause: e });
    }
  }
}

/** Build the client from resolved settings; the project must be known. */
export function createGitLabClient(
  gitlab: { host: string; token: string; project: string | null },
  extra: Pick<GitLabClientOpts, "fetchFn" | "registry"> = {},
): GitLabClient {
  if (!gitlab.project) {
    throw new ReleaseError("PROJECT_UNKNOWN", "Could not determine the GitLab project.", {
      help: "Set gitlab.project in the relctl config (e.g. group/project), or use a GitLab remote URL.",
    });
  }
  return new GitLabClient({ host: gitlab.host, token: gitlab.token, project: gitlab.project, ...extra });
}
