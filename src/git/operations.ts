import { GitError, simpleGit, type SimpleGit } from "simple-git";
import { definedEnv, type CredentialProvider } from "./credentials.js";

/** Refspec pushing a local branch to the same name on the remote. */
export function refByBranch(branch: string): string {
  return `refs/heads/${branch}:refs/heads/${branch}`;
}

/** Refspec pushing a local tag to the same name on the remote. */
export function refByTag(tag: string): string {
  return `refs/tags/${tag}:refs/tags/${tag}`;
}

/** Refspec updating the remote-tracking ref of a branch on fetch. */
export function trackingRefspec(remote: string, branch: string): string {
  return `+refs/heads/${branch}:refs/remotes/${remote}/${branch}`;
}

/**
 * Extract `group/project` from a remote URL.
 * Accepts scp-like SSH (`git@host:group/project.git`) and URL forms
 * (`https://host/group/project.git`, `ssh://git@host:2222/group/project.git`).
 */
export function extractProjectPath(remoteUrl: string): string | null {
  const url = remoteUrl.trim();
  const urlForm = /^(?:https?|ssh|git):\/\/[^/]+\/(.+?)(?:\.git)?\/?$/.exec(url);
  if (urlForm) return urlForm[1];
  const scpForm = /^[^@\s/]+@[^:\s/]+:(.+?)(?:\.git)?\/?$/.exec(url);
  if (scpForm) return scpForm[1];
  return null;
}

/**
 * Git operations wrapper. Abstracts simple-git for testability.
 */
export class GitOperations {
  private git: SimpleGit;
  private readonly credentials?: CredentialProvider;

  constructor(repoPath: string, opts: { git?: SimpleGit; credentials?: CredentialProvider } = {}) {
    this.git = opts.git ?? simpleGit(repoPath);
    this.credentials = opts.credentials;
  }

  /** Git instance for commands that talk to the remote. */
  private networkGit(): SimpleGit {
    return this.credentials ? this.git.env(this.credentials.gitEnv()) : this.git;
  }

  /** Whether the git binary can be run at all. */
  async gitInstalled(): Promise<boolean> {
    const version = await this.git.version();
    return version.installed;
  }

  async isRepository(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  /** Output of `git flow version`; throws when git-flow is missing. */
  async gitflowVersion(): Promise<string> {
    const result = await this.git.raw(["flow", "version"]);
    return result.trim();
  }

  /** Throws when the repository was never set up with `git flow init`. */
  async gitflowConfig(): Promise<string> {
    return this.git.raw(["flow", "config"]);
  }

  /** Run a `git flow ...` subcommand with merge editors disabled. */
  async flow(args: string[]): Promise<string> {
    return this.git.env({ ...definedEnv(process.env), GIT_MERGE_AUTOEDIT: "no" }).raw(["flow", ...args]);
  }

  /** All tag names of the repository. */
  async tagNames(): Promise<string[]> {
    const result = await this.git.tags();
    return result.all;
  }

  /** Resolve a revision spec (`@{0}`, `develop@{u}`, a SHA…) to a commit id. */
  async revParse(spec: string): Promise<string> {
    const result = await this.git.revparse(["--verify", `${spec}^{commit}`]);
    return result.trim();
  }

  /**
   * Best common ancestor of two commits; empty when the histories are unrelated.
   * Any other failure (an unknown commit, a broken repository) is thrown.
   */
  async mergeBase(a: string, b: string): Promise<string> {
    try {
      const result = await this.git.raw(["merge-base", a, b]);
      return result.trim();
    } catch (e) {
      // merge-base exits 1 with nothing on stderr when there is no common ancestor
      if (e instanceof GitError && e.message.trim() === "") return "";
      throw e;
    }
  }

  /** Get current branch name. */
  async currentBranch(): Promise<string> {
    const result = await this.git.revparse(["--abbrev-ref", "HEAD"]);
    return result.trim();
  }

  /** Untracked files count as changes. */
  async isClean(): Promise<boolean> {
    const status = await this.git.status();
    return status.isClean();
  }

  async getConfig(key: string): Promise<string | null> {
    const result = await this.git.getConfig(key);
    return result.value;
  }

  async remoteUrl(remote: string): Promise<string | null> {
    return this.getConfig(`remote.${remote}.url`);
  }

  async checkout(branch: string): Promise<void> {
    await this.git.checkout(branch);
  }

  /** Download the given refspecs (and every tag when asked). */
  async fetchRefs(remote: string, refspecs: string[], opts: { tags?: boolean } = {}): Promise<void> {
    const args = ["fetch", ...(opts.tags ? ["--tags"] : []), remote, ...refspecs];
    await this.networkGit().raw(args);
  }

  /** Push the given refspecs in a single push. */
  async pushRefs(remote: string, refspecs: string[]): Promise<void> {
    if (refspecs.length === 0) return;
    await this.networkGit().raw(["push", remote, ...refspecs]);
  }
}
