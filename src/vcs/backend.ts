import type { GitIdentity } from "../config.js";

export interface RepositoryContext {
  repository?: string;
  actor?: string;
}

export interface OpenChangeRequestInput {
  title: string;
  body: string;
  base: string;
  head: string;
}

/**
 * The version-control and review capabilities the pipeline consumes. Every
 * method may perform network I/O; implementations throw ExternalCallFailure
 * when a command fails unexpectedly.
 */
export interface RepositoryBackend {
  /** Name of the default branch; implementations fall back to `main`. */
  defaultBranch(): Promise<string>;
  /** Informational only and never throws. */
  repositoryContext(): Promise<RepositoryContext>;
  /** True when a change request with this head exists in any state. */
  changeRequestExists(head: string): Promise<boolean>;
  findChangeRequestUrl(head: string): Promise<string | undefined>;
  remoteBranchExists(branch: string): Promise<boolean>;
  /** Creates (or resets) `branch` at the tip of the remote `base` and checks it out. */
  createBranch(branch: string, base: string): Promise<void>;
  /** Stages one repository-relative path and reports whether that path now differs from HEAD. */
  stageFile(path: string): Promise<boolean>;
  /** Commits only `paths`, whatever else the index holds. */
  commit(message: string, identity: GitIdentity, paths: string[]): Promise<void>;
  push(branch: string): Promise<void>;
  /** Opens a change request and returns its URL when the review system prints one. */
  openChangeRequest(input: OpenChangeRequestInput): Promise<string | undefined>;
  addLabels(url: string, labels: string[]): Promise<void>;
  comment(url: string, body: string): Promise<void>;
  /**
   * Checks out `base` at the tip of its remote counterpart, discarding staged
   * and working-tree changes left behind by an interrupted attempt.
   */
  resetTo(base: string): Promise<void>;
  changedFiles(base: string, head: string): Promise<string[]>;
}
