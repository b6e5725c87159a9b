import { execFile } from "node:child_process";
import type { GitIdentity } from "../config.js";
import { ExternalCallFailure } from "../errors.js";
import { logger } from "../logger.js";
import type { OpenChangeRequestInput, RepositoryBackend, RepositoryContext } from "./backend.js";

export interface CommandResult {
  /** `null` when the process could not be started or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], cwd: string) => Promise<CommandResult>;

const MAX_BUFFER = 16 * 1024 * 1024;

export const execFileRunner: CommandRunner = (command, args, cwd) =>
  new Promise((resolve) => {
    execFile(command, args, { cwd, encoding: "utf8", maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      resolve({
        exitCode: typeof error.code === "number" ? error.code : null,
        stdout: stdout ?? "",
        stderr: stderr || error.message,
      });
    });
  });

export interface GitCliBackendOptions {
  root: string;
  remote?: string;
  runner?: CommandRunner;
}

function failureDetail(error: unknown): string {
  if (error instanceof ExternalCallFailure) {
    return error.stderr.trim() || `exit code ${error.exitCode ?? "unknown"}`;
  }
  return error instanceof Error ? error.message : String(error);
}

const NO_CHANGE_REQUESTS = new Set(["", "[]"]);
const URL_PATTERN = /https?:\/\/\S+/g;

/** RepositoryBackend over the `git` and `gh` command-line tools. */
export class GitCliBackend implements RepositoryBackend {
  private readonly root: string;
  private readonly remote: string;
  private readonly runner: CommandRunner;

  constructor(options: GitCliBackendOptions) {
    this.root = options.root;
    this.remote = options.remote ?? "origin";
    this.runner = options.runner ?? execFileRunner;
  }

  private async exec(command: string, args: string[]): Promise<CommandResult> {
    logger.debug("Running command", "vcs", { command, args });
    return this.runner(command, args, this.root);
  }

  /** Runs a command and fails on a non-zero exit. */
  private async run(command: string, args: string[]): Promise<string> {
    const result = await this.exec(command, args);
    if (result.exitCode !== 0) {
      throw new ExternalCallFailure({ command: [command, ...args], ...result });
    }
    return result.stdout.trim();
  }

  /** Runs a command whose failure only means "no answer". */
  private async probe(command: string, args: string[]): Promise<string> {
    const result = await this.exec(command, args);
    return result.exitCode === 0 ? result.stdout.trim() : "";
  }

  async defaultBranch(): Promise<string> {
    const name = await this.probe("gh", [
      "repo",
      "view",
      "--json",
      "defaultBranchRef",
      "--jq",
      ".defaultBranchRef.name",
    ]);
    return name || "main";
  }

  async repositoryContext(): Promise<RepositoryContext> {
    const repository = await this.probe("gh", ["repo", "view", "--json", "nameWithOwner", "--jq", ".nameWithOwner"]);
    const actor = await this.probe("gh", ["api", "user", "--jq", ".login"]);
    return {
      repository: repository || undefined,
      actor: actor || undefined,
    };
  }

  async changeRequestExists(head: string): Promise<boolean> {
    const output = await this.run("gh", ["pr", "list", "--head", head, "--state", "all", "--json", "number"]);
    return !NO_CHANGE_REQUESTS.has(output);
  }

  async findChangeRequestUrl(head: string): Promise<string | undefined> {
    const url = await this.probe("gh", [
      "pr",
      "list",
      "--head",
      head,
      "--state",
      "all",
      "--json",
      "url",
      "--jq",
      ".[0].url",
    ]);
    return url && url !== "null" ? url : undefined;
  }

  async remoteBranchExists(branch: string): Promise<boolean> {
    const output = await this.run("git", ["ls-remote", "--heads", this.remote, branch]);
    return output.length > 0;
  }

  async createBranch(branch: string, base: string): Promise<void> {
    await this.run("git", ["fetch", this.remote, base]);
    await this.run("git", ["checkout", "-B", branch, `${this.remote}/${base}`]);
  }

  async stageFile(path: string): Promise<boolean> {
    await this.run("git", ["add", "--", path]);
    const result = await this.exec("git", ["diff", "--cached", "--quiet", "--", path]);
    if (result.exitCode === 0) {
      return false;
    }
    if (result.exitCode === 1) {
      return true;
    }
    throw new ExternalCallFailure({ command: ["git", "diff", "--cached", "--quiet", "--", path], ...result });
  }

  async commit(message: string, identity: GitIdentity, paths: string[]): Promise<void> {
    await this.run("git", [
      "-c",
      `user.name=${identity.name}`,
      "-c",
      `user.email=${identity.email}`,
      "commit",
      "-m",
      message,
      "--",
      ...paths,
    ]);
  }

  async push(branch: string): Promise<void> {
    await this.run("git", ["push", "-u", this.remote, branch]);
  }

  async openChangeRequest(input: OpenChangeRequestInput): Promise<string | undefined> {
    const output = await this.run("gh", [
      "pr",
      "create",
      "--title",
      input.title,
      "--body",
      input.body,
      "--base",
      input.base,
      "--head",
      input.head,
    ]);
    const urls = output.match(URL_PATTERN);
    return urls ? urls[urls.length - 1] : undefined;
  }

  /** One call per label, so a label missing from the repository does not block the others. */
  async addLabels(url: string, labels: string[]): Promise<void> {
    const failed: string[] = [];
    for (const label of labels) {
      try {
        await this.run("gh", ["pr", "edit", url, "--add-label", label]);
      } catch (error) {
        failed.push(`${label} (${failureDetail(error)})`);
      }
    }
    if (failed.length > 0) {
      throw new Error(`Could not add labels: ${failed.join("; ")}`);
    }
  }

  async comment(url: string, body: string): Promise<void> {
    await this.run("gh", ["pr", "comment", url, "--body", body]);
  }

  async resetTo(base: string): Promise<void> {
    // a staged file survives a plain checkout and would ride along into the next branch
    await this.run("git", ["reset", "--hard"]);
    await this.run("git", ["checkout", "-f", "-B", base, `${this.remote}/${base}`]);
  }

  async changedFiles(base: string, head: string): Promise<string[]> {
    const output = await this.run("git", ["diff", "--name-only", base, head]);
    return output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}
