import simpleGit from "simple-git";

import { GIT_CONSTANTS } from "../constants";
import { GitOperationError, RemoteDiscoveryError, toError } from "../errors";
import { formatCommandEcho } from "../utils/messages";

import { Logger } from "./logger.service";

import type { Config, GitBackend } from "../types";
import type { SimpleGit } from "simple-git";

export interface GitServiceOptions extends Config {
  /** Where `git fetch` progress is streamed; defaults to stderr */
  progress?: NodeJS.WritableStream;
}

function splitLines(output: string): string[] {
  const trimmed = output.trim();
  if (trimmed === "") {
    return [];
  }
  return trimmed.split("\n").map((line) => line.trim());
}

/**
 * `GitBackend` on top of simple-git. Every non-zero exit status rejects, including the silent
 * ones (`merge-base --is-ancestor`, `show-ref --quiet`, `config --get`), which simple-git would
 * otherwise resolve with empty output.
 */
export class GitService implements GitBackend {
  private git: SimpleGit;
  private logger: Logger;
  private color: boolean;
  private progress: NodeJS.WritableStream;

  constructor(options: GitServiceOptions) {
    this.color = options.color;
    this.logger = options.logger ?? Logger.createDefault(options.verbose, this.color);
    this.progress = options.progress ?? process.stderr;

    this.git = simpleGit({
      baseDir: options.cwd,
      maxConcurrentProcesses: 1,
      errors(error, result) {
        if (error) return error;
        if (result.exitCode === 0) return;
        return Buffer.concat([...result.stdOut, ...result.stdErr]);
      },
    });

    this.git.outputHandler((_command, _stdout, stderr, args) => {
      if (options.verbose) {
        this.logger.debug(formatCommandEcho(args, this.color));
      }
      if (args[0] === "fetch") {
        stderr.pipe(this.progress, { end: false });
      }
    });
  }

  private async run(args: string[]): Promise<string> {
    const output = await this.git.raw(args);
    return output.trim();
  }

  private async succeeds(args: string[]): Promise<boolean> {
    try {
      await this.git.raw(args);
      return true;
    } catch {
      return false;
    }
  }

  async listRemotes(): Promise<string[]> {
    try {
      const remotes = await this.git.getRemotes();
      return remotes.map((remote) => remote.name);
    } catch (error) {
      throw new RemoteDiscoveryError(`failed to list remotes: ${toError(error).message}`, toError(error));
    }
  }

  async resolveDefaultBranch(remote: string): Promise<string> {
    const prefix = `${GIT_CONSTANTS.REFS.REMOTES}${remote}/`;
    const headRef = await this.run(["symbolic-ref", "--quiet", `${prefix}HEAD`]).catch(() => null);
    if (headRef?.startsWith(prefix)) {
      return headRef.slice(prefix.length);
    }

    for (const candidate of GIT_CONSTANTS.DEFAULT_BRANCH_CANDIDATES) {
      if (await this.refExists(`${prefix}${candidate}`)) {
        return candidate;
      }
    }

    return GIT_CONSTANTS.DEFAULT_BRANCH;
  }

  async currentBranch(): Promise<string | null> {
    try {
      const branch = await this.run(["symbolic-ref", "--short", "HEAD"]);
      return branch || null;
    } catch {
      return null;
    }
  }

  async listLocalBranches(): Promise<string[]> {
    try {
      return splitLines(await this.run(["branch", "--format=%(refname:short)"]));
    } catch (error) {
      throw new GitOperationError("branch", "failed to list branches", toError(error));
    }
  }

  async fetch(remote: string): Promise<void> {
    await this.git.fetch(["--prune", "--quiet", "--progress", remote]);
  }

  async explicitTrackingRemote(branch: string): Promise<string | null> {
    try {
      const remote = await this.run(["config", "--get", `branch.${branch}.remote`]);
      return remote || null;
    } catch {
      return null;
    }
  }

  async resolveUpstream(branch: string): Promise<string> {
    return this.run(["rev-parse", "--symbolic-full-name", `${branch}@{upstream}`]);
  }

  async refExists(ref: string): Promise<boolean> {
    return this.succeeds(["show-ref", "--verify", "--quiet", ref]);
  }

  async revParse(...refs: string[]): Promise<string[]> {
    return splitLines(await this.run(["rev-parse", "--quiet", ...refs]));
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return this.succeeds(["merge-base", "--is-ancestor", ancestor, descendant]);
  }

  async fastForwardOnly(ref: string): Promise<void> {
    await this.run(["merge", "--ff-only", "--quiet", ref]);
  }

  async movePointer(localRef: string, targetRef: string): Promise<void> {
    await this.run(["update-ref", localRef, targetRef]);
  }

  async deleteLocalBranch(name: string): Promise<void> {
    await this.run(["branch", "-D", name]);
  }

  async switchCheckout(branch: string): Promise<void> {
    await this.run(["checkout", "--quiet", branch]);
  }

  async mergeBase(a: string, b: string): Promise<string> {
    return this.run(["merge-base", a, b]);
  }

  async treeOf(ref: string): Promise<string> {
    return this.run(["rev-parse", `${ref}^{tree}`]);
  }

  async createDanglingCommit(tree: string, parent: string, message: string): Promise<string> {
    return this.run(["commit-tree", tree, "-p", parent, "-m", message]);
  }

  async patchEquivalenceCheck(targetRef: string, candidate: string): Promise<string> {
    return this.run(["cherry", targetRef, candidate]);
  }
}
