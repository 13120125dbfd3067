import { GIT_CONSTANTS } from "../constants";
import { FetchError, MutationError, RemoteDiscoveryError, toError } from "../errors";
import {
  formatDeleted,
  formatNotMergedWarning,
  formatUnpushedWarning,
  formatUpdated,
} from "../utils/messages";

import { BranchClassifier, localRef, remoteRef } from "./branch-classifier.service";
import { Logger } from "./logger.service";
import { SquashMergeDetector } from "./squash-merge.service";

import type { MutationAction } from "../errors";
import type { BranchResult, Config, GitBackend, SyncReport, SyncVerdict } from "../types";

export interface BranchSyncOptions extends Partial<Pick<Config, "logger" | "color">> {
  classifier?: BranchClassifier;
}

/** Picks `upstream`, then `github`, then `origin`, falling back to the first listed remote. */
export function selectPrimaryRemote(remotes: readonly string[]): string {
  const [first] = remotes;
  if (first === undefined) {
    throw new RemoteDiscoveryError();
  }
  const preferred = GIT_CONSTANTS.REMOTE_PREFERENCE.find((candidate) => remotes.includes(candidate));
  return preferred ?? first;
}

interface RunState {
  remote: string;
  defaultBranch: string;
  currentBranch: string | null;
}

/**
 * Reconciles every local branch against the primary remote, one branch at a time. The working
 * tree is shared by all branches, so mutations never overlap.
 */
export class BranchSyncService {
  private logger: Logger;
  private color: boolean;
  private classifier: BranchClassifier;

  constructor(
    private backend: GitBackend,
    options: BranchSyncOptions = {},
  ) {
    this.logger = options.logger ?? Logger.createDefault();
    this.color = options.color ?? this.logger.isColorEnabled;
    this.classifier =
      options.classifier ?? new BranchClassifier(backend, new SquashMergeDetector(backend, this.logger));
  }

  async sync(): Promise<SyncReport> {
    const remote = selectPrimaryRemote(await this.backend.listRemotes());
    const defaultBranch = await this.backend.resolveDefaultBranch(remote);
    const defaultRef = remoteRef(remote, defaultBranch);
    const state: RunState = {
      remote,
      defaultBranch,
      currentBranch: await this.backend.currentBranch(),
    };

    try {
      await this.backend.fetch(remote);
    } catch (error) {
      throw new FetchError(remote, toError(error));
    }

    const branches = await this.backend.listLocalBranches();
    const results: BranchResult[] = [];

    for (const branch of branches) {
      const verdict = await this.classifier.classify(branch, { remote, defaultRef });
      if (!verdict) continue;
      await this.apply(branch, verdict, state);
      results.push({ branch, verdict });
    }

    return { remote, defaultBranch, results };
  }

  private async apply(branch: string, verdict: SyncVerdict, state: RunState): Promise<void> {
    switch (verdict.kind) {
      case "up-to-date":
        return;

      case "fast-forward": {
        const { counterpartRef } = verdict;
        if (branch === state.currentBranch) {
          await this.mutate(branch, "fast-forward", () => this.backend.fastForwardOnly(counterpartRef));
        } else {
          await this.mutate(branch, "update", () => this.backend.movePointer(localRef(branch), counterpartRef));
        }
        this.logger.info(formatUpdated(branch, verdict.fromShortId, this.color));
        return;
      }

      case "unpushed":
        this.logger.warn(formatUnpushedWarning(branch));
        return;

      case "deleted":
        if (branch === state.currentBranch) {
          const { defaultBranch } = state;
          await this.mutate(defaultBranch, "checkout", () => this.backend.switchCheckout(defaultBranch));
          state.currentBranch = defaultBranch;
        }
        await this.mutate(branch, "delete", () => this.backend.deleteLocalBranch(branch));
        this.logger.info(formatDeleted(branch, verdict.fromShortId, this.color));
        return;

      case "not-merged":
        this.logger.warn(formatNotMergedWarning(branch, state.remote, state.defaultBranch));
        return;
    }
  }

  private async mutate(branch: string, action: MutationAction, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      throw new MutationError(branch, action, toError(error));
    }
  }
}
