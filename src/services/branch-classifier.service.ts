import { GIT_CONSTANTS } from "../constants";

import { CommitRange } from "./commit-range";
import { SquashMergeDetector } from "./squash-merge.service";

import type { Counterpart, GitBackend, SyncVerdict } from "../types";

export interface ClassificationContext {
  remote: string;
  /** Fully qualified ref of the remote's default branch, e.g. `refs/remotes/origin/main` */
  defaultRef: string;
}

export function localRef(branch: string): string {
  return `${GIT_CONSTANTS.REFS.HEADS}${branch}`;
}

export function remoteRef(remote: string, branch: string): string {
  return `${GIT_CONSTANTS.REFS.REMOTES}${remote}/${branch}`;
}

/**
 * Decides the outcome for one local branch. Holds no state between branches; all repository
 * access goes through the injected backend and detector.
 */
export class BranchClassifier {
  private detector: SquashMergeDetector;

  constructor(
    private backend: GitBackend,
    detector?: SquashMergeDetector,
  ) {
    this.detector = detector ?? new SquashMergeDetector(backend);
  }

  /**
   * An explicit tracking config for the selected remote wins: its upstream either resolves or
   * was removed from the remote. Without one, a same-named remote branch is used as an implicit
   * counterpart; no tracking link is created for it.
   */
  async resolveCounterpart(branch: string, remote: string): Promise<Counterpart> {
    const trackingRemote = await this.backend.explicitTrackingRemote(branch);

    if (trackingRemote === remote) {
      try {
        const upstream = await this.backend.resolveUpstream(branch);
        return { state: "resolved", ref: upstream };
      } catch {
        return { state: "gone" };
      }
    }

    const implicitRef = remoteRef(remote, branch);
    if (await this.backend.refExists(implicitRef)) {
      return { state: "resolved", ref: implicitRef };
    }

    return { state: "absent" };
  }

  /** Returns `null` for a branch without any counterpart on the remote. */
  async classify(branch: string, context: ClassificationContext): Promise<SyncVerdict | null> {
    const counterpart = await this.resolveCounterpart(branch, context.remote);

    switch (counterpart.state) {
      case "resolved":
        return this.compareWithCounterpart(branch, counterpart.ref);
      case "gone":
        return this.checkMerged(branch, context.defaultRef);
      case "absent":
        return null;
    }
  }

  private async compareWithCounterpart(branch: string, counterpartRef: string): Promise<SyncVerdict> {
    const range = await CommitRange.resolve(this.backend, localRef(branch), counterpartRef);

    if (range.isIdentical()) {
      return { kind: "up-to-date" };
    }
    if (await range.isAncestor()) {
      return { kind: "fast-forward", counterpartRef, fromShortId: range.shortA };
    }
    // Local strictly ahead and diverged histories both land here
    return { kind: "unpushed" };
  }

  private async checkMerged(branch: string, defaultRef: string): Promise<SyncVerdict> {
    const ref = localRef(branch);
    const range = await CommitRange.resolve(this.backend, ref, defaultRef);

    if (await range.isAncestor()) {
      return { kind: "deleted", fromShortId: range.shortA, reason: "merged" };
    }
    if (await this.detector.isSquashMerged(ref, defaultRef, branch)) {
      return { kind: "deleted", fromShortId: range.shortA, reason: "squash-merged" };
    }
    return { kind: "not-merged" };
  }
}
