import { GIT_CONSTANTS } from "../constants";
import { getErrorMessage } from "../utils/error-message";

import { Logger } from "./logger.service";

import type { GitBackend } from "../types";

/**
 * Detects branches whose net change already landed in a target through a squash merge.
 *
 * A dangling probe commit is built with the branch tip's tree and the merge base as its only
 * parent, so its patch is exactly what the branch introduced regardless of how many commits it
 * has. `git cherry` then reports whether an equivalent patch exists in the target's history.
 * The probe is never referenced by a ref and is left for git's garbage collection.
 */
export class SquashMergeDetector {
  private logger: Logger;

  constructor(
    private backend: GitBackend,
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.createDefault();
  }

  async isSquashMerged(branchRef: string, targetRef: string, branchName: string): Promise<boolean> {
    try {
      const mergeBase = await this.backend.mergeBase(targetRef, branchRef);
      const tree = await this.backend.treeOf(branchRef);
      const probe = await this.backend.createDanglingCommit(
        tree,
        mergeBase,
        `${GIT_CONSTANTS.SQUASH_PROBE_MESSAGE} ${branchName}`,
      );
      const marker = await this.backend.patchEquivalenceCheck(targetRef, probe);
      return marker.startsWith(GIT_CONSTANTS.CHERRY_APPLIED_MARKER);
    } catch (error) {
      // Without proof of a squash merge the branch is kept and reported as not merged
      this.logger.debug(`squash-merge check for '${branchName}' failed: ${getErrorMessage(error)}`);
      return false;
    }
  }
}
