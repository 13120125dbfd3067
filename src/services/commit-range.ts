import { RefResolutionError, toError } from "../errors";
import { shortId } from "../utils/messages";

import type { GitBackend } from "../types";

/**
 * Two resolved commit ids. Both refs are resolved up front; a ref that does not resolve
 * fails the construction rather than producing a partial range.
 */
export class CommitRange {
  private constructor(
    private readonly backend: GitBackend,
    public readonly a: string,
    public readonly b: string,
  ) {}

  static async resolve(backend: GitBackend, refA: string, refB: string): Promise<CommitRange> {
    let commits: string[];
    try {
      commits = await backend.revParse(refA, refB);
    } catch (error) {
      throw new RefResolutionError([refA, refB], toError(error));
    }

    const [a, b] = commits;
    if (commits.length !== 2 || !a || !b) {
      throw new RefResolutionError([refA, refB]);
    }
    return new CommitRange(backend, a, b);
  }

  get shortA(): string {
    return shortId(this.a);
  }

  isIdentical(): boolean {
    return this.a === this.b;
  }

  /** True when `a` is contained in the history of `b`, i.e. `b` is at or ahead of `a`. */
  async isAncestor(): Promise<boolean> {
    return this.backend.isAncestor(this.a, this.b);
  }
}
