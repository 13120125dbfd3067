import type { Logger } from "../services/logger.service";

export interface Config {
  /** Repository working directory; defaults to the process cwd */
  cwd: string;
  /** Echo every git invocation to stderr */
  verbose: boolean;
  /** Colorize result lines and the verbose command echo */
  color: boolean;
  logger?: Logger;
}

/**
 * The version-control operations the reconciliation engine relies on.
 * Refs are passed fully qualified (`refs/heads/x`, `refs/remotes/origin/x`) unless noted.
 */
export interface GitBackend {
  listRemotes(): Promise<string[]>;
  /** Name of the remote's default branch, without the `refs/remotes/<remote>/` prefix */
  resolveDefaultBranch(remote: string): Promise<string>;
  /** `null` when HEAD is detached */
  currentBranch(): Promise<string | null>;
  listLocalBranches(): Promise<string[]>;
  fetch(remote: string): Promise<void>;
  explicitTrackingRemote(branch: string): Promise<string | null>;
  resolveUpstream(branch: string): Promise<string>;
  refExists(ref: string): Promise<boolean>;
  revParse(...refs: string[]): Promise<string[]>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  fastForwardOnly(ref: string): Promise<void>;
  movePointer(localRef: string, targetRef: string): Promise<void>;
  deleteLocalBranch(name: string): Promise<void>;
  switchCheckout(branch: string): Promise<void>;
  mergeBase(a: string, b: string): Promise<string>;
  treeOf(ref: string): Promise<string>;
  createDanglingCommit(tree: string, parent: string, message: string): Promise<string>;
  /** Raw `git cherry` style output: lines prefixed `-` (already applied) or `+` */
  patchEquivalenceCheck(targetRef: string, candidate: string): Promise<string>;
}

export type Counterpart =
  | { state: "resolved"; ref: string }
  | { state: "gone" }
  | { state: "absent" };

export type SyncVerdict =
  | { kind: "up-to-date" }
  | { kind: "fast-forward"; counterpartRef: string; fromShortId: string }
  | { kind: "unpushed" }
  | { kind: "deleted"; fromShortId: string; reason: "merged" | "squash-merged" }
  | { kind: "not-merged" };

export interface BranchResult {
  branch: string;
  verdict: SyncVerdict;
}

export interface SyncReport {
  remote: string;
  defaultBranch: string;
  results: BranchResult[];
}
