import { ERROR_MESSAGES } from "../constants";

export class BranchSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class GitError extends BranchSyncError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `GIT_${code}`, cause);
  }
}

export class GitOperationError extends GitError {
  constructor(operation: string, details: string, cause?: Error) {
    super(`Git operation '${operation}' failed: ${details}`, "OPERATION_FAILED", cause);
  }
}

export class RefResolutionError extends GitError {
  constructor(
    public readonly refs: readonly string[],
    cause?: Error,
  ) {
    super(`failed to resolve refs: ${refs.join(", ")}`, "REF_RESOLUTION_FAILED", cause);
  }
}

export class RemoteDiscoveryError extends GitError {
  constructor(message: string = ERROR_MESSAGES.NO_REMOTES, cause?: Error) {
    super(message, "REMOTE_DISCOVERY_FAILED", cause);
  }
}

export class FetchError extends GitError {
  constructor(
    public readonly remote: string,
    cause?: Error,
  ) {
    super(`fetch failed: ${cause?.message ?? remote}`, "FETCH_FAILED", cause);
  }
}

export type MutationAction = "fast-forward" | "update" | "checkout" | "delete";

export class MutationError extends GitError {
  constructor(
    public readonly branchName: string,
    public readonly action: MutationAction,
    cause?: Error,
  ) {
    super(`failed to ${action} ${branchName}${cause ? `: ${cause.message}` : ""}`, "MUTATION_FAILED", cause);
  }
}

export class UsageError extends BranchSyncError {
  constructor(message: string) {
    super(message, "CLI_USAGE");
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
