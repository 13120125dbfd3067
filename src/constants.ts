export const GIT_CONSTANTS = {
  REMOTE_PREFERENCE: ["upstream", "github", "origin"],
  DEFAULT_BRANCH_CANDIDATES: ["main", "master"],
  DEFAULT_BRANCH: "main",
  SHORT_ID_LENGTH: 7,
  CHERRY_APPLIED_MARKER: "-",
  SQUASH_PROBE_MESSAGE: "squash-merge probe for",
  REFS: {
    HEADS: "refs/heads/",
    REMOTES: "refs/remotes/",
  },
} as const;

export const ANSI = {
  GREEN: "\u001b[32m",
  BRIGHT_GREEN: "\u001b[1;32m",
  RED: "\u001b[31m",
  BRIGHT_RED: "\u001b[1;31m",
  MAGENTA: "\u001b[35m",
  RESET: "\u001b[0m",
} as const;

export const ERROR_MESSAGES = {
  NO_REMOTES: "no git remotes found",
} as const;
