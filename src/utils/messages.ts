import { ANSI, GIT_CONSTANTS } from "../constants";

export function shortId(commit: string): string {
  return commit.slice(0, GIT_CONSTANTS.SHORT_ID_LENGTH);
}

function paint(color: boolean, code: string): string {
  return color ? code : "";
}

export function formatUpdated(branch: string, fromShortId: string, color = false): string {
  return (
    `${paint(color, ANSI.GREEN)}Updated branch ${paint(color, ANSI.BRIGHT_GREEN)}${branch}` +
    `${paint(color, ANSI.RESET)} (was ${fromShortId}).`
  );
}

export function formatDeleted(branch: string, fromShortId: string, color = false): string {
  return (
    `${paint(color, ANSI.RED)}Deleted branch ${paint(color, ANSI.BRIGHT_RED)}${branch}` +
    `${paint(color, ANSI.RESET)} (was ${fromShortId}).`
  );
}

export function formatUnpushedWarning(branch: string): string {
  return `warning: '${branch}' seems to contain unpushed commits`;
}

export function formatNotMergedWarning(branch: string, remote: string, defaultBranch: string): string {
  return `warning: '${branch}' was deleted on ${remote}, but appears not merged into '${defaultBranch}'`;
}

export function formatCommandEcho(args: readonly string[], color = false): string {
  const line = `$ git ${args.join(" ")}`;
  return color ? `${ANSI.MAGENTA}${line}${ANSI.RESET}` : line;
}
