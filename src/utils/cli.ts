import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { UsageError } from "../errors";

import type { Config } from "../types";

export type CliOptions = Pick<Config, "verbose">;

export const USAGE = `Usage: $0 [flags]

Fetch from the primary remote and update local branches.

If a local branch is outdated, fast-forward it.
If a local branch contains unpushed work, warn about it.
If a branch seems merged and its upstream was deleted, delete it.`;

export function parseArguments(args: string[] = hideBin(process.argv)): CliOptions {
  const argv = yargs(args)
    .scriptName("branch-sync")
    .usage(USAGE)
    .option("verbose", {
      alias: "v",
      type: "boolean",
      description: "Log each git command to stderr",
      default: false,
    })
    .strict()
    .version(false)
    .help()
    .alias("help", "h")
    .fail((message, error) => {
      throw new UsageError(error?.message ?? message);
    })
    .parseSync();

  return {
    verbose: argv.verbose,
  };
}
